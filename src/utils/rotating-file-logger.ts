import {
  createWriteStream,
  existsSync,
  mkdirSync,
  openSync,
  readdirSync,
  renameSync,
  statSync,
  unlinkSync,
  type WriteStream,
} from "fs";
import { join } from "path";
import type { Logger } from "./logger.js";

export interface RotatingFileLoggerOptions {
  /** Directory to store log files. Default 'logs' */
  dirname?: string;
  /** Base filename for logs. Default 'gateway.log' */
  filename?: string;
  /** Max size in bytes before rotating. Default 5MB */
  maxSize?: number;
  /** Max number of rotated log files to keep. Default 5 */
  maxFiles?: number;
  /** Where write failures are reported */
  logger?: Logger;
}

export interface RotatingFileSink {
  write(line: string): void;
  close(): Promise<void>;
}

/**
 * Appends JSON lines to `<dirname>/<filename>` and rotates the file to
 * `<filename>.<timestamp>` once it grows past `maxSize`.
 */
export function createRotatingFileLogger(
  options: RotatingFileLoggerOptions = {},
): RotatingFileSink {
  const dir = options.dirname ?? "logs";
  const base = options.filename ?? "gateway.log";
  const maxSize = options.maxSize ?? 5 * 1024 * 1024;
  const maxFiles = options.maxFiles ?? 5;
  const report = options.logger?.error ?? console.error;

  if (!existsSync(dir)) {
    mkdirSync(dir, { recursive: true });
  }

  const filePath = join(dir, base);
  let currentSize = existsSync(filePath) ? statSync(filePath).size : 0;
  let stream: WriteStream = openStream();

  // The descriptor is opened synchronously so a rotation right after
  // creation always finds the file on disk.
  function openStream(): WriteStream {
    const opened = createWriteStream(filePath, { fd: openSync(filePath, "a") });
    opened.on("error", (err) => report("Failed to write log file:", err));
    return opened;
  }

  function pruneRotated() {
    const rotated = readdirSync(dir)
      .filter((f) => f.startsWith(`${base}.`))
      .sort();
    while (rotated.length > maxFiles) {
      const old = rotated.shift();
      if (old) {
        unlinkSync(join(dir, old));
      }
    }
  }

  function rotate() {
    stream.end();
    try {
      const timestamp = new Date().toISOString().replace(/[:.]/g, "-");
      renameSync(filePath, join(dir, `${base}.${timestamp}`));
      pruneRotated();
    } finally {
      stream = openStream();
      currentSize = 0;
    }
  }

  return {
    write(line: string) {
      try {
        stream.write(`${line}\n`);
        currentSize += Buffer.byteLength(`${line}\n`);
        if (currentSize >= maxSize) {
          rotate();
        }
      } catch (err) {
        report("Failed to write log file:", err);
      }
    },
    close() {
      return new Promise((resolve) => {
        stream.end(() => resolve());
      });
    },
  };
}
