/**
 * Image reference parsing for multimodal message parts.
 * Accepts http(s) URLs, data URLs and bare base64 payloads.
 */

export type ImageSource =
  | { type: "url"; url: string }
  | { type: "base64"; mediaType: string; data: string };

const DATA_URL_PATTERN = /^data:([^;,]+)?((?:;[^;,]+=[^;,]+)*)(;base64)?,(.*)$/s;
const BASE64_PATTERN = /^[A-Za-z0-9+/]+={0,2}$/;

const BASE64_SIGNATURES: Array<[prefix: string, mediaType: string]> = [
  ["/9j/", "image/jpeg"],
  ["iVBORw0KGgo", "image/png"],
  ["R0lGOD", "image/gif"],
  ["UklGR", "image/webp"],
];

export function detectImageMediaType(base64: string): string {
  for (const [prefix, mediaType] of BASE64_SIGNATURES) {
    if (base64.startsWith(prefix)) {
      return mediaType;
    }
  }
  return "image/png";
}

function looksLikeBase64(value: string): boolean {
  return value.length >= 16 && value.length % 4 === 0 && BASE64_PATTERN.test(value);
}

/**
 * Returns null when the value is neither a usable URL nor base64 data.
 */
export function parseImageSource(raw: string): ImageSource | null {
  const value = raw.trim();
  if (!value) {
    return null;
  }

  const dataUrl = DATA_URL_PATTERN.exec(value);
  if (dataUrl) {
    const [, mediaType, , base64Flag, payload] = dataUrl;
    if (!base64Flag || !payload) {
      return null;
    }
    return {
      type: "base64",
      mediaType: mediaType ?? detectImageMediaType(payload),
      data: payload,
    };
  }

  const compact = value.replace(/\s+/g, "");
  if (looksLikeBase64(compact)) {
    return { type: "base64", mediaType: detectImageMediaType(compact), data: compact };
  }

  let url: URL;
  try {
    url = new URL(value);
  } catch {
    return null;
  }
  if ((url.protocol !== "http:" && url.protocol !== "https:") || !url.host) {
    return null;
  }
  return { type: "url", url: url.toString() };
}
