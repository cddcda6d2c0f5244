/**
 * Gateway error taxonomy.
 * Every error that crosses the HTTP boundary is a GatewayError and is rendered
 * as `{ error: { message, type, code, param? }, extra_fields? }`.
 */

export interface ErrorExtraFields {
  provider?: string;
  model_requested?: string;
}

export interface ErrorBody {
  error: {
    message: string;
    type: string;
    code: string;
    param?: string;
  };
  extra_fields?: ErrorExtraFields;
}

export interface GatewayErrorOptions {
  param?: string;
  extraFields?: ErrorExtraFields;
  cause?: unknown;
}

export class GatewayError extends Error {
  readonly param?: string;
  readonly extraFields?: ErrorExtraFields;

  constructor(
    message: string,
    readonly status: number,
    readonly type: string,
    readonly code: string,
    options: GatewayErrorOptions = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = new.target.name;
    this.param = options.param;
    this.extraFields = options.extraFields;
  }

  toBody(): ErrorBody {
    const body: ErrorBody = {
      error: {
        message: this.message,
        type: this.type,
        code: this.code,
      },
    };
    if (this.param !== undefined) {
      body.error.param = this.param;
    }
    if (this.extraFields && Object.keys(this.extraFields).length > 0) {
      body.extra_fields = { ...this.extraFields };
    }
    return body;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

/** Malformed request or management input. */
export class ValidationError extends GatewayError {
  readonly issues: ValidationIssue[];

  constructor(
    message: string,
    options: GatewayErrorOptions & { code?: string; issues?: ValidationIssue[] } = {},
  ) {
    super(message, 400, "invalid_request_error", options.code ?? "VALIDATION_ERROR", {
      param: options.param ?? options.issues?.[0]?.path,
      extraFields: options.extraFields,
      cause: options.cause,
    });
    this.issues = options.issues ?? [];
  }
}

export class NotFoundError extends GatewayError {
  constructor(message: string, options: GatewayErrorOptions = {}) {
    super(message, 404, "not_found_error", "NOT_FOUND", options);
  }
}

/** The resolved virtual key does not permit the requested model. */
export class ModelNotAllowedError extends GatewayError {
  constructor(provider: string, model: string) {
    super(
      `Model ${provider}/${model} is not allowed for this virtual key`,
      403,
      "permission_error",
      "MODEL_NOT_ALLOWED",
      { param: "model", extraFields: { provider, model_requested: model } },
    );
  }
}

export interface UpstreamErrorOptions {
  provider: string;
  model: string;
  status?: number;
  code?: string;
  cause?: unknown;
}

/**
 * A failure reported by (or while talking to) an upstream provider.
 * Upstream 4xx/5xx statuses are kept; transport failures map to 502.
 */
export class UpstreamProviderError extends GatewayError {
  readonly upstreamStatus?: number;

  constructor(message: string, options: UpstreamErrorOptions) {
    super(
      message,
      normalizeUpstreamStatus(options.status),
      "provider_error",
      options.code ?? "PROVIDER_ERROR",
      {
        extraFields: { provider: options.provider, model_requested: options.model },
        cause: options.cause,
      },
    );
    this.upstreamStatus = options.status;
  }
}

export type AuthPolicyCode =
  | "INVALID_VIRTUAL_KEY"
  | "VIRTUAL_KEY_INACTIVE"
  | "VIRTUAL_KEY_REQUIRED"
  | "UNAUTHORIZED";

export class AuthPolicyError extends GatewayError {
  constructor(message: string, status: 401 | 403, code: AuthPolicyCode) {
    super(message, status, "authentication_error", code);
  }
}

function normalizeUpstreamStatus(status: number | undefined): number {
  if (status === undefined || status < 400 || status > 599) {
    return 502;
  }
  return status;
}

export function toErrorBody(error: unknown): { status: number; body: ErrorBody } {
  if (error instanceof GatewayError) {
    return { status: error.status, body: error.toBody() };
  }
  return {
    status: 500,
    body: {
      error: {
        message: error instanceof Error ? error.message : "Unknown error occurred",
        type: "internal_error",
        code: "INTERNAL_ERROR",
      },
    },
  };
}

export function errorResponse(error: unknown): Response {
  const { status, body } = toErrorBody(error);
  return new Response(JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/json" },
  });
}
