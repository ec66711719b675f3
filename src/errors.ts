export const ErrorCodes = {
  // Transport errors
  TRANSPORT_FAILED: "TRANSPORT_FAILED",
  HTTP_STATUS: "HTTP_STATUS",

  // Decode errors
  MALFORMED_PAYLOAD: "MALFORMED_PAYLOAD",
  MISSING_FIELD: "MISSING_FIELD",
  INVALID_FIELD: "INVALID_FIELD",

  // Stream errors
  RESPONSE_FAILED: "RESPONSE_FAILED",
  STREAM_ENDED: "STREAM_ENDED",

  // Configuration
  INVALID_CONFIG: "INVALID_CONFIG",
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class ChatStreamError extends Error {
  constructor(
    message: string,
    public readonly code: ErrorCode,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = "ChatStreamError";
  }

  toJSON() {
    return {
      error: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Connection failure or non-2xx HTTP status. `status` is null when no response
 * was received at all.
 */
export class TransportError extends ChatStreamError {
  constructor(
    message: string,
    public readonly status: number | null = null,
    details?: unknown,
  ) {
    super(message, status === null ? ErrorCodes.TRANSPORT_FAILED : ErrorCodes.HTTP_STATUS, details);
    this.name = "TransportError";
  }
}

export type DecodeErrorKind = "malformed_payload" | "missing_field" | "invalid_field";

const DECODE_ERROR_CODES: Record<DecodeErrorKind, ErrorCode> = {
  malformed_payload: ErrorCodes.MALFORMED_PAYLOAD,
  missing_field: ErrorCodes.MISSING_FIELD,
  invalid_field: ErrorCodes.INVALID_FIELD,
};

export class DecodeError extends ChatStreamError {
  readonly kind: DecodeErrorKind;
  readonly field?: string;
  readonly path?: string;

  constructor(params: { kind: DecodeErrorKind; message: string; field?: string; path?: string }) {
    super(params.message, DECODE_ERROR_CODES[params.kind], {
      field: params.field,
      path: params.path,
    });
    this.name = "DecodeError";
    this.kind = params.kind;
    this.field = params.field;
    this.path = params.path;
  }

  static malformed(reason: string): DecodeError {
    return new DecodeError({
      kind: "malformed_payload",
      message: `malformed payload: ${reason}`,
    });
  }

  static missingField(field: string, path: string): DecodeError {
    return new DecodeError({
      kind: "missing_field",
      message: `missing field \`${field}\` at ${path}`,
      field,
      path,
    });
  }

  static invalidField(field: string, path: string, reason: string): DecodeError {
    return new DecodeError({
      kind: "invalid_field",
      message: `invalid field \`${field}\` at ${path}: ${reason}`,
      field,
      path,
    });
  }
}

export class ResponseFailedError extends ChatStreamError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.RESPONSE_FAILED, details);
    this.name = "ResponseFailedError";
  }
}

export class StreamEndedError extends ChatStreamError {
  constructor(message = "stream ended before the response completed") {
    super(message, ErrorCodes.STREAM_ENDED);
    this.name = "StreamEndedError";
  }
}

export class ConfigError extends ChatStreamError {
  constructor(message: string, details?: unknown) {
    super(message, ErrorCodes.INVALID_CONFIG, details);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
