export type ErrorCode =
  | "config_invalid"
  | "remote_unavailable"
  | "launch_failed"
  | "incomplete_capture"
  | "upload_failed"
  | "delivery_failed";

export class RecorderError extends Error {
  readonly code: ErrorCode;
  readonly context: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    options?: { cause?: unknown; context?: Record<string, unknown> }
  ) {
    super(message, { cause: options?.cause });
    this.name = new.target.name;
    this.code = code;
    this.context = options?.context ?? {};
  }
}

export class ConfigError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("config_invalid", message, options);
  }
}

/** Schedule API could not be reached or answered with something unusable. */
export class RemoteUnavailableError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super("remote_unavailable", message, options);
  }
}

export class LaunchFailedError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super("launch_failed", message, options);
  }
}

/** Capture finished but left no usable output file. */
export class IncompleteCaptureError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super("incomplete_capture", message, options);
  }
}

export class UploadFailedError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super("upload_failed", message, options);
  }
}

export class DeliveryFailedError extends RecorderError {
  constructor(message: string, options?: { cause?: unknown; context?: Record<string, unknown> }) {
    super("delivery_failed", message, options);
  }
}

export function errorMessage(error: unknown) {
  return error instanceof Error ? error.message : String(error);
}

export function describeError(error: unknown): Record<string, unknown> {
  if (error instanceof RecorderError) {
    return {
      error: error.message,
      code: error.code,
      ...error.context,
      ...(error.cause !== undefined ? { cause: errorMessage(error.cause) } : {})
    };
  }
  return { error: errorMessage(error) };
}
