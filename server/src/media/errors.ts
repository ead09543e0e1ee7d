/**
 * Domain errors raised by the media resolution layer.
 * `code` is stable and is what HTTP handlers put on the wire.
 */
export class MediaError extends Error {
  readonly code: string;

  constructor(code: string, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InvalidSpecError extends MediaError {
  constructor(message: string) {
    super("invalid_spec", message);
  }
}

export class BatchClosedError extends MediaError {
  constructor(batchId: string) {
    super("batch_closed", `batch ${batchId} is closed`);
  }
}

export class GenerationTimeoutError extends MediaError {
  constructor(timeoutMs: number) {
    super("generation_timeout", `generation attempt exceeded ${timeoutMs}ms`);
  }
}

export class GenerationCancelledError extends MediaError {
  constructor(mediaKey: string) {
    super("generation_cancelled", `generation for ${mediaKey} was cancelled`);
  }
}

/**
 * Short, single-line description of a background failure for status responses.
 */
export function summarizeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message.split("\n")[0] || error.name;
  }

  return typeof error === "string" && error.length > 0 ? error : "unknown error";
}
