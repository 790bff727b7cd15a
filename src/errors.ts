export class TranscriberError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TranscriberError";
  }
}

/** The source media could not be read or decoded. */
export class DecodeError extends TranscriberError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DecodeError";
  }
}

export class InvalidParameterError extends TranscriberError {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParameterError";
  }
}

/** Transient rejection from the transcription service; retried with backoff. */
export class RateLimitedError extends TranscriberError {
  constructor(
    message: string,
    readonly retryAfterSeconds?: number
  ) {
    super(message);
    this.name = "RateLimitedError";
  }
}

export class ServiceError extends TranscriberError {
  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ServiceError";
  }
}

export class MaxRetriesExceededError extends TranscriberError {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown
  ) {
    super(`Max retries exceeded after ${attempts} attempts.`, { cause: lastError });
    this.name = "MaxRetriesExceededError";
  }
}

export class NoOutputGeneratedError extends TranscriberError {
  constructor(message = "No transcription output generated.") {
    super(message);
    this.name = "NoOutputGeneratedError";
  }
}
