/**
 * Error taxonomy for the transcription endpoint.
 * Every failure leaving a route is one of these, rendered as
 * `{ success: false, error: message }` with `statusCode`.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number = 500
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Missing, empty or unrecognised input (400). */
export class InvalidRequestError extends AppError {
  constructor(message: string) {
    super(message, 400);
  }
}

/** The downloader could not produce an audio file (502). */
export class DownloadFailedError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

/** Upload, job creation, remote job error or wait timeout (502). */
export class TranscriptionFailedError extends AppError {
  constructor(message: string) {
    super(message, 502);
  }
}

/** The speech-to-text credential is not configured (503). */
export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 503);
  }
}

export class InternalError extends AppError {
  constructor(message = "Internal server error") {
    super(message, 500);
  }
}

function clientStatusCode(err: unknown): number | undefined {
  if (!(err instanceof Error) || !("statusCode" in err)) return undefined;
  const { statusCode } = err;
  return typeof statusCode === "number" && statusCode >= 400 && statusCode < 500
    ? statusCode
    : undefined;
}

export function toAppError(err: unknown): AppError {
  if (err instanceof AppError) return err;

  // Fastify's own 4xx errors (bad JSON, unsupported media type, body too large)
  const status = clientStatusCode(err);
  if (err instanceof Error && status === 400) return new InvalidRequestError(err.message);
  if (err instanceof Error && status !== undefined) return new AppError(err.message, status);

  return new InternalError();
}
