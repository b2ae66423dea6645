export class AppError extends Error {
  constructor(
    public statusCode: number,
    public message: string,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export class BadRequestError extends AppError {
  constructor(message = 'Bad request') {
    super(400, message);
    Object.setPrototypeOf(this, BadRequestError.prototype);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Not found') {
    super(404, message);
    Object.setPrototypeOf(this, NotFoundError.prototype);
  }
}

// ============ Extraction errors ============

/**
 * Base for failures raised while extracting a single video.
 * `videoId` is the correlation id used in every log line and message.
 */
export class ExtractorError extends AppError {
  constructor(statusCode: number, message: string, public videoId?: string) {
    super(statusCode, videoId ? `${videoId}: ${message}` : message);
    Object.setPrototypeOf(this, ExtractorError.prototype);
  }
}

export class UnsupportedUrlError extends ExtractorError {
  constructor(public url: string) {
    super(400, `Unsupported URL: ${url}`);
    Object.setPrototypeOf(this, UnsupportedUrlError.prototype);
  }
}

export class LoginRequiredError extends ExtractorError {
  constructor(videoId?: string) {
    super(
      401,
      'This video is only available for registered users. Pass the cookies of a logged-in session (SESSION_COOKIE) to authenticate',
      videoId
    );
    Object.setPrototypeOf(this, LoginRequiredError.prototype);
  }
}

/** An expected value is missing from the page markup */
export class ExtractionError extends ExtractorError {
  constructor(public field: string, videoId?: string) {
    super(502, `Unable to extract ${field}; the page layout may have changed`, videoId);
    Object.setPrototypeOf(this, ExtractionError.prototype);
  }
}

export class FatalFetchError extends ExtractorError {
  constructor(message: string, videoId?: string, public upstreamStatus?: number) {
    super(502, message, videoId);
    Object.setPrototypeOf(this, FatalFetchError.prototype);
  }
}

/**
 * Describes a request whose failure only degrades the result.
 * Logged by the extractor, never thrown out of an extraction.
 */
export class SoftFetchError extends ExtractorError {
  constructor(message: string, videoId?: string, public reason?: unknown) {
    super(502, message, videoId);
    Object.setPrototypeOf(this, SoftFetchError.prototype);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
