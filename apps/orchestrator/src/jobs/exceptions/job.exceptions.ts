import { HttpException, HttpStatus } from '@nestjs/common';

/**
 * Thrown when no job exists with the requested id.
 * Maps to HTTP 404 Not Found.
 */
export class JobNotFoundException extends HttpException {
  constructor(jobId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Job ${jobId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when reprocessing is requested for unknown content.
 * Maps to HTTP 404 Not Found.
 */
export class ContentNotFoundException extends HttpException {
  constructor(contentId: string) {
    super(
      {
        statusCode: HttpStatus.NOT_FOUND,
        error: 'Not Found',
        message: `Content ${contentId} not found`,
      },
      HttpStatus.NOT_FOUND,
    );
  }
}

/**
 * Thrown when the content's identifier cannot be turned into a resource key
 * (empty id, malformed source URL).
 * Maps to HTTP 400 Bad Request.
 */
export class InvalidResourceIdentifierException extends HttpException {
  constructor(reason: string, cause: Error) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: reason,
      },
      HttpStatus.BAD_REQUEST,
      { cause },
    );
  }
}

/** Maps to HTTP 400 Bad Request. */
export class InvalidIdempotencyKeyException extends HttpException {
  constructor(maxLength: number) {
    super(
      {
        statusCode: HttpStatus.BAD_REQUEST,
        error: 'Bad Request',
        message: `Idempotency-Key must be 1 to ${maxLength} characters`,
      },
      HttpStatus.BAD_REQUEST,
    );
  }
}

/**
 * Thrown when the job store is unavailable during submission.
 * Wraps internal DB errors without leaking implementation details.
 * Maps to HTTP 500 Internal Server Error.
 */
export class JobSubmissionException extends HttpException {
  constructor(cause: Error) {
    super(
      {
        statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
        error: 'Internal Server Error',
        message: 'Failed to submit the job. Please try again.',
      },
      HttpStatus.INTERNAL_SERVER_ERROR,
      { cause },
    );
  }
}
