export class InvalidArgumentError extends Error {
  override readonly name = 'InvalidArgumentError';

  constructor(message: string) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnsupportedOperationError extends Error {
  override readonly name = 'UnsupportedOperationError';

  constructor(message: string) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ParseError extends Error {
  override readonly name = 'ParseError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised for any non-200 response from the Doc API. The subclasses below
 * narrow the status; this class itself covers statuses outside 4xx/5xx.
 */
export class HttpError extends Error {
  override readonly name: string = 'HttpError';
  readonly status: number;

  constructor(
    readonly response: Response,
    message?: string,
  ) {
    super(message ?? `Doc API request failed with status ${response.status}`);
    this.status = response.status;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class BadRequestError extends HttpError {
  override readonly name = 'BadRequestError';
}

export class NotFoundError extends HttpError {
  override readonly name = 'NotFoundError';
}

export class RateLimitError extends HttpError {
  override readonly name = 'RateLimitError';
}

/** Any 4xx other than 400, 404 and 429. */
export class ClientRequestError extends HttpError {
  override readonly name = 'ClientRequestError';
}

export class ServerError extends HttpError {
  override readonly name = 'ServerError';
}
