import {
  BadRequestError,
  ClientRequestError,
  HttpError,
  NotFoundError,
  RateLimitError,
  ServerError,
} from '../errors.js';

export const HttpResponseCodes = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  RATE_LIMIT: 429,
} as const;

/**
 * Throws the HttpError subclass matching a non-200 status. Runs before the
 * body is read so error pages are never parsed as data.
 */
export function raiseForStatus(response: Response): void {
  const { status } = response;

  if (status === HttpResponseCodes.OK) return;
  if (status === HttpResponseCodes.BAD_REQUEST) throw new BadRequestError(response);
  if (status === HttpResponseCodes.NOT_FOUND) throw new NotFoundError(response);
  if (status === HttpResponseCodes.RATE_LIMIT) throw new RateLimitError(response);
  if (status >= 400 && status < 500) throw new ClientRequestError(response);
  if (status >= 500 && status < 600) throw new ServerError(response);
  throw new HttpError(response);
}
