import { BaseError } from "address-standardizer-common";

type ErrorDetails = Record<string, unknown>;

/** The `error` field of an error response body. */
export interface ErrorJson {
  message: string;
  code?: string;
  [key: string]: unknown;
}

/**
 * Error that is safe to surface externally (i.e. in an HTTP response).
 */
export class ApiError extends BaseError {
  httpStatus = 500;
  code?: string;
  extra: ErrorDetails;

  constructor(
    message: string,
    { code, ...extra }: { code?: string } & ErrorDetails = {}
  ) {
    super(message);
    this.extra = extra;
    if (code) this.code = code;
  }

  /**
   * Format the error as a JSON-stringifiable object.
   */
  toJson(): ErrorJson {
    return {
      ...this.extra,
      message: this.message,
      code: this.code,
    };
  }
}

/**
 * A request was missing required data or was otherwise unusable.
 */
export class BadRequestError extends ApiError {
  httpStatus = 400;
  code = "bad_request";
}

/**
 * A request did not identify who made it.
 */
export class AuthenticationError extends ApiError {
  httpStatus = 401;
  code = "not_authenticated";
}

/**
 * An action is not permitted for the current user.
 */
export class AuthorizationError extends ApiError {
  httpStatus = 403;
  code = "not_authorized";
}

/**
 * Input data was incorrectly formatted or otherwise invalid.
 */
export class ValueError extends ApiError {
  httpStatus = 422;
  code = "value_error";
}
