import { Response, Request, NextFunction } from "express";
import bodyParser from "body-parser";
import { getApiKeys } from "./config";
import { AuthenticationError, AuthorizationError } from "./exceptions";
import { logger } from "./logger";

export interface AppRequest extends Request {
  authorization?: string | null;
  bodyByteLength?: number;
}

const API_KEYS = getApiKeys();

export function authorizeRequest(
  req: AppRequest,
  res: Response,
  next: NextFunction
): void {
  req.authorization = null;
  const key = req.get("x-api-key");
  if (key && API_KEYS.includes(key)) {
    req.authorization = key;
  }
  return next();
}

/**
 * Reject requests that don't have a valid API key. Must be used after
 * `authorizeRequest`.
 */
export function requireAuthorization(
  req: AppRequest,
  res: Response,
  next: NextFunction
): void {
  if (!req.get("x-api-key")) {
    throw new AuthenticationError("An API key is required (x-api-key header)");
  } else if (!req.authorization) {
    throw new AuthorizationError("Invalid API key");
  }
  next();
}

/**
 * A JSON body parsing middleware that also records the raw size of the request
 * body as `request.bodyByteLength`.
 */
export function parseJsonBody(
  options: bodyParser.OptionsJson
): ReturnType<typeof bodyParser.json> {
  return bodyParser.json({
    ...options,

    // `verify` is a convenient callback to get the decoded/decompressed body
    // before parsing, so this wraps whatever `verify` function may have been
    // passed in and uses it to count bytes.
    verify(
      request: AppRequest,
      response: Response,
      buffer: Buffer,
      encoding: string
    ) {
      request.bodyByteLength = buffer.byteLength || buffer.length;
      if (options.verify) {
        options.verify(request, response, buffer, encoding);
      }
    },
  });
}

/**
 * Set the Cache-Control HTTP response header's max-age directive to the given
 * number of seconds.
 */
export function cacheControlMaxAge(seconds: number) {
  return function (
    request: AppRequest,
    response: Response,
    next: NextFunction
  ): void {
    if (request.method == "GET") {
      const directives = [
        request.authorization ? "private" : "public",
        `max-age=${seconds}`,
      ];
      response.set("Cache-Control", directives.join(", "));
    }
    next();
  };
}

/**
 * Log basic info about the request at DEBUG level once it has been answered.
 */
export function logRequest(
  request: AppRequest,
  response: Response,
  next: NextFunction
): void {
  response.on("finish", () => {
    const size = request.bodyByteLength
      ? ` (${request.bodyByteLength} bytes)`
      : "";
    logger.debug(
      `${response.statusCode} ${request.method} ${request.originalUrl}${size}`
    );
  });
  next();
}
