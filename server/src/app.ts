import path from "node:path";
import express, { NextFunction, Request, Response } from "express";
import compression from "compression"; // compresses requests
import cors from "cors";
import errorHandler from "errorhandler";
import * as Sentry from "@sentry/node";
import * as Tracing from "@sentry/tracing";
import { getPort, RELEASE } from "./config";
import {
  authorizeRequest,
  cacheControlMaxAge,
  logRequest,
  parseJsonBody,
  requireAuthorization,
} from "./middleware";
import { datadogMiddleware } from "./datadog";
import { ApiError, ErrorJson } from "./exceptions";
import { logger, logStackTrace } from "./logger";
import * as apiAddress from "./api/address";

/**
 * Get the HTTP status an error should be reported with, if it has one. This
 * covers our own errors and errors from middleware like body-parser.
 */
function getErrorStatus(error: unknown): number | undefined {
  if (error instanceof ApiError) return error.httpStatus;
  if (typeof error !== "object" || error === null) return undefined;

  for (const key of ["status", "statusCode"]) {
    const value = key in error ? Reflect.get(error, key) : undefined;
    const status = parseInt(String(value), 10);
    if (status >= 400 && status < 600) return status;
  }
  return undefined;
}

function formatError(error: unknown): ErrorJson {
  if (error instanceof ApiError) return error.toJson();

  const message = error instanceof Error ? error.message : String(error);
  return { message, code: "bad_request" };
}

// Express configuration -----------------------------------------

const app = express();
app.set("port", getPort());
// We are usually behind a load balancer that sets reverse-proxy headers.
app.enable("trust proxy");
// Don't advertise that we are Express-based in case someone is scanning for
// servers with exploitable vulnerabilities.
app.disable("x-powered-by");

Sentry.init({
  // Sentry's session tracking keeps the process running, which causes tests to
  // hang. We don't really need session tracking, so turn it off.
  autoSessionTracking: false,
  ignoreTransactions: ["/health", "/debugme"],
  integrations: [
    new Sentry.Integrations.Http({ tracing: true }),
    new Tracing.Integrations.Express({ app }),
  ],
  release: RELEASE,
});

// Middleware ----------------------------------------------------

app.use(Sentry.Handlers.requestHandler());
app.use(Sentry.Handlers.tracingHandler());
app.use(logRequest);
app.use(datadogMiddleware);
app.use(compression());
app.use(parseJsonBody({ limit: "100kb" }));
app.use(cors());
app.use(authorizeRequest);

// Diagnostic Routes ---------------------------------------------

app.get("/health", (req: Request, res: Response) => {
  res.status(200).send("OK!");
});

if (app.get("env") !== "production") {
  // Use this route to test error handlers.
  app.get("/debugme", (_req: Request, _res: Response) => {
    throw new Error("This is an error from a route handler");
  });
}

// Web page ------------------------------------------------------

const longCacheTime = 60 * 10;
app.use("/", cacheControlMaxAge(longCacheTime));
app.use(express.static(path.join(__dirname, "..", "public")));

// API -----------------------------------------------------------

app.post("/api/parse", requireAuthorization, apiAddress.parse);
app.post("/api/standardize", apiAddress.standardizeRequest);

// Send unhandled errors to Sentry.io
app.use(Sentry.Handlers.errorHandler());

// In development mode, provide nice stack traces to users
if (app.get("env") === "development") {
  app.use(errorHandler());
} else {
  app.use(
    (error: unknown, req: Request, res: Response, _next: NextFunction) => {
      const statusCode = getErrorStatus(error);

      if (statusCode) {
        if (statusCode >= 500) logStackTrace(logger, error);
        res.status(statusCode).json({ error: formatError(error) });
      } else {
        logStackTrace(logger, error);
        res.status(500).json({
          error: { message: "Unknown error", code: "unknown_error" },
        });
      }
    }
  );
}

app.use(function (req: Request, res: Response, next: NextFunction) {
  if (req.accepts("json")) {
    res.status(404).json({
      error: { message: "Not Found", code: "not_found" },
    });
  } else {
    next();
  }
});

export default app;
