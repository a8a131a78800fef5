/**
 * Maps student errors to HTTP responses.
 *
 * Responses carry the error message as plain text. Anything that is not a
 * StudentError is logged and reported as a 500 with a generic message.
 */

import { ErrorRequestHandler, Response } from "express";
import { StudentErrorKind, isStudentError } from "../domain/errors";

export const STATUS_BY_KIND: Record<StudentErrorKind, number> = {
  validation: 400,
  not_found: 404,
  precondition_failed: 412,
  constraint_violation: 409,
};

export function sendError(res: Response, error: unknown, fallbackMessage: string): void {
  if (isStudentError(error)) {
    res.status(STATUS_BY_KIND[error.kind]).type("text/plain").send(error.message);
    return;
  }

  console.error(`${fallbackMessage}:`, error);
  res.status(500).type("text/plain").send(fallbackMessage);
}

interface HttpClientError extends Error {
  status: number;
}

// body-parser and friends reject requests with a 4xx `status` on the error
function isHttpClientError(error: unknown): error is HttpClientError {
  return (
    error instanceof Error &&
    "status" in error &&
    typeof error.status === "number" &&
    error.status >= 400 &&
    error.status < 500
  );
}

/**
 * Last middleware in the app: failures raised before a route runs
 * (malformed JSON, oversized bodies) get the same plain-text treatment.
 */
export const handleRequestError: ErrorRequestHandler = (error, req, res, next) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  if (isHttpClientError(error)) {
    res.status(error.status).type("text/plain").send(`Invalid request: ${error.message}`);
    return;
  }

  sendError(res, error, "Failed to process request");
};
