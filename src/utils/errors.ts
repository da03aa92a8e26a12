import { ZodError } from "zod";
import { isOutputDefError, type OutputDefErrorCode } from "../output-def/errors.js";

/**
 * Error codes for structured error responses
 */
export type ErrorCode = OutputDefErrorCode | "BAD_INPUT" | "INTERNAL";

/**
 * Structured error envelope (error.v1 schema)
 */
export interface ErrorV1 {
  schema: "error.v1";
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

/**
 * Build a structured error envelope
 */
export function buildErrorV1(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>
): ErrorV1 {
  const error: ErrorV1 = {
    schema: "error.v1",
    code,
    message,
  };

  if (details && Object.keys(details).length > 0) {
    error.details = details;
  }

  return error;
}

/**
 * Convert Zod validation error to ErrorV1
 */
export function zodErrorToErrorV1(error: ZodError): ErrorV1 {
  return buildErrorV1("BAD_INPUT", "Validation failed", {
    validation_errors: error.flatten(),
  });
}

/**
 * Convert any thrown value to ErrorV1 (never includes a stack)
 */
export function toErrorV1(error: unknown): ErrorV1 {
  if (isOutputDefError(error)) {
    return buildErrorV1(error.code, error.message, error.details());
  }

  if (error instanceof ZodError) {
    return zodErrorToErrorV1(error);
  }

  if (error instanceof Error) {
    return buildErrorV1("INTERNAL", error.message || "An unexpected error occurred");
  }

  if (typeof error === "string") {
    return buildErrorV1("INTERNAL", error);
  }

  return buildErrorV1("INTERNAL", "An unexpected error occurred");
}
