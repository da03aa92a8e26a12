/**
 * Zod Error Mapper
 *
 * Converts Zod validation errors into declaration issues with readable
 * paths, for reporting malformed output declarations.
 *
 * @module validators/zod-error-mapper
 */

import type { ZodError, ZodIssue } from "zod";
import type { DeclarationIssue } from "../output-def/errors.js";

/**
 * Convert Zod path to a JSON pointer-style string.
 * e.g., ["var_defs", 0, "shape"] → "var_defs[0].shape"
 */
export function formatZodPath(path: readonly (string | number)[]): string {
  return path.reduce<string>((acc, segment, index) => {
    if (typeof segment === "number") {
      return `${acc}[${segment}]`;
    }
    return index === 0 ? segment : `${acc}.${segment}`;
  }, "");
}

/**
 * Short, readable message for a Zod issue.
 */
function describeIssue(issue: ZodIssue, path: string): string {
  const location = path ? ` at ${path}` : "";

  switch (issue.code) {
    case "invalid_type":
      return `Expected ${issue.expected}, received ${issue.received}${location}`;

    case "too_small":
      if (issue.type === "array") {
        return `Array${location} must have at least ${issue.minimum} items`;
      }
      if (issue.type === "number") {
        return `Number${location} must be at least ${issue.minimum}`;
      }
      if (issue.type === "string") {
        return `String${location} must be at least ${issue.minimum} characters`;
      }
      return `Value${location} is too small (minimum: ${issue.minimum})`;

    case "unrecognized_keys":
      return `Unrecognized keys${location}: ${issue.keys.slice(0, 3).join(", ")}`;

    default:
      return issue.message || `Validation error${location}`;
  }
}

/**
 * Convert a ZodError to declaration issues, one per Zod issue.
 */
export function zodToDeclarationIssues(zodError: ZodError): DeclarationIssue[] {
  return zodError.issues.map((issue) => {
    const path = formatZodPath(issue.path);
    return { path, message: describeIssue(issue, path) };
  });
}
