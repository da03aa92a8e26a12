/**
 * Error types for output definition construction and output checking
 *
 * Every failure in this package is deterministic: the same schema and
 * the same tensors always fail the same way, so none of these errors is
 * retried by callers.
 */

export type OutputDefErrorCode =
  | "CONSTRUCTION_INVARIANT"
  | "OPERATION_ALREADY_APPLIED"
  | "UNSUPPORTED_OPERATION"
  | "SHAPE_MISMATCH"
  | "KEY_NOT_FOUND"
  | "SCHEMA_COLLISION"
  | "DECLARATION_INVALID";

/**
 * Base class for all output definition errors
 */
export abstract class OutputDefError extends Error {
  abstract readonly code: OutputDefErrorCode;

  constructor(message: string) {
    super(message);
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /** Structured context for logs and error envelopes */
  details(): Record<string, unknown> {
    return {};
  }
}

/**
 * A variable definition violates a structural rule.
 * `invariant` names the rule that failed (e.g. "c_differentiable_requires_r_differentiable").
 */
export class ConstructionInvariantError extends OutputDefError {
  readonly name = "ConstructionInvariantError";
  readonly code = "CONSTRUCTION_INVARIANT";

  constructor(
    message: string,
    public readonly variable: string,
    public readonly invariant: string
  ) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { variable: this.variable, invariant: this.invariant };
  }
}

/**
 * A reduction or derivative was applied to a variable that already
 * carries it the maximum number of times.
 */
export class OperationAlreadyAppliedError extends OutputDefError {
  readonly name = "OperationAlreadyAppliedError";
  readonly code = "OPERATION_ALREADY_APPLIED";

  constructor(
    message: string,
    public readonly variable: string,
    public readonly operation: string,
    public readonly category: number
  ) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { variable: this.variable, operation: this.operation, category: this.category };
  }
}

export class UnsupportedOperationError extends OutputDefError {
  readonly name = "UnsupportedOperationError";
  readonly code = "UNSUPPORTED_OPERATION";

  constructor(message: string, public readonly operation: number) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { operation: this.operation };
  }
}

/**
 * A produced tensor disagrees with its declared shape.
 *
 * kind "rank": the number of dimensions differs.
 * kind "content": same rank, different extents.
 */
export class ShapeMismatchError extends OutputDefError {
  readonly name = "ShapeMismatchError";
  readonly code = "SHAPE_MISMATCH";

  constructor(
    message: string,
    public readonly kind: "rank" | "content",
    public readonly actual: readonly number[],
    public readonly expected: readonly number[],
    public readonly variable?: string
  ) {
    super(message);
  }

  details(): Record<string, unknown> {
    return {
      kind: this.kind,
      actual: [...this.actual],
      expected: [...this.expected],
      ...(this.variable !== undefined ? { variable: this.variable } : {}),
    };
  }
}

/**
 * Lookup of a name that is not declared (scope "schema"), or a declared
 * output missing from a producer's result (scope "output").
 */
export class KeyNotFoundError extends OutputDefError {
  readonly name = "KeyNotFoundError";
  readonly code = "KEY_NOT_FOUND";

  constructor(
    message: string,
    public readonly key: string,
    public readonly scope: "schema" | "output"
  ) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { key: this.key, scope: this.scope };
  }
}

/**
 * Two derived sub-mappings produced the same name while merging a model schema.
 */
export class SchemaCollisionError extends OutputDefError {
  readonly name = "SchemaCollisionError";
  readonly code = "SCHEMA_COLLISION";

  constructor(message: string, public readonly key: string) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { key: this.key };
  }
}

export interface DeclarationIssue {
  path: string;
  message: string;
}

/**
 * A JSON output declaration failed schema validation.
 */
export class DeclarationParseError extends OutputDefError {
  readonly name = "DeclarationParseError";
  readonly code = "DECLARATION_INVALID";

  constructor(message: string, public readonly issues: DeclarationIssue[]) {
    super(message);
  }

  details(): Record<string, unknown> {
    return { issues: this.issues.map((issue) => ({ ...issue })) };
  }
}

export function isOutputDefError(error: unknown): error is OutputDefError {
  return error instanceof OutputDefError;
}
