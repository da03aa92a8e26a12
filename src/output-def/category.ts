/**
 * Output Variable Category Algebra
 *
 * A variable's category is the bit set of operations (reduction,
 * coordinate derivative, cell derivative...) applied to a base fitting
 * output to obtain it. Base outputs carry OUT (no bits).
 *
 * Transition rules:
 * - REDU and DERV_C may be applied at most once.
 * - DERV_R applied to a variable that already carries DERV_R becomes
 *   SEC_DERV_R (second derivative); a third application is rejected.
 *
 * @module output-def/category
 */

import { OperationAlreadyAppliedError, UnsupportedOperationError } from "./errors.js";

/**
 * Operations recorded in a category bit set
 */
export const OutputVariableOperation = {
  NONE: 0,
  /** Reduce over atoms (e.g. atomic energy → system energy) */
  REDU: 1,
  /** Negative derivative w.r.t. coordinates (e.g. force) */
  DERV_R: 2,
  /** Derivative w.r.t. the cell tensor (atomic virial) */
  DERV_C: 4,
  /** Second derivative w.r.t. coordinates; only reached by promotion of DERV_R */
  SEC_DERV_R: 8,
  /** Magnetic part of a derivative */
  MAG: 16,
} as const;

export type OutputVariableOperation =
  (typeof OutputVariableOperation)[keyof typeof OutputVariableOperation];

export type OperationName = keyof typeof OutputVariableOperation;

/**
 * Named categories a schema works with
 */
export const OutputVariableCategory = {
  /** Fitting output (e.g. atomic energy) */
  OUT: OutputVariableOperation.NONE,
  /** Reduced output (e.g. system energy) */
  REDU: OutputVariableOperation.REDU,
  /** Force */
  DERV_R: OutputVariableOperation.DERV_R,
  /** Atomic virial */
  DERV_C: OutputVariableOperation.DERV_C,
  /** System virial */
  DERV_C_REDU: OutputVariableOperation.DERV_C | OutputVariableOperation.REDU,
  /** Hessian */
  DERV_R_DERV_R: OutputVariableOperation.DERV_R | OutputVariableOperation.SEC_DERV_R,
  /** Magnetic force */
  DERV_R_MAG: OutputVariableOperation.DERV_R | OutputVariableOperation.MAG,
  /** Magnetic atomic virial */
  DERV_C_MAG: OutputVariableOperation.DERV_C | OutputVariableOperation.MAG,
} as const;

export type OutputVariableCategoryName = keyof typeof OutputVariableCategory;

/** Union of every known operation bit */
export const ALL_OPERATION_BITS = Object.values(OutputVariableOperation).reduce(
  (acc: number, bit: number) => acc | bit,
  0
);

/** Anything carrying a category; definitions and plain test doubles alike */
export interface Categorized {
  readonly name: string;
  readonly category: number;
}

const OPERATION_NAMES = new Map<number, OperationName>([
  [OutputVariableOperation.NONE, "NONE"],
  [OutputVariableOperation.REDU, "REDU"],
  [OutputVariableOperation.DERV_R, "DERV_R"],
  [OutputVariableOperation.DERV_C, "DERV_C"],
  [OutputVariableOperation.SEC_DERV_R, "SEC_DERV_R"],
  [OutputVariableOperation.MAG, "MAG"],
]);

export function operationName(op: number): string {
  return OPERATION_NAMES.get(op) ?? `UNKNOWN(${op})`;
}

/**
 * Check whether `op` has been applied to the variable.
 */
export function checkOperationApplied(varDef: Categorized, op: OutputVariableOperation): boolean {
  return (varDef.category & op) === op;
}

/**
 * Apply an operation and return the resulting category.
 *
 * @throws OperationAlreadyAppliedError if REDU or DERV_C is already set,
 *   or DERV_R has already been applied twice
 * @throws UnsupportedOperationError for any other operation
 */
export function applyOperation(varDef: Categorized, op: OutputVariableOperation): number {
  let applied: OutputVariableOperation = op;

  if (op === OutputVariableOperation.REDU || op === OutputVariableOperation.DERV_C) {
    if (checkOperationApplied(varDef, op)) {
      throw new OperationAlreadyAppliedError(
        `operation ${operationName(op)} has already been applied to "${varDef.name}"`,
        varDef.name,
        operationName(op),
        varDef.category
      );
    }
  } else if (op === OutputVariableOperation.DERV_R) {
    if (checkOperationApplied(varDef, OutputVariableOperation.DERV_R)) {
      applied = OutputVariableOperation.SEC_DERV_R;
      if (checkOperationApplied(varDef, OutputVariableOperation.SEC_DERV_R)) {
        throw new OperationAlreadyAppliedError(
          `operation ${operationName(op)} has been applied twice to "${varDef.name}"`,
          varDef.name,
          operationName(op),
          varDef.category
        );
      }
    }
  } else {
    throw new UnsupportedOperationError(`operation ${operationName(op)} not supported`, op);
  }

  return varDef.category | applied;
}

/**
 * True if the variable was obtained by any derivative.
 */
export function checkDeriv(varDef: Categorized): boolean {
  return (
    checkOperationApplied(varDef, OutputVariableOperation.DERV_R) ||
    checkOperationApplied(varDef, OutputVariableOperation.SEC_DERV_R) ||
    checkOperationApplied(varDef, OutputVariableOperation.DERV_C)
  );
}

const CATEGORY_NAMES = new Map<number, OutputVariableCategoryName>([
  [OutputVariableCategory.OUT, "OUT"],
  [OutputVariableCategory.REDU, "REDU"],
  [OutputVariableCategory.DERV_R, "DERV_R"],
  [OutputVariableCategory.DERV_C, "DERV_C"],
  [OutputVariableCategory.DERV_C_REDU, "DERV_C_REDU"],
  [OutputVariableCategory.DERV_R_DERV_R, "DERV_R_DERV_R"],
  [OutputVariableCategory.DERV_R_MAG, "DERV_R_MAG"],
  [OutputVariableCategory.DERV_C_MAG, "DERV_C_MAG"],
]);

/**
 * Name of a category, or undefined for a bit combination with no name.
 */
export function describeCategory(category: number): OutputVariableCategoryName | undefined {
  return CATEGORY_NAMES.get(category);
}
