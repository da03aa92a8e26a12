/**
 * Shape Validator
 *
 * Checks produced tensors against their output variable definitions.
 *
 * Leading dimensions are not part of a definition's shape:
 * - atomic variables:     [nframes, nloc, ...shape]
 * - non-atomic variables: [nframes, ...shape]
 *
 * @module validators/shape-validator
 */

import { ShapeMismatchError } from "../output-def/errors.js";
import { WILDCARD_DIM, type OutputVariableDef } from "../output-def/variable-def.js";

/**
 * Anything exposing a shape (backend tensors, typed array wrappers, test doubles)
 */
export interface ShapedTensor {
  readonly shape: readonly number[];
}

export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(", ")}]`;
}

function dimMatches(actual: number, expected: number): boolean {
  return expected === WILDCARD_DIM || actual === expected;
}

/**
 * Check a shape against a defined shape. A -1 in the definition accepts
 * any extent at that position (normally the last dimension).
 *
 * @throws ShapeMismatchError kind "rank" when lengths differ, "content" otherwise
 */
export function checkShape(
  shape: readonly number[],
  defShape: readonly number[],
  variable?: string
): void {
  if (shape.length !== defShape.length) {
    throw new ShapeMismatchError(
      `${formatShape(shape)} rank not matching def ${formatShape(defShape)}`,
      "rank",
      shape,
      defShape,
      variable
    );
  }

  if (!shape.every((dim, i) => dimMatches(dim, defShape[i]))) {
    throw new ShapeMismatchError(
      `${formatShape(shape)} shape not matching def ${formatShape(defShape)}`,
      "content",
      shape,
      defShape,
      variable
    );
  }
}

/**
 * Number of leading (frame / atom) dimensions a tensor of this variable carries.
 */
export function leadingDims(varDef: OutputVariableDef): number {
  return varDef.atomic ? 2 : 1;
}

/**
 * Check a tensor against its variable definition.
 *
 * @throws ShapeMismatchError kind "rank" when the tensor has the wrong
 *   number of dimensions, kind "content" when extents differ
 */
export function checkVar(tensor: ShapedTensor, varDef: OutputVariableDef): void {
  const lead = leadingDims(varDef);
  const tail = tensor.shape.slice(lead);

  if (tensor.shape.length !== varDef.shape.length + lead) {
    throw new ShapeMismatchError(
      `${varDef.name}: ${formatShape(tail)} length not matching def ${formatShape(varDef.shape)}`,
      "rank",
      tensor.shape,
      varDef.shape,
      varDef.name
    );
  }

  checkShape(tail, varDef.shape, varDef.name);
}
