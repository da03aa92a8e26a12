/**
 * Output Variable Definition
 *
 * Describes one output quantity of a fitting network or model: its
 * per-atom (or per-frame) shape, and whether it is reduced over atoms and
 * differentiated w.r.t. coordinates / cell tensor.
 *
 * Shapes exclude the leading frame and atom dimensions. Energy is [1],
 * dipole [3], polarizability [3, 3]. A -1 marks a dimension whose extent
 * is not fixed by the definition (e.g. number of DOS grid points); it is
 * normally the last one, and stays in place when derivatives append
 * dimensions after it.
 *
 * @module output-def/variable-def
 */

import { ALL_OPERATION_BITS, OutputVariableCategory } from "./category.js";
import { ConstructionInvariantError } from "./errors.js";

/** Marks a dimension as unconstrained */
export const WILDCARD_DIM = -1;

export interface OutputVariableDefOptions {
  /** Unique within a schema. Derived suffixes (`_redu`, `_derv_r`, ...) are reserved. */
  name: string;
  shape: readonly number[];
  /** Summed over atoms into a per-frame quantity */
  reducible?: boolean;
  /** Negative derivative w.r.t. coordinates is computed (e.g. force) */
  rDifferentiable?: boolean;
  /** Derivative w.r.t. the cell tensor is computed (atomic virial) */
  cDifferentiable?: boolean;
  /** Defined for each atom. Defaults to true. */
  atomic?: boolean;
  category?: number;
  /** Hessian w.r.t. coordinates is computed */
  rHessian?: boolean;
  /** Derivatives have magnetic parts */
  magnetic?: boolean;
  /** The reduced quantity does not scale with system size */
  intensive?: boolean;
}

export class OutputVariableDef {
  readonly name: string;
  readonly shape: readonly number[];
  readonly reducible: boolean;
  readonly rDifferentiable: boolean;
  readonly cDifferentiable: boolean;
  readonly atomic: boolean;
  readonly category: number;
  readonly rHessian: boolean;
  readonly magnetic: boolean;
  readonly intensive: boolean;
  private readonly outputSize: number;

  constructor(options: OutputVariableDefOptions) {
    this.name = options.name;
    this.shape = Object.freeze([...options.shape]);
    this.reducible = options.reducible ?? false;
    this.rDifferentiable = options.rDifferentiable ?? false;
    this.cDifferentiable = options.cDifferentiable ?? false;
    this.atomic = options.atomic ?? true;
    this.category = options.category ?? OutputVariableCategory.OUT;
    this.rHessian = options.rHessian ?? false;
    this.magnetic = options.magnetic ?? false;
    this.intensive = options.intensive ?? false;

    this.validate();
    this.outputSize = computeSize(this.shape);
    Object.freeze(this);
  }

  /**
   * Number of elements per atom (or per frame for non-atomic variables).
   * -1 when any dimension is a wildcard.
   */
  get size(): number {
    return this.outputSize;
  }

  get hasWildcard(): boolean {
    return this.shape.includes(WILDCARD_DIM);
  }

  /**
   * Remove a unit dimension. Negative `dim` counts from the end.
   * Returns an equivalent definition when `dim` is out of range or the
   * dimension is not 1.
   */
  squeeze(dim: number): OutputVariableDef {
    const rank = this.shape.length;
    if (dim < -rank || dim >= rank) {
      return this;
    }
    const index = dim < 0 ? rank + dim : dim;
    if (this.shape[index] !== 1) {
      return this;
    }
    return new OutputVariableDef({
      ...this.toOptions(),
      shape: this.shape.filter((_, i) => i !== index),
    });
  }

  toOptions(): OutputVariableDefOptions {
    return {
      name: this.name,
      shape: this.shape,
      reducible: this.reducible,
      rDifferentiable: this.rDifferentiable,
      cDifferentiable: this.cDifferentiable,
      atomic: this.atomic,
      category: this.category,
      rHessian: this.rHessian,
      magnetic: this.magnetic,
      intensive: this.intensive,
    };
  }

  private validate(): void {
    if (this.name.length === 0) {
      this.fail("name must not be empty", "non_empty_name");
    }

    this.shape.forEach((dim, i) => {
      if (!Number.isInteger(dim)) {
        this.fail(`shape entry ${i} (${dim}) is not an integer`, "integer_shape");
      }
      if (dim < 0 && dim !== WILDCARD_DIM) {
        this.fail(`shape entry ${i} (${dim}) is negative`, "non_negative_shape");
      }
    });

    if (!Number.isInteger(this.category) || this.category < 0 || (this.category & ~ALL_OPERATION_BITS) !== 0) {
      this.fail(`category ${this.category} contains unknown operation bits`, "known_category_bits");
    }

    if (this.cDifferentiable && !this.rDifferentiable) {
      this.fail("c differentiable requires r_differentiable", "c_differentiable_requires_r_differentiable");
    }
    if (this.reducible && !this.atomic) {
      this.fail("a reducible variable should be atomic", "reducible_requires_atomic");
    }
    if (this.intensive && !this.reducible) {
      this.fail("an intensive variable should be reducible", "intensive_requires_reducible");
    }
    if (this.rHessian) {
      if (!this.reducible) {
        this.fail("only reducible variable can calculate hessian", "hessian_requires_reducible");
      }
      if (!this.rDifferentiable) {
        this.fail("only r_differentiable variable can calculate hessian", "hessian_requires_r_differentiable");
      }
    }
  }

  private fail(reason: string, invariant: string): never {
    throw new ConstructionInvariantError(`Output variable "${this.name}": ${reason}`, this.name, invariant);
  }
}

function computeSize(shape: readonly number[]): number {
  let size = 1;
  for (const dim of shape) {
    if (dim === WILDCARD_DIM) {
      return WILDCARD_DIM;
    }
    size *= dim;
  }
  return size;
}
