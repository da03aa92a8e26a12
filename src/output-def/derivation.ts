/**
 * Derivation rules
 *
 * Pure functions turning a mapping of output variable definitions into
 * the mappings of reduced, differentiated and mask variables a model
 * exposes. Inputs are never mutated; iteration order of the input is
 * preserved in the outputs.
 *
 * @module output-def/derivation
 */

import { applyOperation, OutputVariableCategory, OutputVariableOperation } from "./category.js";
import { getDerivName, getDerivNameMag, getReduceName, MASK_MAG_NAME, MASK_NAME } from "./naming.js";
import { OutputVariableDef } from "./variable-def.js";

export type VariableDefMap = ReadonlyMap<string, OutputVariableDef>;

/** Extent appended by a coordinate derivative (x, y, z) */
export const DERV_R_DIM = 3;
/** Extent appended by a cell derivative (flattened 3x3 tensor) */
export const DERV_C_DIM = 9;

/**
 * Reduce every reducible variable to a per-frame quantity.
 */
export function doReduce(defs: VariableDefMap): Map<string, OutputVariableDef> {
  const redu = new Map<string, OutputVariableDef>();
  for (const [name, def] of defs) {
    if (!def.reducible) continue;
    const reduName = getReduceName(name);
    redu.set(
      reduName,
      new OutputVariableDef({
        name: reduName,
        shape: def.shape,
        reducible: false,
        rDifferentiable: false,
        cDifferentiable: false,
        atomic: false,
        category: applyOperation(def, OutputVariableOperation.REDU),
      })
    );
  }
  return redu;
}

/**
 * Differentiate w.r.t. coordinates and cell tensor.
 *
 * Returns [coordinate derivatives, cell derivatives]. The magnetic cell
 * derivative (`*_derv_c_mag`) lands in the coordinate-derivative mapping.
 *
 * A coordinate derivative is itself r-differentiable only when its source
 * requested a Hessian and is a fitting output (category OUT), so feeding
 * the first mapping back in yields the Hessian and stops there.
 */
export function doDerivative(
  defs: VariableDefMap
): [Map<string, OutputVariableDef>, Map<string, OutputVariableDef>] {
  const dervR = new Map<string, OutputVariableDef>();
  const dervC = new Map<string, OutputVariableDef>();

  for (const [name, def] of defs) {
    const [rName, cName] = getDerivName(name);
    const [rNameMag, cNameMag] = getDerivNameMag(name);

    if (def.rDifferentiable) {
      const hessianNext = def.rHessian && def.category === OutputVariableCategory.OUT;
      const category = applyOperation(def, OutputVariableOperation.DERV_R);
      const shape = [...def.shape, DERV_R_DIM];

      dervR.set(
        rName,
        new OutputVariableDef({
          name: rName,
          shape,
          reducible: false,
          rDifferentiable: hessianNext,
          cDifferentiable: false,
          atomic: true,
          category,
        })
      );
      if (def.magnetic) {
        dervR.set(
          rNameMag,
          new OutputVariableDef({
            name: rNameMag,
            shape,
            reducible: false,
            rDifferentiable: hessianNext,
            cDifferentiable: false,
            atomic: true,
            category,
            magnetic: true,
          })
        );
      }
    }

    if (def.cDifferentiable) {
      const category = applyOperation(def, OutputVariableOperation.DERV_C);
      const shape = [...def.shape, DERV_C_DIM];

      dervC.set(
        cName,
        new OutputVariableDef({
          name: cName,
          shape,
          reducible: true,
          rDifferentiable: false,
          cDifferentiable: false,
          atomic: true,
          category,
        })
      );
      if (def.magnetic) {
        dervR.set(
          cNameMag,
          new OutputVariableDef({
            name: cNameMag,
            shape,
            reducible: true,
            rDifferentiable: false,
            cDifferentiable: false,
            atomic: true,
            category,
            magnetic: true,
          })
        );
      }
    }
  }

  return [dervR, dervC];
}

/**
 * Per-atom validity masks used by evaluation consumers.
 * `mask_mag` is added only when some variable is magnetic.
 */
export function doMask(defs: VariableDefMap): Map<string, OutputVariableDef> {
  const mask = new Map<string, OutputVariableDef>();
  mask.set(MASK_NAME, maskDef(MASK_NAME));
  for (const def of defs.values()) {
    if (def.magnetic) {
      mask.set(MASK_MAG_NAME, maskDef(MASK_MAG_NAME));
      break;
    }
  }
  return mask;
}

function maskDef(name: string): OutputVariableDef {
  return new OutputVariableDef({
    name,
    shape: [1],
    reducible: false,
    rDifferentiable: false,
    cDifferentiable: false,
  });
}
