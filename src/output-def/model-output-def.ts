/**
 * Model Output Definition
 *
 * Expands a fitting output definition into everything a model exposes:
 *
 *   foo                 fitting output          (e.g. atomic energy)
 *   foo_redu            reduced                 (energy)
 *   foo_derv_r          coordinate derivative   (force)
 *   foo_derv_c          cell derivative         (atomic virial)
 *   foo_derv_c_redu     reduced cell derivative (virial)
 *   foo_derv_r_derv_r   second derivative       (Hessian, when requested)
 *   mask, mask_mag      per-atom validity masks
 *
 * The expansion runs once, in the constructor. The result is frozen.
 *
 * @module output-def/model-output-def
 */

import { log } from "../utils/telemetry.js";
import { doDerivative, doMask, doReduce, type VariableDefMap } from "./derivation.js";
import { KeyNotFoundError, SchemaCollisionError } from "./errors.js";
import type { FittingOutputDef } from "./fitting-output-def.js";
import type { OutputVariableDef } from "./variable-def.js";

export class ModelOutputDef {
  readonly defOutp: FittingOutputDef;
  readonly defRedu: VariableDefMap;
  readonly defDervR: VariableDefMap;
  readonly defDervC: VariableDefMap;
  readonly defHessR: VariableDefMap;
  readonly defDervCRedu: VariableDefMap;
  readonly defMask: VariableDefMap;
  private readonly varDefs: Map<string, OutputVariableDef>;

  constructor(fitDefs: FittingOutputDef) {
    this.defOutp = fitDefs;
    this.defRedu = doReduce(fitDefs.getData());
    const [dervR, dervC] = doDerivative(fitDefs.getData());
    this.defDervR = dervR;
    this.defDervC = dervC;
    this.defHessR = doDerivative(this.defDervR)[0];
    this.defDervCRedu = doReduce(this.defDervC);
    this.defMask = doMask(fitDefs.getData());

    this.varDefs = mergeOrdered([
      fitDefs.getData(),
      this.defRedu,
      this.defDervC,
      this.defDervR,
      this.defDervCRedu,
      this.defHessR,
      this.defMask,
    ]);
    Object.freeze(this);

    log.debug(
      {
        outputs: fitDefs.keys(),
        total: this.varDefs.size,
        hessian: this.defHessR.size > 0,
      },
      "Model output definition built"
    );
  }

  /**
   * @throws KeyNotFoundError if `key` is neither declared nor derived
   */
  get(key: string): OutputVariableDef {
    const def = this.varDefs.get(key);
    if (def === undefined) {
      throw new KeyNotFoundError(`Model output "${key}" is not defined`, key, "schema");
    }
    return def;
  }

  has(key: string): boolean {
    return this.varDefs.has(key);
  }

  getData(): VariableDefMap {
    return this.varDefs;
  }

  keys(): string[] {
    return [...this.varDefs.keys()];
  }

  keysOutp(): string[] {
    return this.defOutp.keys();
  }

  keysRedu(): string[] {
    return [...this.defRedu.keys()];
  }

  keysDervR(): string[] {
    return [...this.defDervR.keys()];
  }

  keysHessR(): string[] {
    return [...this.defHessR.keys()];
  }

  keysDervC(): string[] {
    return [...this.defDervC.keys()];
  }

  keysDervCRedu(): string[] {
    return [...this.defDervCRedu.keys()];
  }
}

/**
 * Merge sub-mappings in order. A name produced twice is an error, never
 * an overwrite.
 */
export function mergeOrdered(parts: readonly VariableDefMap[]): Map<string, OutputVariableDef> {
  const merged = new Map<string, OutputVariableDef>();
  for (const part of parts) {
    for (const [name, def] of part) {
      if (merged.has(name)) {
        throw new SchemaCollisionError(`Output variable "${name}" is defined more than once`, name);
      }
      merged.set(name, def);
    }
  }
  return merged;
}
