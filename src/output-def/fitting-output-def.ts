/**
 * Fitting Output Definition
 *
 * The outputs a fitting network declares, one definition per per-atom
 * quantity, in declaration order.
 *
 * @module output-def/fitting-output-def
 */

import { ConstructionInvariantError, KeyNotFoundError } from "./errors.js";
import { findReservedSuffix, RESERVED_NAMES } from "./naming.js";
import type { VariableDefMap } from "./derivation.js";
import type { OutputVariableDef } from "./variable-def.js";

export class FittingOutputDef {
  private readonly varDefs: Map<string, OutputVariableDef>;

  /**
   * Duplicate names: the last definition wins.
   *
   * @throws ConstructionInvariantError if a name is reserved for derived outputs
   */
  constructor(varDefs: readonly OutputVariableDef[]) {
    this.varDefs = new Map();
    for (const def of varDefs) {
      assertDeclarableName(def.name);
      this.varDefs.set(def.name, def);
    }
    Object.freeze(this);
  }

  /**
   * @throws KeyNotFoundError if `key` is not declared
   */
  get(key: string): OutputVariableDef {
    const def = this.varDefs.get(key);
    if (def === undefined) {
      throw new KeyNotFoundError(`Fitting output "${key}" is not defined`, key, "schema");
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

  get size(): number {
    return this.varDefs.size;
  }

  [Symbol.iterator](): IterableIterator<[string, OutputVariableDef]> {
    return this.varDefs.entries();
  }
}

function assertDeclarableName(name: string): void {
  if (RESERVED_NAMES.has(name)) {
    throw new ConstructionInvariantError(
      `Output variable "${name}": name is reserved for auxiliary model outputs`,
      name,
      "reserved_name"
    );
  }
  const suffix = findReservedSuffix(name);
  if (suffix !== undefined) {
    throw new ConstructionInvariantError(
      `Output variable "${name}": suffix "${suffix}" is reserved for derived outputs`,
      name,
      "reserved_suffix"
    );
  }
}
