/**
 * Names of derived output variables
 *
 * If a fitting output is called `foo`, the model exposes
 * `foo_redu` (reduced), `foo_derv_r` (coordinate derivative),
 * `foo_derv_c` (cell derivative), their magnetic twins
 * `foo_derv_r_mag` / `foo_derv_c_mag`, and the Hessian `foo_derv_r_derv_r`.
 */

export const REDUCE_SUFFIX = "_redu";
export const DERV_R_SUFFIX = "_derv_r";
export const DERV_C_SUFFIX = "_derv_c";
export const MAG_SUFFIX = "_mag";

export const MASK_NAME = "mask";
export const MASK_MAG_NAME = "mask_mag";

/**
 * Suffixes only derivation may produce. Longest first so the reported
 * match is the most specific one.
 */
export const RESERVED_SUFFIXES = [
  DERV_R_SUFFIX + DERV_R_SUFFIX,
  DERV_R_SUFFIX + MAG_SUFFIX,
  DERV_C_SUFFIX + MAG_SUFFIX,
  DERV_R_SUFFIX,
  DERV_C_SUFFIX,
  REDUCE_SUFFIX,
] as const;

export const RESERVED_NAMES: ReadonlySet<string> = new Set([MASK_NAME, MASK_MAG_NAME]);

export function getReduceName(name: string): string {
  return name + REDUCE_SUFFIX;
}

/** [coordinate derivative name, cell derivative name] */
export function getDerivName(name: string): [string, string] {
  return [name + DERV_R_SUFFIX, name + DERV_C_SUFFIX];
}

export function getDerivNameMag(name: string): [string, string] {
  return [name + DERV_R_SUFFIX + MAG_SUFFIX, name + DERV_C_SUFFIX + MAG_SUFFIX];
}

export function getHessianName(name: string): string {
  return name + DERV_R_SUFFIX + DERV_R_SUFFIX;
}

/**
 * The reserved suffix a name ends with, if any.
 */
export function findReservedSuffix(name: string): string | undefined {
  return RESERVED_SUFFIXES.find((suffix) => name.endsWith(suffix));
}
