/**
 * Output definition module
 *
 * Variable definitions, the category algebra, derivation rules and the
 * fitting / model output definitions built from them.
 */

export {
  OutputVariableOperation,
  OutputVariableCategory,
  ALL_OPERATION_BITS,
  applyOperation,
  checkOperationApplied,
  checkDeriv,
  describeCategory,
  operationName,
  type OperationName,
  type OutputVariableCategoryName,
  type Categorized,
} from "./category.js";

export {
  OutputVariableDef,
  WILDCARD_DIM,
  type OutputVariableDefOptions,
} from "./variable-def.js";

export {
  doReduce,
  doDerivative,
  doMask,
  DERV_R_DIM,
  DERV_C_DIM,
  type VariableDefMap,
} from "./derivation.js";

export { FittingOutputDef } from "./fitting-output-def.js";
export { ModelOutputDef, mergeOrdered } from "./model-output-def.js";

export {
  getReduceName,
  getDerivName,
  getDerivNameMag,
  getHessianName,
  findReservedSuffix,
  RESERVED_SUFFIXES,
  RESERVED_NAMES,
  MASK_NAME,
  MASK_MAG_NAME,
} from "./naming.js";

export {
  energyFittingOutput,
  dipoleFittingOutput,
  dosFittingOutput,
  propertyFittingOutput,
  type EnergyFittingOptions,
  type DipoleFittingOptions,
  type PropertyFittingOptions,
} from "./presets.js";

export {
  OutputDefError,
  ConstructionInvariantError,
  OperationAlreadyAppliedError,
  UnsupportedOperationError,
  ShapeMismatchError,
  KeyNotFoundError,
  SchemaCollisionError,
  DeclarationParseError,
  isOutputDefError,
  type OutputDefErrorCode,
  type DeclarationIssue,
} from "./errors.js";
