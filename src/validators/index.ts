/**
 * Validators module
 *
 * Shape checks for produced tensors and the output-checking wrappers
 * built on them.
 */

export {
  checkShape,
  checkVar,
  formatShape,
  leadingDims,
  type ShapedTensor,
} from "./shape-validator.js";

export {
  ModelOutputChecker,
  FittingOutputChecker,
  modelCheckOutput,
  fittingCheckOutput,
  type OutputMap,
  type OutputProducer,
  type OutputCheckOptions,
} from "./output-check.js";

export {
  zodToDeclarationIssues,
  formatZodPath,
} from "./zod-error-mapper.js";
