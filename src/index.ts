export * from "./output-def/index.js";
export * from "./validators/index.js";
export {
  OutputVariableDeclaration,
  FittingOutputDeclaration,
  parseFittingOutputDef,
  variableDefFromDeclaration,
  serializeVariableDef,
  serializeFittingOutputDef,
  type OutputVariableDeclarationT,
  type FittingOutputDeclarationT,
} from "./schemas/output-def.js";
export { toErrorV1, buildErrorV1, type ErrorV1, type ErrorCode } from "./utils/errors.js";
export { config, getConfig, type Config } from "./config/index.js";
export { log, setTestSink, TelemetryEvents, type TelemetryEvent } from "./utils/telemetry.js";
