export {
  createPositionMarker,
  locateIdentifier,
  type PositionMarker,
} from "./position.js";

export {
  undefinedVariableViolation,
  fatalViolation,
  hasFatalViolation,
  type TemplaterViolation,
  type ViolationCode,
} from "./violation.js";
