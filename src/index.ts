export {
  annotate,
  getArgsAndReturnType,
  getType,
  type GetTypeOptions,
  instanceOf,
  isSubclassOfPlain,
  registeredSignature,
  subclassOf,
} from "./algebra.js";
export {
  configure,
  type EngineConfig,
  EngineConfigSchema,
  getConfig,
  loadConfig,
  LogLevelSchema,
  resetConfig,
} from "./config.js";
export {
  createDispatchFunction,
  type DispatchHandler,
  DispatchTable,
  type PatternDispatchFunction,
  type PatternMapping,
} from "./dispatch.js";
export {
  ConfigurationError,
  ConstructionError,
  type ErrorCode,
  ErrorCodes,
  PatternLookupError,
  PatternValidationError,
  TypeShapeError,
} from "./errors.js";
export { type LogLevel, Logger, logger } from "./logger.js";
export {
  type Signature,
  type SignatureInput,
  Something,
  SomethingOrigin,
  SomethingPattern,
  TypingType,
} from "./something.js";
export {
  Any,
  argumentsEqual,
  type Constructor,
  Ellipsis,
  EllipsisMarker,
  err,
  isPlainType,
  isTypeAnnotation,
  ok,
  type Origin,
  type Pattern,
  PatternOrigin,
  patternsEqual,
  type PlainType,
  type Result,
  showPattern,
  showValue,
  SpecialForm,
  Subscribed,
} from "./types.js";
export {
  Callable,
  type CallableArgs,
  type CallableParams,
  CallablePattern,
  ElementPattern,
  List,
  Literal,
  LiteralPattern,
  MapOf,
  MapOfPattern,
  Receiver,
  Optional,
  SetOf,
  Tuple,
  type TupleArgs,
  TuplePattern,
  TypeOf,
  union,
  Union,
  UnionPattern,
} from "./typing.js";
