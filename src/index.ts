export {
  arrayAttr,
  boolAttr,
  intAttr,
  OpBuilder,
  stringAttr,
  typeAttr,
  type BuildOptions,
} from "./ir/builder";
export {
  DetachedOperationError,
  InvalidReplicateError,
  IRVerificationError,
  OperationInUseError,
  UnknownEntityError,
  UnknownPassError,
} from "./ir/errors";
export {
  IRContext,
  UNKNOWN_LOC,
  type Attribute,
  type Block,
  type BlockArgument,
  type BlockId,
  type CreateOpOptions,
  type Location,
  type OpId,
  type OpResult,
  type Operation,
  type Region,
  type RegionId,
  type Value,
  type ValueId,
} from "./ir/ir";
export { formatAttribute, printOp } from "./ir/printer";
export {
  controlType,
  formatType,
  functionType,
  isResourceType,
  resourceType,
  tensorType,
  typesEqual,
  type ControlType,
  type Dim,
  type ElementType,
  type FunctionType,
  type TensorType,
  type Type,
} from "./ir/types";
export { verify, verifyOrThrow } from "./ir/verifier";
export { collectOps, walk, wasInterrupted, type WalkCallback, type WalkOrder, type WalkResult } from "./ir/walk";

export {
  createFunction,
  createModule,
  getFunctionBody,
  getFunctionName,
  getFunctions,
  getFunctionType,
  lookupFunction,
  type FunctionHandle,
  type ModuleHandle,
} from "./dialect/func";
export * from "./dialect/ops";
export {
  createDeviceReturn,
  createReplicate,
  getFirstReplicaOperand,
  getReplicaCount,
  getReplicaOperand,
  getReplicateBody,
  getReplicateRegion,
  type CreateReplicateOptions,
  type ReplicateHandle,
} from "./dialect/replicate";

export {
  convertFunctionalToExecutor,
  createFunctionalToExecutorConversionPass,
  FUNCTIONAL_TO_EXECUTOR_CONVERSION,
} from "./passes/functional-to-executor";
export { bumpStat, mergeStats, type FunctionPass, type PassContext, type PassStatistics } from "./passes/pass";
export { PassManager, type PassManagerOptions, type PassRunResult } from "./passes/pass-manager";
export {
  createPass,
  getPassRegistration,
  listPasses,
  parsePipeline,
  registerPass,
  type PassRegistration,
} from "./passes/registry";
export {
  createReplicateInvariantOpHoistingPass,
  hoistReplicateInvariantOps,
  hoistReplicateInvariantOpsInFunction,
  isOpReplicateInvariant,
  makeShapeOpInvariant,
  REPLICATE_INVARIANT_OP_HOISTING,
  type HoistOptions,
  type HoistStats,
  type ShapeRewrite,
} from "./passes/replicate-invariant-op-hoisting";

export {
  DEFAULT_CONFIG,
  getConfig,
  loadConfig,
  resetConfig,
  setConfig,
  withConfig,
  type Config,
  type Env,
} from "./support/config";
export { dumpOpToFile, resetDumpNames } from "./support/dump";
export { debugLog, vlog, vlogIsOn } from "./support/logging";
