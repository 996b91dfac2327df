/**
 * fn-forms executor - packages a form-bound function and runs it out of process
 *
 * Flow:
 * - AppEncoder stages the function's dependencies and packed controller into an archive
 * - AppDecoder extracts the archive and writes the execution script
 * - AppExecutor spawns one child per execution; state lives in executions/<id>.json
 */

export { defineApp, required, optional, ParamDescriptor, isOptionalType, resolveBindings } from './app.js';
export type {
  App,
  AppDefinition,
  AppDependencies,
  AppFunction,
  BindingTable,
  FunctionSource,
  ParamBinding,
  ParamKind,
  ParamType,
  ResolvedBinding,
} from './app.js';

export {
  ARCHIVE_FORMATS,
  EXECUTION_STATUSES,
  appSettingsSchema,
  executionRecordSchema,
  isTerminal,
} from './types.js';
export type {
  AppSettings,
  ArchiveFormat,
  EncodedOutput,
  Execution,
  ExecutionRecord,
  ExecutionStatus,
  FrameData,
  FunctionSettings,
  MediaType,
} from './types.js';

export { TEMP_DIR_ENV } from './config.js';
export type { AppDecoderOptions, AppEncoderOptions, AppExecutorOptions } from './config.js';

export { createLogger, silentLogger, DEBUG_ENV } from './logger.js';
export type { Logger } from './logger.js';

export {
  Dependency,
  ModuleDependency,
  PackageDependency,
  ProjectDependency,
  RequirementsDependency,
  TarballDependency,
  stageDependencies,
} from './dependencies.js';
export type { StagedSource, StagingContext } from './dependencies.js';

export {
  EncoderRegistry,
  bytesEncoder,
  decodeOutput,
  encodeOutput,
  jsonEncoder,
  stringEncoder,
} from './encoders.js';
export type { EncodedContent, OutputEncoder } from './encoders.js';

export { AppEncoder, APP_MEDIA_TYPE, CONTROLLER_FILENAME, FUNCTION_FILENAME } from './encoder.js';
export type { EncodeOptions } from './encoder.js';
export { AppDecoder } from './decoder.js';
export type { EncodedApp } from './decoder.js';
export { AppExecutor } from './executor.js';
export type { WaitOptions } from './executor.js';
export { runExecution } from './runner.js';
export type { RunExecutionOptions } from './runner.js';
