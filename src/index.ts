export type {
  ConversionNaming,
  IdentityShortCircuit,
  NoConversionOutcome,
  PushPrecedence,
  TypedInstances,
  WriteOnceResolution,
  BoundHelperLifecycle
} from './architecture';
export type { Install } from './binding';
export { createInstaller } from './binding';
export type { ResolutionCache, ResolutionEntry } from './cache';
export { createResolutionCache } from './cache';
export type { Coercion } from './coercion';
export {
  bridge,
  coerce,
  coerceTo,
  coercionSchema,
  createCoercion,
  defaultCoercion,
  defineType,
  install,
  provideType
} from './coercion';
export {
  COERCE_IMPORT,
  NAMESPACE_SEPARATOR,
  PULL_PREFIX,
  PUSH_PREFIX,
  ROOT_NAMESPACE
} from './constants';
export type { DebugChannel, DebugConfig, DebugData } from './debug';
export {
  configureDebug,
  isDebugEnabled,
  refreshDebugChannels,
  resetDebugConfig
} from './debug';
export type { CoercionEngine, CoercionEngineOptions } from './engine';
export { createCoercionEngine } from './engine';
export type { CoercionErrorCode } from './errors';
export {
  CoercionError,
  DuplicateTypeError,
  InvalidMethodNameError,
  InvalidTypeNameError,
  MethodCollisionError,
  TargetNotLoadedError,
  UnsupportedImportError
} from './errors';
export {
  flattenTypeName,
  pullMethodName,
  pushMethodName,
  validateMethodName,
  validateTypeName
} from './names';
export type { TypeRegistry } from './registry';
export { createTypeRegistry } from './registry';
export type { CoercionSchemaOptions } from './schema';
export { createCoercionSchema, validateWithSchema } from './schema';
export * from './types';
