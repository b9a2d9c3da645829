export type { CoercionEngine, CoercionEngineOptions } from './coercion-engine';
export { createCoercionEngine } from './coercion-engine';
