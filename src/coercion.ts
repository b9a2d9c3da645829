import type { StandardSchemaV1 } from '@standard-schema/spec';

import type { Install } from './binding';
import { createInstaller } from './binding';
import type { ResolutionCache } from './cache';
import type { CoercionEngine, CoercionEngineOptions } from './engine';
import { createCoercionEngine } from './engine';
import type { TypeRegistry } from './registry';
import type { CoercionSchemaOptions } from './schema';
import { createCoercionSchema } from './schema';
import type {
  BridgeConverter,
  Coerced,
  CoerceFunction,
  Constructor,
  DefineTypeOptions,
  TypeDefinition,
  TypeLoader
} from './types';

/**
 * A registry, its resolution cache, the engine over both, and the entry
 * points bound to that engine.
 */
export type Coercion = {
  readonly registry: TypeRegistry;
  readonly cache: ResolutionCache;
  readonly engine: CoercionEngine;

  coerce: CoerceFunction;
  coerceTo<T extends object>(ctor: Constructor<T>, value: unknown): Coerced<T>;
  install: Install;

  defineType(
    name: string,
    ctor: Constructor,
    options?: DefineTypeOptions
  ): TypeDefinition;
  provideType(name: string, loader: TypeLoader): void;
  bridge(
    sourceType: string,
    targetType: string,
    convert: BridgeConverter,
    label?: string
  ): void;

  coercionSchema<T extends object>(
    target: Constructor<T>,
    options?: CoercionSchemaOptions
  ): StandardSchemaV1<unknown, T>;
  coercionSchema(
    target: string,
    options?: CoercionSchemaOptions
  ): StandardSchemaV1<unknown, object>;
};

/**
 * Creates an isolated coercion namespace.
 *
 * Engine and registry methods do not depend on `this`, so the entry points
 * can be destructured freely.
 *
 * Types defined in one namespace are unknown to every other, and each has its
 * own resolution cache.
 */
export function createCoercion(options: CoercionEngineOptions = {}): Coercion {
  const engine = createCoercionEngine(options);
  const { registry, cache } = engine;

  function coercionSchema<T extends object>(
    target: Constructor<T>,
    options?: CoercionSchemaOptions
  ): StandardSchemaV1<unknown, T>;
  function coercionSchema(
    target: string,
    options?: CoercionSchemaOptions
  ): StandardSchemaV1<unknown, object>;
  function coercionSchema(
    target: string | Constructor,
    options?: CoercionSchemaOptions
  ): StandardSchemaV1<unknown, object> {
    return typeof target === 'string'
      ? createCoercionSchema(engine, target, options)
      : createCoercionSchema(engine, target, options);
  }

  return {
    registry,
    cache,
    engine,
    coerce: engine.coerce,
    coerceTo: engine.coerceTo,
    install: createInstaller(engine),
    defineType: registry.define,
    provideType: registry.provide,
    bridge: engine.bridge,
    coercionSchema
  };
}

/**
 * The process-wide namespace behind the free functions exported by the
 * package. Its cache lives as long as the process.
 */
export const defaultCoercion: Coercion = createCoercion();

export const {
  coerce,
  coerceTo,
  install,
  defineType,
  provideType,
  bridge,
  coercionSchema
} = defaultCoercion;
