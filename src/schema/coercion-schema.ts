import type { StandardSchemaV1 } from '@standard-schema/spec';

import type { CoercionEngine } from '../engine';
import { InvalidTypeNameError, TargetNotLoadedError } from '../errors';
import { validateTypeName } from '../names';
import type { Coerced, Constructor } from '../types';

export type CoercionSchemaOptions = {
  /**
   * Builds the issue message for a value that cannot be coerced.
   *
   * @default value => `Expected a ${target} or a value coercible to it, got ${kind}.`
   */
  message?: (value: unknown, target: string) => string;
};

const VENDOR = 'coercible';

function describeKind(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
}

function defaultMessage(value: unknown, target: string): string {
  return `Expected a ${target} or a value coercible to it, got ${describeKind(value)}.`;
}

/**
 * Exposes a coercion target as a Standard Schema V1 validator.
 *
 * `validate` never throws for unconvertible input: it reports a single issue
 * instead. Errors thrown by conversion methods propagate.
 *
 * The target is checked when the schema is created:
 * - a name must be valid and already defined;
 * - a class must be registered.
 *
 * Public Overload:
 * Class targets narrow the output to the instance type; the result is then
 * also checked with `instanceof` (see `CoercionEngine.coerceTo`).
 */
export function createCoercionSchema<T extends object>(
  engine: CoercionEngine,
  target: Constructor<T>,
  options?: CoercionSchemaOptions
): StandardSchemaV1<unknown, T>;

export function createCoercionSchema(
  engine: CoercionEngine,
  target: string,
  options?: CoercionSchemaOptions
): StandardSchemaV1<unknown, object>;

export function createCoercionSchema(
  engine: CoercionEngine,
  target: string | Constructor,
  options: CoercionSchemaOptions = {}
): StandardSchemaV1<unknown, object> {
  const message = options.message ?? defaultMessage;
  let targetName: string;
  let run: (value: unknown) => Coerced;

  if (typeof target === 'string') {
    const name = validateTypeName(target);
    if (name === undefined) throw new InvalidTypeNameError(target);
    if (!engine.registry.isLoaded(name)) {
      throw new TargetNotLoadedError(
        name,
        `Cannot create a schema for type "${name}", which is not loaded.`
      );
    }
    targetName = name;
    run = value => engine.coerceValidated(name, value);
  } else {
    const ctor = target;
    const definition = engine.registry.definitionOf(ctor);
    if (!definition) {
      throw new TargetNotLoadedError(
        ctor.name,
        `Cannot create a schema for class ${ctor.name || '(anonymous)'}, which is not registered.`
      );
    }
    targetName = definition.name;
    run = value => engine.coerceTo(ctor, value);
  }

  return {
    '~standard': {
      version: 1,
      vendor: VENDOR,
      validate(value) {
        const result = run(value);
        if (result === undefined) {
          return { issues: [{ message: message(value, targetName) }] };
        }
        return { value: result };
      }
    }
  };
}
