import type { BoundHelperLifecycle } from '../architecture';
import { COERCE_IMPORT } from '../constants';
import { debug } from '../debug';
import {
  InvalidMethodNameError,
  InvalidTypeNameError,
  MethodCollisionError,
  UnsupportedImportError
} from '../errors';
import type { CoercionEngine } from '../engine';
import { validateMethodName, validateTypeName } from '../names';
import type { BoundCoercion, CoerceFunction } from '../types';
import { displayName } from '../utils/type-guards';

/**
 * Pragma-style entry point through which a consumer declares its use of
 * coercion.
 *
 * Recognised shapes:
 * - `install(consumer)`: no-op.
 * - `install(consumer, 'coerce')`: attaches the free `coerce` function as
 *   `consumer.coerce`.
 * - `install(consumer, method, target)`: attaches `consumer[method](value)`,
 *   a helper coercing to the fixed `target` (see {@link BoundHelperLifecycle}).
 *
 * Every other shape throws `UnsupportedImportError`, including for callers
 * that bypass the overloads.
 */
export type Install = {
  (consumer: object): undefined;
  (consumer: object, request: typeof COERCE_IMPORT): CoerceFunction;
  (consumer: object, method: string, target: string): BoundCoercion;
};

/**
 * Attaches `value` to `consumer` under `key` unless `consumer` already owns a
 * member of that name.
 *
 * The property is non-writable and non-configurable, so the helper cannot be
 * replaced once installed either.
 */
function attach(consumer: object, key: string, value: Function): void {
  if (Object.hasOwn(consumer, key)) {
    throw new MethodCollisionError(displayName(consumer), key);
  }
  Object.defineProperty(consumer, key, {
    value,
    writable: false,
    enumerable: false,
    configurable: false
  });
}

/**
 * Creates the `install` pragma for `engine`.
 */
export function createInstaller(engine: CoercionEngine): Install {
  const coerce: CoerceFunction = (targetTypeName, value) =>
    engine.coerce(targetTypeName, value);

  function installCoerce(consumer: object, request: unknown): CoerceFunction {
    if (request !== COERCE_IMPORT) {
      throw new UnsupportedImportError(
        `Only "${COERCE_IMPORT}" can be imported; got ${
          typeof request === 'string' ? `"${request}"` : `(${typeof request})`
        }.`
      );
    }
    attach(consumer, COERCE_IMPORT, coerce);
    debug.install('coerce', { consumer: displayName(consumer) });
    return coerce;
  }

  function installHelper(
    consumer: object,
    methodInput: unknown,
    targetInput: unknown
  ): BoundCoercion {
    const method = validateMethodName(methodInput);
    if (method === undefined) throw new InvalidMethodNameError(methodInput);

    const target = validateTypeName(targetInput);
    if (target === undefined) throw new InvalidTypeNameError(targetInput);

    if (Object.hasOwn(consumer, method)) {
      throw new MethodCollisionError(displayName(consumer), method);
    }

    // Loads on demand; throws when the type cannot be loaded.
    engine.registry.load(target);

    const helper: BoundCoercion = value =>
      engine.coerceValidated(target, value);
    Object.defineProperty(helper, 'name', { value: method });

    attach(consumer, method, helper);
    debug.install('helper', {
      consumer: displayName(consumer),
      method,
      target
    });
    return helper;
  }

  function install(consumer: object): undefined;
  function install(
    consumer: object,
    request: typeof COERCE_IMPORT
  ): CoerceFunction;
  function install(
    consumer: object,
    method: string,
    target: string
  ): BoundCoercion;
  function install(
    consumer: object,
    ...args: unknown[]
  ): CoerceFunction | BoundCoercion | undefined {
    switch (args.length) {
      case 0:
        return undefined;
      case 1:
        return installCoerce(consumer, args[0]);
      case 2:
        return installHelper(consumer, args[0], args[1]);
      default:
        throw new UnsupportedImportError(
          `Too many arguments: expected at most 2, got ${args.length}.`
        );
    }
  }

  return install;
}
