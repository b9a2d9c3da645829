import type { IdentityShortCircuit, PushPrecedence } from '../architecture';
import type { ResolutionCache } from '../cache';
import { createResolutionCache } from '../cache';
import { debug } from '../debug';
import { InvalidTypeNameError, TargetNotLoadedError } from '../errors';
import { pullMethodName, pushMethodName, validateTypeName } from '../names';
import type { TypeRegistry } from '../registry';
import { createTypeRegistry } from '../registry';
import type {
  BridgeConverter,
  Coerced,
  Constructor,
  Directive,
  TypeDefinition
} from '../types';
import {
  NO_CONVERSION,
  bridged,
  describeDirective,
  pull,
  push
} from '../types';
import { isObjectLike } from '../utils/type-guards';

export type CoercionEngineOptions = {
  /**
   * Types the engine coerces between.
   *
   * @default createTypeRegistry()
   */
  registry?: TypeRegistry;

  /**
   * Memo of resolved directives. Share one cache between engines only when
   * they also share the registry.
   *
   * @default createResolutionCache()
   */
  cache?: ResolutionCache;
};

export type CoercionEngine = {
  readonly registry: TypeRegistry;
  readonly cache: ResolutionCache;

  /**
   * Coerces `value` into an instance of `targetTypeName` or one of its
   * subtypes.
   *
   * The target must already be defined: this entry point never runs a
   * loader.
   *
   * @returns The value itself when it already is-a target, the converted
   *   instance, or `undefined` when no conversion applies.
   * @throws {InvalidTypeNameError} If `targetTypeName` is malformed.
   * @throws {TargetNotLoadedError} If the target type is not defined.
   */
  coerce(targetTypeName: string, value: unknown): Coerced;

  /**
   * Class-addressed variant of `coerce`. The result is additionally checked
   * with `instanceof ctor`, so nominal-only subtypes (declared through
   * `isa` without inheriting from `ctor`) yield `undefined` here.
   *
   * @throws {TargetNotLoadedError} If `ctor` is not registered.
   */
  coerceTo<T extends object>(ctor: Constructor<T>, value: unknown): Coerced<T>;

  /**
   * `coerce` without name validation.
   *
   * Only for callers holding a name already normalized by
   * `validateTypeName`, such as bound helpers.
   *
   * @throws {TargetNotLoadedError} If the target type is not defined and the
   *   value would need a conversion (see `resolve`).
   */
  coerceValidated(targetType: string, value: unknown): Coerced;

  /**
   * Returns the directive for a pair, computing and caching it on a miss.
   *
   * Search order: push, pull, bridge, none. See {@link PushPrecedence}.
   *
   * @throws {TargetNotLoadedError} If either type is not defined. Nothing is
   *   cached for such a pair, so defining the type later still takes effect.
   */
  resolve(sourceType: string, targetType: string): Directive;

  /**
   * Registers an external converter for an exact (source, target) pair,
   * consulted after the push and pull methods.
   *
   * @throws {InvalidTypeNameError} If either name is malformed.
   * @throws If a converter is already registered for the pair, or the pair
   *   has already been resolved (cached entries are never replaced).
   */
  bridge(
    sourceType: string,
    targetType: string,
    convert: BridgeConverter,
    label?: string
  ): void;
};

type Bridge = {
  convert: BridgeConverter;
  label: string;
};

/**
 * Creates a coercion engine.
 *
 * Resolution protocol, for a typed source value and a defined target. The
 * source type is the nearest registered class on the value's prototype chain:
 * 1. Identity: the source type is-a target → the value itself
 *    ({@link IdentityShortCircuit}).
 * 2. Cached directive for (concrete source type, target), else discovery:
 *    - push: source exposes instance method `__as_<Target>`
 *    - pull: target exposes static method `__from_<Source>`
 *    - bridge: external converter registered for the pair
 *    - none
 * 3. Execute, then accept the result only if it is a typed instance that
 *    is-a target.
 *
 * Errors thrown by conversion methods propagate unchanged.
 */
export function createCoercionEngine(
  options: CoercionEngineOptions = {}
): CoercionEngine {
  const registry = options.registry ?? createTypeRegistry();
  const cache = options.cache ?? createResolutionCache();
  const bridges = new Map<string, Map<string, Bridge>>();

  function findBridge(source: string, target: string): Bridge | undefined {
    return bridges.get(source)?.get(target);
  }

  function discover(source: string, target: string): Directive {
    const pushName = pushMethodName(target);
    if (registry.exposes(source, pushName, 'instance')) return push(pushName);

    const pullName = pullMethodName(source);
    if (registry.exposes(target, pullName, 'static')) return pull(pullName);

    const bridge = findBridge(source, target);
    if (bridge) return bridged(bridge.label);

    return NO_CONVERSION;
  }

  function execute(
    directive: Directive,
    source: TypeDefinition,
    target: string,
    value: object
  ): unknown {
    switch (directive.kind) {
      case 'push': {
        const method = registry.member(
          source.name,
          directive.method,
          'instance'
        );
        return method ? Reflect.apply(method, value, []) : undefined;
      }
      case 'pull': {
        const targetType = registry.get(target);
        const method = registry.member(target, directive.method, 'static');
        return targetType && method
          ? Reflect.apply(method, targetType.ctor, [value])
          : undefined;
      }
      case 'bridge':
        return findBridge(source.name, target)?.convert(value);
      case 'none':
        return undefined;
    }
  }

  function requireTarget(targetTypeName: string): string {
    const target = validateTypeName(targetTypeName);
    if (target === undefined) throw new InvalidTypeNameError(targetTypeName);
    if (!registry.isLoaded(target)) {
      throw new TargetNotLoadedError(
        target,
        `Tried to coerce to type "${target}", which is not loaded.`
      );
    }
    return target;
  }

  const engine: CoercionEngine = {
    registry,
    cache,

    coerce(targetTypeName, value) {
      return engine.coerceValidated(requireTarget(targetTypeName), value);
    },

    coerceTo(ctor, value) {
      const definition = registry.definitionOf(ctor);
      if (!definition) {
        throw new TargetNotLoadedError(
          ctor.name,
          `Tried to coerce to class ${ctor.name || '(anonymous)'}, which is not registered.`
        );
      }
      const result = engine.coerceValidated(definition.name, value);
      return result instanceof ctor ? result : undefined;
    },

    coerceValidated(target, value) {
      if (!isObjectLike(value)) return undefined;

      const source = registry.typeOf(value);
      if (!source) return undefined;

      if (registry.isa(source.name, target)) {
        debug.resolve('identity', { source: source.name, target });
        return value;
      }

      const directive = engine.resolve(source.name, target);
      const result = execute(directive, source, target, value);
      if (!isObjectLike(result)) return undefined;

      const produced = registry.typeOf(result);
      if (produced && registry.isa(produced.name, target)) return result;

      debug.resolve('reject', {
        source: source.name,
        target,
        directive: describeDirective(directive),
        produced: produced?.name
      });
      return undefined;
    },

    resolve(sourceType, targetType) {
      for (const name of [sourceType, targetType]) {
        if (!registry.isLoaded(name)) {
          throw new TargetNotLoadedError(
            name,
            `Cannot resolve "${sourceType}" -> "${targetType}": type "${name}" is not loaded.`
          );
        }
      }

      const cached = cache.lookup(sourceType, targetType);
      if (cached) {
        debug.resolve('cache.hit', { source: sourceType, target: targetType });
        return cached;
      }

      const directive = discover(sourceType, targetType);
      cache.store(sourceType, targetType, directive);
      debug.resolve('cache.store', {
        source: sourceType,
        target: targetType,
        directive: describeDirective(directive)
      });
      return directive;
    },

    bridge(sourceType, targetType, convert, label) {
      const source = validateTypeName(sourceType);
      if (source === undefined) throw new InvalidTypeNameError(sourceType);
      const target = validateTypeName(targetType);
      if (target === undefined) throw new InvalidTypeNameError(targetType);

      if (findBridge(source, target)) {
        throw new Error(
          `[coercible] A bridge from "${source}" to "${target}" is already registered.`
        );
      }
      const resolved = cache.lookup(source, target);
      if (resolved) {
        throw new Error(
          `[coercible] Cannot bridge "${source}" to "${target}": the pair is ` +
            `already resolved as ${describeDirective(resolved)}.`
        );
      }

      let byTarget = bridges.get(source);
      if (!byTarget) {
        byTarget = new Map();
        bridges.set(source, byTarget);
      }
      byTarget.set(target, {
        convert,
        label: label ?? (convert.name || 'anonymous')
      });
    }
  };

  return engine;
}
