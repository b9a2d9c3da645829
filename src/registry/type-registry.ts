import { debug } from '../debug';
import {
  DuplicateTypeError,
  InvalidTypeNameError,
  TargetNotLoadedError
} from '../errors';
import { validateTypeName } from '../names';
import type {
  Constructor,
  DefineTypeOptions,
  MemberKind,
  TypeDefinition,
  TypeLoader
} from '../types';
import {
  ancestorPrototypes,
  collectInstanceMembers,
  collectStaticMembers
} from './members';

/**
 * The set of nominal types known to a coercion engine.
 *
 * Queries (`isLoaded`, `isa`, `exposes`, ...) take normalized names as
 * produced by `validateTypeName`; only `define` and `provide` normalize their
 * input.
 */
export type TypeRegistry = {
  /**
   * Registers `ctor` under `name` and snapshots its members.
   *
   * @throws {InvalidTypeNameError} If `name` or an `isa` entry is malformed.
   * @throws {DuplicateTypeError} If `name` or `ctor` is already registered.
   */
  define(
    name: string,
    ctor: Constructor,
    options?: DefineTypeOptions
  ): TypeDefinition;

  /**
   * Registers a loader that defines `name` on demand (see `load`).
   *
   * @throws {InvalidTypeNameError} If `name` is malformed.
   * @throws {DuplicateTypeError} If a loader is already registered for `name`.
   */
  provide(name: string, loader: TypeLoader): void;

  isLoaded(name: string): boolean;

  /**
   * Returns the definition of `name`, running its loader first if the type is
   * not defined yet.
   *
   * @throws {TargetNotLoadedError} If there is no loader, the loader throws
   *   (the loader's error is the `cause`), or the loader does not define the
   *   type.
   */
  load(name: string): TypeDefinition;

  get(name: string): TypeDefinition | undefined;

  /**
   * Definition registered for exactly `ctor` (not for a subclass of it).
   */
  definitionOf(ctor: Constructor): TypeDefinition | undefined;

  /**
   * Definition of the concrete type of `value`: the type registered for the
   * nearest prototype on the value's chain. An instance of an unregistered
   * subclass takes the type of its nearest registered ancestor class.
   *
   * @returns `undefined` for primitives and for objects with no registered
   *   class on their prototype chain.
   */
  typeOf(value: unknown): TypeDefinition | undefined;

  /**
   * Direct nominal supertypes of `typeName`: the registered ancestors on its
   * class's prototype chain, nearest first, then its declared `isa` names.
   *
   * Computed on every call, so the answer does not depend on the order in
   * which related classes were defined.
   */
  parentsOf(typeName: string): string[];

  /**
   * Whether `typeName` is `ancestor` or has it among its transitive parents.
   */
  isa(typeName: string, ancestor: string): boolean;

  /**
   * Capability query: whether `typeName` exposes a method `member` of the
   * given kind.
   */
  exposes(typeName: string, member: string, kind: MemberKind): boolean;

  member(
    typeName: string,
    member: string,
    kind: MemberKind
  ): Function | undefined;

  /**
   * Names of all defined types, in definition order.
   */
  names(): string[];
};

/**
 * Creates an empty type registry.
 */
export function createTypeRegistry(): TypeRegistry {
  const types = new Map<string, TypeDefinition>();
  const byPrototype = new WeakMap<object, TypeDefinition>();
  const loaders = new Map<string, TypeLoader>();

  function normalize(name: unknown): string {
    const normalized = validateTypeName(name);
    if (normalized === undefined) throw new InvalidTypeNameError(name);
    return normalized;
  }

  function inheritedParents(ctor: Constructor): string[] {
    const parents: string[] = [];
    for (const prototype of ancestorPrototypes(ctor)) {
      const ancestor = byPrototype.get(prototype);
      if (ancestor) parents.push(ancestor.name);
    }
    return parents;
  }

  function nearestDefinition(start: unknown): TypeDefinition | undefined {
    let current = start;
    while (current !== null && typeof current === 'object') {
      const definition = byPrototype.get(current);
      if (definition) return definition;
      current = Object.getPrototypeOf(current);
    }
    return undefined;
  }

  const registry: TypeRegistry = {
    define(name, ctor, options = {}) {
      const typeName = normalize(name);
      const prototype: unknown = ctor.prototype;

      if (prototype === null || typeof prototype !== 'object') {
        throw new Error(
          `[coercible] Cannot define "${typeName}": the constructor has no prototype object.`
        );
      }
      if (types.has(typeName)) {
        throw new DuplicateTypeError(
          typeName,
          `Type "${typeName}" is already defined.`
        );
      }
      const existing = byPrototype.get(prototype);
      if (existing) {
        throw new DuplicateTypeError(
          typeName,
          `Class ${ctor.name || '(anonymous)'} is already defined as "${existing.name}".`
        );
      }

      const declaredParents = [
        ...new Set((options.isa ?? []).map(normalize))
      ].filter(parent => parent !== typeName);

      const definition: TypeDefinition = {
        name: typeName,
        ctor,
        declaredParents,
        instanceMembers: collectInstanceMembers(ctor),
        staticMembers: collectStaticMembers(ctor)
      };

      types.set(typeName, definition);
      byPrototype.set(prototype, definition);
      loaders.delete(typeName);

      debug.registry('define', { name: typeName, isa: declaredParents });
      return definition;
    },

    provide(name, loader) {
      const typeName = normalize(name);
      if (loaders.has(typeName)) {
        throw new DuplicateTypeError(
          typeName,
          `A loader for "${typeName}" is already registered.`
        );
      }
      if (types.has(typeName)) return;
      loaders.set(typeName, loader);
    },

    isLoaded(name) {
      return types.has(name);
    },

    load(name) {
      const loaded = types.get(name);
      if (loaded) return loaded;

      const loader = loaders.get(name);
      if (!loader) {
        throw new TargetNotLoadedError(
          name,
          `Cannot load type "${name}": no loader is registered for it.`
        );
      }

      debug.registry('load', { name });
      try {
        loader();
      } catch (error) {
        throw new TargetNotLoadedError(
          name,
          `Failed to load type "${name}": its loader threw.`,
          { cause: error }
        );
      }

      const definition = types.get(name);
      if (!definition) {
        throw new TargetNotLoadedError(
          name,
          `Failed to load type "${name}": its loader did not define it.`
        );
      }
      return definition;
    },

    get(name) {
      return types.get(name);
    },

    definitionOf(ctor) {
      const prototype: unknown = ctor.prototype;
      if (prototype === null || typeof prototype !== 'object') return undefined;
      const definition = byPrototype.get(prototype);
      return definition?.ctor === ctor ? definition : undefined;
    },

    typeOf(value) {
      if (value === null) return undefined;
      if (typeof value !== 'object' && typeof value !== 'function') {
        return undefined;
      }
      return nearestDefinition(Object.getPrototypeOf(value));
    },

    parentsOf(typeName) {
      const definition = types.get(typeName);
      if (!definition) return [];
      const parents = new Set(inheritedParents(definition.ctor));
      for (const parent of definition.declaredParents) parents.add(parent);
      parents.delete(typeName);
      return [...parents];
    },

    isa(typeName, ancestor) {
      if (typeName === ancestor) return true;

      const seen = new Set<string>([typeName]);
      const queue = [typeName];
      for (let name = queue.shift(); name !== undefined; name = queue.shift()) {
        for (const parent of registry.parentsOf(name)) {
          if (parent === ancestor) return true;
          if (seen.has(parent)) continue;
          seen.add(parent);
          queue.push(parent);
        }
      }
      return false;
    },

    exposes(typeName, member, kind) {
      return registry.member(typeName, member, kind) !== undefined;
    },

    member(typeName, member, kind) {
      const definition = types.get(typeName);
      if (!definition) return undefined;
      const table =
        kind === 'instance'
          ? definition.instanceMembers
          : definition.staticMembers;
      return table.get(member);
    },

    names() {
      return [...types.keys()];
    }
  };

  return registry;
}
