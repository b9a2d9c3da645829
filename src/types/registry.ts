import type { Constructor } from './primitives';

/**
 * Options accepted by `TypeRegistry.define`.
 */
export type DefineTypeOptions = {
  /**
   * Additional nominal supertypes of the type.
   *
   * Registered ancestors on the class's prototype chain are parents without
   * being listed; `isa` adds names that are not on it, such as a type
   * implemented structurally.
   *
   * @default []
   */
  isa?: readonly string[];
};

/**
 * Synchronous loader for a type that is not defined yet.
 *
 * The loader must define the type (directly or by evaluating the module that
 * does). It runs at most once per successful load.
 */
export type TypeLoader = () => void;

/**
 * Which member table a capability query addresses.
 *
 * - `instance`: methods callable on instances (push methods).
 * - `static`: methods callable on the class itself (pull methods).
 */
export type MemberKind = 'instance' | 'static';

/**
 * Registry record of one nominal type.
 *
 * Member tables are snapshots taken when the type is defined; methods added
 * to the class afterwards are not visible to capability queries.
 */
export type TypeDefinition = {
  /**
   * Normalized type name (see `validateTypeName`).
   */
  readonly name: string;

  /**
   * The class whose `prototype` identifies instances of the type.
   */
  readonly ctor: Constructor;

  /**
   * Nominal supertypes declared through `isa`, normalized, in declaration
   * order. Ancestors on the prototype chain are not listed here: they are
   * looked up when `isa` is queried (see `TypeRegistry.parentsOf`).
   */
  readonly declaredParents: readonly string[];

  /**
   * Instance methods, including inherited ones, by name.
   */
  readonly instanceMembers: ReadonlyMap<string, Function>;

  /**
   * Static methods, including inherited ones, by name.
   */
  readonly staticMembers: ReadonlyMap<string, Function>;
};
