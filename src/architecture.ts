/**
 * ARCHITECTURE INDEX (GROUPED)
 *
 * CONCEPT
 * 1. Typed Instances
 *
 * DEFINITION
 * 2. Conversion Method Naming
 *
 * POLICY
 * 3. Identity Short-Circuit
 * 4. Push Precedence
 * 5. No Conversion Is an Outcome
 *
 * STRATEGY
 * 6. Write-Once Resolution
 *
 * LIFECYCLE
 * 7. Bound Helper Installation
 *
 * Recommended reading flow:
 * CONCEPT -> DEFINITION -> POLICY -> STRATEGY -> LIFECYCLE
 */

/**
 * HEADER TAXONOMY
 *
 * - POLICY:
 *   Non-negotiable rule (`must` / `must not`) and enforcement semantics.
 *
 * - STRATEGY:
 *   Chosen implementation approach used to satisfy policies.
 *
 * - DEFINITION:
 *   Formal meaning and scope of a term or boundary.
 *
 * - CONCEPT:
 *   Mental model framing the problem space.
 *
 * - LIFECYCLE:
 *   Step-by-step process flow across phases.
 */

/**
 * ARCHITECTURAL CONCEPT (1)
 * Typed Instances
 *
 * ---
 *
 * Coercion operates on a nominal type system layered over JavaScript classes.
 * A class takes part once it is registered under a type name:
 *
 *   registry.define('Shop::Money', Money);
 *
 * - **Typed instance**: an object with the `prototype` of a registered class
 *   on its prototype chain. Its *concrete type* is the nearest such
 *   registration, so an instance of an unregistered subclass has the type of
 *   its closest registered ancestor.
 * - **Unboxed value**: anything else (primitives, plain objects, instances of
 *   classes with no registered ancestor). Coercion never applies to unboxed
 *   values; the result is always `undefined`.
 *
 * Subtyping (`isa`) is nominal:
 * - registered ancestors on the class's prototype chain are parents;
 * - `define(name, ctor, { isa: [...] })` adds parents that are not on it.
 *
 * Parents are looked up when `isa` is queried, so a subclass defined before
 * its base class still is-a that base once the base is defined.
 */
export type TypedInstances = never;

/**
 * ARCHITECTURAL DEFINITION (2)
 * Conversion Method Naming
 *
 * ---
 *
 * Types advertise conversions through method names derived from type names.
 * Separators (`::`, `.`) are flattened to `_`:
 *
 *   'Shop::Money'  ->  'Shop_Money'
 *
 * - **Push** (outward): the *source* class has an instance method
 *   `__as_<FlatTarget>()` returning a target instance.
 *
 *     class Cents { __as_Shop_Money() { return new Money(this.value / 100); } }
 *
 * - **Pull** (inward): the *target* class has a static method
 *   `__from_<FlatSource>(source)` returning a target instance.
 *
 *     class Money { static __from_Cents(cents: Cents) { ... } }
 *
 * Member tables are snapshotted when a type is defined. Methods attached to a
 * class after `define` are invisible to discovery.
 */
export type ConversionNaming = never;

/**
 * ARCHITECTURAL POLICY (3)
 * Identity Short-Circuit
 *
 * ---
 *
 * When the concrete type of the value is-a target, the value is returned
 * unchanged.
 *
 * - The check runs before any cache lookup or capability query.
 * - It applies even when the value exposes conversion methods for the target.
 * - No cache entry is written for identity pairs.
 */
export type IdentityShortCircuit = never;

/**
 * ARCHITECTURAL POLICY (4)
 * Push Precedence
 *
 * ---
 *
 * Discovery consults, in order:
 *
 * 1. push: `source` exposes `__as_<Target>`
 * 2. pull: `target` exposes static `__from_<Source>`
 * 3. bridge: an external converter registered for the exact pair
 *
 * The first match is the directive. When a source advertises "I can become
 * a Target" and the target advertises "I can accept a Source", push is used
 * and the pull method is never called.
 *
 * Discovery is single-step: a directive never composes conversions
 * (A -> B -> C).
 */
export type PushPrecedence = never;

/**
 * ARCHITECTURAL POLICY (5)
 * No Conversion Is an Outcome
 *
 * ---
 *
 * `undefined` is the "cannot coerce" result. It is returned, never thrown,
 * when:
 * - the value is unboxed;
 * - the directive is `none`;
 * - the conversion method returns anything that is not a typed instance
 *   satisfying is-a target.
 *
 * Fatal conditions are limited to configuration and validation:
 * malformed names, unloaded targets, method collisions, unsupported install
 * shapes. An exception thrown *inside* a conversion method is not converted
 * into `undefined`; it reaches the caller unchanged.
 */
export type NoConversionOutcome = never;

/**
 * ARCHITECTURAL STRATEGY (6)
 * Write-Once Resolution
 *
 * ---
 *
 * Resolved directives are memoized per (concrete source type, target type).
 *
 * - `none` is cached like any other directive; a repeated failing pair costs
 *   one map lookup.
 * - An entry is never overwritten or evicted. `store` accepts an equal
 *   directive as a no-op and throws on a conflicting one.
 * - Bridges must be registered before their pair is first resolved.
 *
 * Because members are snapshotted at definition time (see
 * {@link ConversionNaming}), recomputing a pair always yields the same
 * directive; concurrent first resolutions can only produce equal writes.
 */
export type WriteOnceResolution = never;

/**
 * ARCHITECTURAL LIFECYCLE (7)
 * Bound Helper Installation
 *
 * ---
 *
 *   install(Consumer, '_Money', 'Shop::Money')
 *
 * 1. Validate `'_Money'` as an identifier and `'Shop::Money'` as a type name.
 * 2. Refuse if `Consumer` already owns a member `_Money`.
 * 3. If `Shop::Money` is not defined, run its registered loader. A missing or
 *    failing loader aborts the installation.
 * 4. Define `Consumer._Money(value)` (non-writable, non-enumerable), which
 *    coerces `value` to `Shop::Money` without re-validating the name.
 *
 * Installation is the only path that loads types; `coerce` requires the
 * target to be defined already.
 */
export type BoundHelperLifecycle = never;
