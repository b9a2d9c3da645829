/**
 * Any class, abstract or concrete, whose instances are `T`.
 *
 * Constructor parameters are irrelevant to coercion; `never[]` accepts every
 * parameter list.
 */
export type Constructor<T extends object = object> = abstract new (
  ...args: never[]
) => T;

/**
 * Outcome of a coercion attempt.
 *
 * `undefined` is the "no conversion" result: the value could not be coerced.
 * It is a normal outcome, not a failure.
 */
export type Coerced<T extends object = object> = T | undefined;

/**
 * Signature of the free `coerce` function.
 */
export type CoerceFunction = (targetTypeName: string, value: unknown) => Coerced;

/**
 * Signature of a helper installed by `install(consumer, method, target)`.
 * The target type is fixed when the helper is installed.
 */
export type BoundCoercion = (value: unknown) => Coerced;

/**
 * An external converter registered for one exact (source, target) pair.
 */
export type BridgeConverter = (value: object) => unknown;
