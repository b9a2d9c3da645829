/** Guard verifying the value is a function. */
export function isFunction(value: unknown): value is Function {
  return typeof value === 'function';
}

/**
 * Guard verifying the value can carry a prototype: a non-null object or a
 * function.
 *
 * Everything else (strings, numbers, booleans, bigints, symbols, `null`,
 * `undefined`) is an unboxed value and can never be a typed instance.
 *
 * @param value
 *   Candidate runtime value to test.
 * @returns
 *   `true` iff {@link value} is a non-null object or a function.
 */
export function isObjectLike(value: unknown): value is object {
  return (
    (typeof value === 'object' && value !== null) || typeof value === 'function'
  );
}

/**
 * Best-effort display name of a consumer passed to `install`.
 *
 * Classes and named functions report their `name`; other objects report the
 * name of their constructor, falling back to `(anonymous)`.
 */
export function displayName(value: object): string {
  if (isFunction(value) && value.name) return value.name;
  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (isFunction(ctor) && ctor.name && ctor !== Object) return ctor.name;
  return '(anonymous)';
}
