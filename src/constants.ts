/**
 * Name of the root namespace.
 *
 * A type name given as the bare separator (`'::'`) denotes this namespace,
 * and a name starting with the separator (`'::Foo'`) is rooted in it
 * (`'main::Foo'`).
 */
export const ROOT_NAMESPACE = 'main';

/**
 * Canonical namespace separator.
 *
 * `.` is accepted as an alternative separator within a name, but only the
 * canonical separator may be used as a leading root marker.
 */
export const NAMESPACE_SEPARATOR = '::';

/**
 * Marker prefixed to the flattened target name to form a push method name.
 *
 * A type declares that its instances can become a `Foo::Bar` by exposing an
 * instance method `__as_Foo_Bar()`.
 */
export const PUSH_PREFIX = '__as_';

/**
 * Marker prefixed to the flattened source name to form a pull method name.
 *
 * A type declares that it can be built from a `My::Thing` by exposing a static
 * method `__from_My_Thing(thing)`.
 */
export const PULL_PREFIX = '__from_';

/**
 * The only name the one-argument form of `install` accepts.
 */
export const COERCE_IMPORT = 'coerce';

/**
 * Environment variable listing the enabled debug channels.
 *
 * Accepts a comma-separated list (`resolve,install`), `*` / `1` / `true` for
 * every channel, or `0` / `false` / empty for none.
 */
export const DEBUG_ENV = 'COERCIBLE_DEBUG';
