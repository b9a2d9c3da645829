import {
  NAMESPACE_SEPARATOR,
  PULL_PREFIX,
  PUSH_PREFIX,
  ROOT_NAMESPACE
} from '../constants';

/**
 * A single identifier segment: a letter or underscore followed by word
 * characters.
 */
const METHOD_NAME = /^[A-Za-z_]\w*$/;

/**
 * One or more identifier segments joined by `::` or `.`.
 */
const TYPE_NAME = /^[A-Za-z_]\w*(?:(?:::|\.)[A-Za-z_]\w*)*$/;

/**
 * Any namespace separator accepted inside a type name.
 */
const SEPARATORS = /::|\./g;

/**
 * Validates a member name used for a bound helper.
 *
 * Only plain identifiers are accepted; namespaced names are rejected.
 *
 * @param input - Candidate name (any value).
 * @returns The name unchanged, or `undefined` when rejected.
 */
export function validateMethodName(input: unknown): string | undefined {
  if (typeof input !== 'string') return undefined;
  return METHOD_NAME.test(input) ? input : undefined;
}

/**
 * Validates and normalizes a type name.
 *
 * Normalization:
 * - `'::'` alone denotes the root namespace and yields `'main'`.
 * - A leading `'::'` roots the name: `'::Foo'` yields `'main::Foo'`.
 *
 * Never throws; rejection is reported as `undefined`, which cannot collide
 * with any valid name.
 *
 * @param input - Candidate name (any value).
 * @returns The normalized name, or `undefined` when rejected.
 */
export function validateTypeName(input: unknown): string | undefined {
  if (typeof input !== 'string') return undefined;
  if (input === NAMESPACE_SEPARATOR) return ROOT_NAMESPACE;

  const name = input.startsWith(NAMESPACE_SEPARATOR)
    ? `${ROOT_NAMESPACE}${input}`
    : input;

  return TYPE_NAME.test(name) ? name : undefined;
}

/**
 * Replaces every namespace separator with an underscore.
 *
 * `'Foo::Bar'` and `'Foo.Bar'` both flatten to `'Foo_Bar'`.
 */
export function flattenTypeName(typeName: string): string {
  return typeName.replace(SEPARATORS, '_');
}

/**
 * Name of the instance method a source type exposes to convert itself into
 * `targetType`.
 */
export function pushMethodName(targetType: string): string {
  return `${PUSH_PREFIX}${flattenTypeName(targetType)}`;
}

/**
 * Name of the static method a target type exposes to build itself from an
 * instance of `sourceType`.
 */
export function pullMethodName(sourceType: string): string {
  return `${PULL_PREFIX}${flattenTypeName(sourceType)}`;
}
