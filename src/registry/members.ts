import type { Constructor } from '../types';

/**
 * Built-in own properties of every class that are never treated as static
 * capabilities.
 */
const FUNCTION_OWN_KEYS = new Set(['length', 'name', 'prototype', 'caller', 'arguments']);

/**
 * Collects the function-valued data properties along a prototype chain.
 *
 * Rules:
 * - Walks from `start` towards the root, stopping before `stop`.
 * - The nearest definition of a name wins (overrides shadow inherited
 *   methods).
 * - Accessors are skipped without being invoked; only data properties whose
 *   value is a function count as methods.
 * - Symbol keys are ignored: capabilities are looked up by identifier.
 */
function collectChain(
  start: unknown,
  stop: unknown,
  skip: ReadonlySet<string>
): Map<string, Function> {
  const members = new Map<string, Function>();
  let current = start;

  while (
    current !== null &&
    current !== stop &&
    (typeof current === 'object' || typeof current === 'function')
  ) {
    for (const key of Object.getOwnPropertyNames(current)) {
      if (skip.has(key) || members.has(key)) continue;
      const descriptor = Object.getOwnPropertyDescriptor(current, key);
      if (descriptor && typeof descriptor.value === 'function') {
        members.set(key, descriptor.value);
      }
    }
    current = Object.getPrototypeOf(current);
  }

  return members;
}

/**
 * Snapshot of the instance methods of `ctor`, inherited ones included,
 * excluding `Object.prototype`.
 */
export function collectInstanceMembers(ctor: Constructor): Map<string, Function> {
  const prototype: unknown = ctor.prototype;
  return collectChain(prototype, Object.prototype, new Set(['constructor']));
}

/**
 * Snapshot of the static methods of `ctor`, inherited ones included,
 * excluding `Function.prototype`.
 */
export function collectStaticMembers(ctor: Constructor): Map<string, Function> {
  return collectChain(ctor, Function.prototype, FUNCTION_OWN_KEYS);
}

/**
 * Lists the prototypes strictly above `ctor.prototype`, nearest first,
 * excluding `Object.prototype`.
 */
export function ancestorPrototypes(ctor: Constructor): object[] {
  const chain: object[] = [];
  const prototype: unknown = ctor.prototype;
  if (prototype === null || typeof prototype !== 'object') return chain;

  let current: object | null = Object.getPrototypeOf(prototype);
  while (current !== null && current !== Object.prototype) {
    chain.push(current);
    current = Object.getPrototypeOf(current);
  }
  return chain;
}
