import type { MockInstance } from 'vitest';
import { vi } from 'vitest';

import type { TypeRegistry } from '../../registry';
import { createCoercionEngine } from '..';
import type { CoercionEngine } from '..';

/**
 * A value type used as the coercion target in most suites.
 */
export class Money {
  constructor(readonly amount: number) {}
}

/**
 * Registered subtype of {@link Money}.
 */
export class Refund extends Money {}

/**
 * Engine with `Money` and `Refund` defined, plus a spy on the registry's
 * capability query.
 */
export type EngineFixture = {
  engine: CoercionEngine;
  exposes: MockInstance<TypeRegistry['exposes']>;
};

/**
 * Creates a fresh engine with its own registry and cache, so suites never
 * share resolutions.
 */
export function createEngineFixture(): EngineFixture {
  const engine = createCoercionEngine();
  engine.registry.define('Shop::Money', Money);
  engine.registry.define('Shop::Refund', Refund);
  const exposes = vi.spyOn(engine.registry, 'exposes');
  return { engine, exposes };
}
