import { describe, expect, test } from 'vitest';

import { createCoercion } from '../../coercion';

/**
 * End-to-end walk through the public surface of one isolated namespace.
 */
describe('Coercion scenario', () => {
  class Bar {
    constructor(readonly source: string) {}
  }

  class Foo {
    constructor(readonly label: string) {}

    __as_Bar() {
      return new Bar(this.label);
    }
  }

  test('push conversion, identity and unboxed input', () => {
    const { defineType, coerce } = createCoercion();
    defineType('Foo', Foo);
    defineType('Bar', Bar);

    const converted = coerce('Bar', new Foo('from foo'));
    expect(converted).toBeInstanceOf(Bar);
    expect(converted).toMatchObject({ source: 'from foo' });

    const bar = new Bar('original');
    expect(coerce('Bar', bar)).toBe(bar);

    expect(coerce('Bar', 42)).toBeUndefined();
  });

  test('namespaces do not share types or resolutions', () => {
    const first = createCoercion();
    const second = createCoercion();
    first.defineType('Foo', Foo);
    first.defineType('Bar', Bar);
    second.defineType('Foo', Foo);

    expect(first.coerce('Bar', new Foo('x'))).toBeInstanceOf(Bar);
    expect(() => second.coerce('Bar', new Foo('x'))).toThrow(
      '[coercible] Tried to coerce to type "Bar", which is not loaded.'
    );
    expect(first.cache.size).toBe(1);
    expect(second.cache.size).toBe(0);
  });
});
