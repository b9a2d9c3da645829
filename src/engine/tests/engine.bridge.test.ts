import { describe, expect, test, vi } from 'vitest';

import { InvalidTypeNameError } from '../../errors';
import { Money, createEngineFixture } from './helpers';

class Cents {
  constructor(readonly value: number) {}
}

function centsToMoney(value: object): Money | undefined {
  return value instanceof Cents ? new Money(value.value / 100) : undefined;
}

describe('External converters (bridges)', () => {
  test('converts through a bridge when neither type has a method', () => {
    const { engine } = createEngineFixture();
    engine.registry.define('Cents', Cents);
    engine.bridge('Cents', 'Shop::Money', centsToMoney);

    const result = engine.coerce('Shop::Money', new Cents(150));

    expect(result).toBeInstanceOf(Money);
    expect(result).toMatchObject({ amount: 1.5 });
    expect(engine.resolve('Cents', 'Shop::Money')).toStrictEqual({
      kind: 'bridge',
      label: 'centsToMoney'
    });
  });

  test('normalizes names and accepts an explicit label', () => {
    const { engine } = createEngineFixture();
    class Ledger {}
    engine.registry.define('::Ledger', Ledger);
    engine.registry.define('Cents', Cents);
    engine.bridge('Cents', '::Ledger', () => new Ledger(), 'ledger-import');

    expect(engine.coerce('main::Ledger', new Cents(1))).toBeInstanceOf(Ledger);
    expect(engine.cache.lookup('Cents', 'main::Ledger')).toStrictEqual({
      kind: 'bridge',
      label: 'ledger-import'
    });
  });

  test('is consulted only after push and pull', () => {
    const { engine } = createEngineFixture();
    const convert = vi.fn(() => new Money(0));
    class Coins {
      __as_Shop_Money() {
        return new Money(9);
      }
    }
    engine.registry.define('Coins', Coins);
    engine.bridge('Coins', 'Shop::Money', convert);

    expect(engine.coerce('Shop::Money', new Coins())).toMatchObject({
      amount: 9
    });
    expect(convert).not.toHaveBeenCalled();
  });

  test('rejects a bridge result that is not an instance of the target', () => {
    const { engine } = createEngineFixture();
    engine.registry.define('Cents', Cents);
    engine.bridge('Cents', 'Shop::Money', () => ({ amount: 1 }));

    expect(engine.coerce('Shop::Money', new Cents(100))).toBeUndefined();
  });

  test('cannot be registered twice for one pair', () => {
    const { engine } = createEngineFixture();
    engine.bridge('Cents', 'Shop::Money', centsToMoney);

    expect(() => engine.bridge('Cents', 'Shop::Money', centsToMoney)).toThrow(
      '[coercible] A bridge from "Cents" to "Shop::Money" is already registered.'
    );
  });

  test('cannot replace a resolution that is already cached', () => {
    const { engine } = createEngineFixture();
    engine.registry.define('Cents', Cents);

    expect(engine.coerce('Shop::Money', new Cents(100))).toBeUndefined();
    expect(() => engine.bridge('Cents', 'Shop::Money', centsToMoney)).toThrow(
      '[coercible] Cannot bridge "Cents" to "Shop::Money": the pair is already resolved as none.'
    );
  });

  test('validates both type names', () => {
    const { engine } = createEngineFixture();

    expect(() => engine.bridge('Cents::', 'Shop::Money', centsToMoney)).toThrow(
      InvalidTypeNameError
    );
    expect(() => engine.bridge('Cents', '9Money', centsToMoney)).toThrow(
      '[coercible] Illegal type name "9Money".'
    );
  });
});
