import { describe, expect, test, vi } from 'vitest';

import { InvalidTypeNameError, TargetNotLoadedError } from '../../errors';
import { NO_CONVERSION } from '../../types';
import { Money, Refund, createEngineFixture } from './helpers';

/**
 * Test suite: directive discovery, caching and execution.
 *
 * Related coverage:
 * - Identity and unboxed values live in engine.identity.test.ts.
 * - External converters live in engine.bridge.test.ts.
 */
describe('Directive resolution', () => {
  describe('Push and pull', () => {
    test('push wins when both conversion methods exist', () => {
      const { engine } = createEngineFixture();
      const pullSpy = vi.fn();

      class Wallet extends Money {
        static __from_Cents = pullSpy;
      }
      const pushed = new Wallet(1);
      class Cents {
        __as_Wallet() {
          return pushed;
        }
      }
      engine.registry.define('Wallet', Wallet);
      engine.registry.define('Cents', Cents);

      expect(engine.coerce('Wallet', new Cents())).toBe(pushed);
      expect(engine.resolve('Cents', 'Wallet')).toStrictEqual({
        kind: 'push',
        method: '__as_Wallet'
      });
      expect(pullSpy).not.toHaveBeenCalled();
    });

    test('calls the push method on the source with no arguments', () => {
      const { engine } = createEngineFixture();
      const calls: { self: unknown; args: unknown[] }[] = [];

      class Cents {
        constructor(readonly value: number) {}

        __as_Shop_Money(...args: unknown[]) {
          calls.push({ self: this, args });
          return new Money(this.value / 100);
        }
      }
      engine.registry.define('Cents', Cents);
      const cents = new Cents(250);

      const result = engine.coerce('Shop::Money', cents);

      expect(result).toBeInstanceOf(Money);
      expect(result).toMatchObject({ amount: 2.5 });
      expect(calls).toStrictEqual([{ self: cents, args: [] }]);
    });

    test('falls back to pull on the target class', () => {
      const { engine } = createEngineFixture();
      const calls: { self: unknown; args: unknown[] }[] = [];

      class Cents {
        constructor(readonly value: number) {}
      }
      class Ledger {
        static __from_Cents(this: unknown, ...args: unknown[]) {
          calls.push({ self: this, args });
          return new Ledger();
        }
      }
      engine.registry.define('Cents', Cents);
      engine.registry.define('Ledger', Ledger);
      const cents = new Cents(250);

      const result = engine.coerce('Ledger', cents);

      expect(result).toBeInstanceOf(Ledger);
      expect(calls).toStrictEqual([{ self: Ledger, args: [cents] }]);
      expect(engine.resolve('Cents', 'Ledger')).toStrictEqual({
        kind: 'pull',
        method: '__from_Cents'
      });
    });

    test('derives method names from namespaced types', () => {
      const { engine } = createEngineFixture();

      class Points {}
      class Coupon {
        static __from_Loyalty_Points() {
          return new Coupon();
        }
      }
      engine.registry.define('Loyalty.Points', Points);
      engine.registry.define('::Coupon', Coupon);

      expect(engine.coerce('::Coupon', new Points())).toBeInstanceOf(Coupon);
      expect(engine.cache.lookup('Loyalty.Points', 'main::Coupon')).toStrictEqual(
        { kind: 'pull', method: '__from_Loyalty_Points' }
      );
    });
  });

  describe('Caching', () => {
    test('caches a failed resolution and skips discovery afterwards', () => {
      const { engine, exposes } = createEngineFixture();
      class Receipt {}
      engine.registry.define('Receipt', Receipt);

      expect(engine.coerce('Shop::Money', new Receipt())).toBeUndefined();
      expect(exposes).toHaveBeenCalledTimes(2);
      expect(engine.cache.lookup('Receipt', 'Shop::Money')).toBe(NO_CONVERSION);

      expect(engine.coerce('Shop::Money', new Receipt())).toBeUndefined();
      expect(exposes).toHaveBeenCalledTimes(2);
    });

    test('returns consistent results for repeated coercions', () => {
      const { engine, exposes } = createEngineFixture();
      class Cents {
        __as_Shop_Money() {
          return new Money(1);
        }
      }
      engine.registry.define('Cents', Cents);

      const first = engine.coerce('Shop::Money', new Cents());
      const second = engine.coerce('Shop::Money', new Cents());

      expect(first).toBeInstanceOf(Money);
      expect(second).toBeInstanceOf(Money);
      expect(exposes).toHaveBeenCalledTimes(1);
      expect(engine.cache.size).toBe(1);
    });

    test('keys an unregistered subclass on its nearest registered type', () => {
      const { engine } = createEngineFixture();
      class Cents {
        __as_Shop_Money() {
          return new Money(5);
        }
      }
      class LooseCents extends Cents {}
      engine.registry.define('Cents', Cents);

      expect(engine.coerce('Shop::Money', new LooseCents())).toMatchObject({
        amount: 5
      });
      expect(engine.cache.has('Cents', 'Shop::Money')).toBe(true);
      expect(engine.cache.size).toBe(1);
    });

    test('gives a subtype its own entry', () => {
      const { engine } = createEngineFixture();
      class Animal {
        __as_Shop_Money() {
          return new Money(3);
        }
      }
      class Dog extends Animal {}
      engine.registry.define('Animal', Animal);
      engine.registry.define('Dog', Dog);

      expect(engine.coerce('Shop::Money', new Dog())).toBeInstanceOf(Money);
      expect(engine.cache.has('Dog', 'Shop::Money')).toBe(true);
      expect(engine.cache.has('Animal', 'Shop::Money')).toBe(false);
    });
  });

  describe('Result verification', () => {
    class Receipt {}

    test.for([
      ['a primitive', (): number => 42],
      ['undefined', (): undefined => undefined],
      ['a plain object', () => ({ amount: 1 })],
      ['an unrelated typed instance', () => new Receipt()],
      ['a supertype instance', () => new Money(1)]
    ] as const)('rejects %s produced by the push method', ([, produce]) => {
      const { engine } = createEngineFixture();
      engine.registry.define('Receipt', Receipt);

      class Cents {
        __as_Shop_Refund() {
          return produce();
        }
      }
      engine.registry.define('Cents', Cents);

      expect(engine.coerce('Shop::Refund', new Cents())).toBeUndefined();
    });

    class Coin extends Money {}
    class PartialRefund extends Refund {}

    test.for([
      ['a registered subtype', () => new Refund(4)],
      ['an unregistered subclass', () => new Coin(2)],
      ['an unregistered subclass of a subtype', () => new PartialRefund(1)]
    ] as const)('accepts %s of the target', ([, produce]) => {
      const { engine } = createEngineFixture();
      const produced = produce();
      class Cents {
        __as_Shop_Money() {
          return produced;
        }
      }
      engine.registry.define('Cents', Cents);

      expect(engine.coerce('Shop::Money', new Cents())).toBe(produced);
    });

    test('propagates errors thrown by a conversion method', () => {
      const { engine } = createEngineFixture();
      class Broken {
        __as_Shop_Money(): Money {
          throw new RangeError('negative amount');
        }
      }
      engine.registry.define('Broken', Broken);

      expect(() => engine.coerce('Shop::Money', new Broken())).toThrow(
        RangeError
      );
      expect(engine.cache.lookup('Broken', 'Shop::Money')?.kind).toBe('push');
    });
  });

  describe('Target checks', () => {
    test('rejects a malformed target name before anything else', () => {
      const { engine, exposes } = createEngineFixture();

      expect(() => engine.coerce('Shop::', new Money(1))).toThrow(
        InvalidTypeNameError
      );
      expect(() => engine.coerce('', 42)).toThrow(
        '[coercible] Illegal type name "".'
      );
      expect(exposes).not.toHaveBeenCalled();
    });

    test('refuses to resolve against a type that is not defined yet', () => {
      const { engine } = createEngineFixture();
      class Coupon {
        static __from_Shop_Money() {
          return new Coupon();
        }
      }

      expect(() => engine.coerceValidated('Shop::Coupon', new Money(1))).toThrow(
        '[coercible] Cannot resolve "Shop::Money" -> "Shop::Coupon": type "Shop::Coupon" is not loaded.'
      );
      expect(() => engine.resolve('Ghost', 'Shop::Money')).toThrow(
        TargetNotLoadedError
      );
      expect(engine.cache.size).toBe(0);

      engine.registry.define('Shop::Coupon', Coupon);

      expect(engine.coerce('Shop::Coupon', new Money(1))).toBeInstanceOf(Coupon);
    });

    test('rejects an unloaded target without running its loader', () => {
      const { engine } = createEngineFixture();
      const loader = vi.fn();
      engine.registry.provide('Shop::Coupon', loader);

      expect(() => engine.coerce('Shop::Coupon', new Money(1))).toThrow(
        TargetNotLoadedError
      );
      expect(() => engine.coerce('Shop::Coupon', 42)).toThrow(
        '[coercible] Tried to coerce to type "Shop::Coupon", which is not loaded.'
      );
      expect(loader).not.toHaveBeenCalled();
    });
  });

  describe('coerceTo', () => {
    test('narrows the result to the class instance type', () => {
      const { engine } = createEngineFixture();
      class Cents {
        __as_Shop_Money() {
          return new Money(7);
        }
      }
      engine.registry.define('Cents', Cents);

      const money: Money | undefined = engine.coerceTo(Money, new Cents());

      expect(money?.amount).toBe(7);
    });

    test('rejects nominal-only subtypes that do not inherit from the class', () => {
      const { engine } = createEngineFixture();
      class Voucher {}
      engine.registry.define('Voucher', Voucher, { isa: ['Shop::Money'] });
      const voucher = new Voucher();

      expect(engine.coerce('Shop::Money', voucher)).toBe(voucher);
      expect(engine.coerceTo(Money, voucher)).toBeUndefined();
    });

    test('requires the class to be registered', () => {
      const { engine } = createEngineFixture();
      class Coupon {}

      expect(() => engine.coerceTo(Coupon, new Money(1))).toThrow(
        '[coercible] Tried to coerce to class Coupon, which is not registered.'
      );
    });
  });
});
