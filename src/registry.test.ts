import { describe, expect, test, vi } from 'vitest';
import { MissingTypeAnnotationError, UnsupportedTypeError } from './errors.js';
import { defaultRegistry } from './lazy.js';
import { DelayedTypeRegistry } from './registry.js';

describe('DelayedTypeRegistry', () => {
  test('synthesizes one class per type', () => {
    const registry = new DelayedTypeRegistry('test');
    registry.create(() => 1, Number);
    registry.create(() => 2, Number);
    expect(registry.size).toBe(1);
    expect(registry.has(Number)).toBe(true);
    expect(registry.has(String)).toBe(false);

    registry.create(() => 'a', String);
    expect(registry.size).toBe(2);
    expect(registry.typeFor(Number)).toBe(registry.typeFor(Number));
  });

  test('names the synthesized class after the type', () => {
    const registry = new DelayedTypeRegistry('test');
    const delayedType = registry.typeFor(Number);
    expect(delayedType.name).toBe('Delayed(Number)');
    expect(delayedType.handleClass.name).toBe('Delayed(Number)');
    expect(delayedType.type).toBe(Number);
  });

  test('keeps types apart from other registries', () => {
    class Local {}
    const registry = new DelayedTypeRegistry('isolated');
    registry.create(() => new Local(), Local);
    expect(registry.has(Local)).toBe(true);
    expect(defaultRegistry.has(Local)).toBe(false);
  });

  test('does not register types it cannot introspect', () => {
    const registry = new DelayedTypeRegistry('test');
    const arrow = () => 0;
    expect(() => registry.typeFor(arrow)).toThrow(UnsupportedTypeError);
    expect(() => registry.typeFor(arrow)).toThrow('Cannot delay values of type arrow: it has no prototype to introspect');
    expect(registry.size).toBe(0);
  });

  test('requires a type', () => {
    const registry = new DelayedTypeRegistry('test');
    expect(() => registry.create(() => 1)).toThrow(MissingTypeAnnotationError);
    expect(registry.size).toBe(0);
  });

  describe('events', () => {
    test('type-registered fires once per type', () => {
      const registry = new DelayedTypeRegistry('test');
      const registered = vi.fn();
      registry.events.on('type-registered', registered);

      registry.create(() => 1, Number);
      registry.create(() => 2, Number);
      expect(registered).toHaveBeenCalledTimes(1);
      expect(registered).toHaveBeenCalledWith(registry.typeFor(Number), 1);
    });

    test('forced fires on the first operation only', () => {
      const registry = new DelayedTypeRegistry('test');
      const forced = vi.fn();
      registry.events.on('forced', forced);

      const handle = registry.create(() => 2, Number);
      expect(forced).not.toHaveBeenCalled();

      expect(handle + 1).toBe(3);
      expect(handle + 2).toBe(4);
      expect(forced).toHaveBeenCalledTimes(1);
      expect(forced).toHaveBeenCalledWith('Delayed(Number)');
    });

    test('producer-failed carries the thrown error', () => {
      const registry = new DelayedTypeRegistry('test');
      const failed = vi.fn();
      registry.events.on('producer-failed', failed);

      const error = new Error('boom');
      const handle = registry.create((): number => {
        throw error;
      }, Number);

      expect(() => handle + 1).toThrow(error);
      expect(failed).toHaveBeenCalledWith('Delayed(Number)', error);
    });
  });

  test('logs through the injected logger', () => {
    const logger = vi.fn();
    const registry = new DelayedTypeRegistry('unit', logger);

    let fail = true;
    const handle = registry.create(() => {
      if (fail) throw new Error('boom');
      return 2;
    }, Number);

    expect(() => handle + 1).toThrow('boom');
    fail = false;
    expect(handle + 1).toBe(3);

    expect(logger.mock.calls).toEqual([
      [expect.stringMatching(/^Registry\[unit\]: Registered Delayed\(Number\) with \d+ operations$/)],
      ['Registry[unit]: Producer for Delayed(Number) failed'],
      ['Registry[unit]: Forced Delayed(Number)'],
    ]);
  });
});
