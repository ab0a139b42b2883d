/**
 * @fileoverview Unit tests for lifetime strategies
 */

import {
  SingletonStrategy,
  TransientStrategy,
  singletonStrategyFactory,
  transientStrategyFactory,
} from '../../../src';
import { Config } from '../../fixtures/services';

describe('Lifetime Strategies', () => {
  describe('SingletonStrategy', () => {
    it('should return the factory result', () => {
      const strategy = new SingletonStrategy(Config);

      expect(strategy.get(() => new Config())).toBeInstanceOf(Config);
    });

    it('should call the factory only once', () => {
      const strategy = new SingletonStrategy(Config);
      const factory = jest.fn(() => new Config());

      const first = strategy.get(factory);
      const second = strategy.get(factory);

      expect(second).toBe(first);
      expect(factory).toHaveBeenCalledTimes(1);
    });

    it('should ignore later factories once a value is stored', () => {
      const strategy = new SingletonStrategy(Config);
      const first = strategy.get(() => new Config());
      const other = jest.fn(() => new Config());

      expect(strategy.get(other)).toBe(first);
      expect(other).not.toHaveBeenCalled();
    });

    it('should store nothing when the factory throws', () => {
      const strategy = new SingletonStrategy(Config);
      const failing = (): Config => {
        throw new Error('boom');
      };

      expect(() => strategy.get(failing)).toThrow('boom');

      const recovered = new Config();
      expect(strategy.get(() => recovered)).toBe(recovered);
    });

    it('should expose its type', () => {
      expect(new SingletonStrategy(Config).type).toBe(Config);
    });
  });

  describe('TransientStrategy', () => {
    it('should call the factory every time', () => {
      const strategy = new TransientStrategy(Config);
      const factory = jest.fn(() => new Config());

      const first = strategy.get(factory);
      const second = strategy.get(factory);

      expect(second).not.toBe(first);
      expect(factory).toHaveBeenCalledTimes(2);
    });
  });

  describe('Strategy factories', () => {
    it('should create a fresh strategy per call', () => {
      const a = singletonStrategyFactory(Config);
      const b = singletonStrategyFactory(Config);

      expect(a).toBeInstanceOf(SingletonStrategy);
      expect(a).not.toBe(b);
      expect(a.get(() => new Config())).not.toBe(b.get(() => new Config()));
    });

    it('should create transient strategies', () => {
      const strategy = transientStrategyFactory(Config);

      expect(strategy).toBeInstanceOf(TransientStrategy);
      expect(strategy.type).toBe(Config);
    });
  });
});
