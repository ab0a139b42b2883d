/**
 * @fileoverview Unit tests for instance providers
 */

import {
  ClassInstanceProvider,
  Container,
  ContainerInjector,
  FactoryInstanceProvider,
  ImplementationError,
  ImplementationInstanceProvider,
  InstanceTypeError,
  InstanceValueProvider,
  inject,
} from '../../../src';
import {
  Clock,
  Config,
  Database,
  FixedClock,
  OtherClock,
  SlowClock,
} from '../../fixtures/services';
import { catchError } from '../../helpers/assertions';

describe('Instance Providers', () => {
  let container: Container;
  let injector: ContainerInjector;

  beforeEach(() => {
    container = new Container();
    injector = new ContainerInjector(container);
  });

  // ==========================================================================
  // InstanceValueProvider
  // ==========================================================================

  describe('InstanceValueProvider', () => {
    it('should return the supplied value', () => {
      const config = new Config();

      expect(new InstanceValueProvider(Config, config).get()).toBe(config);
    });

    it('should accept a subclass instance', () => {
      const clock = new SlowClock();

      expect(new InstanceValueProvider(Clock, clock).get()).toBe(clock);
    });

    it('should reject a value of another type', () => {
      const provider = new InstanceValueProvider(Clock, new OtherClock());

      const error = catchError(() => provider.get(), InstanceTypeError);
      expect(error.actualTypeName).toBe('OtherClock');
    });
  });

  // ==========================================================================
  // FactoryInstanceProvider
  // ==========================================================================

  describe('FactoryInstanceProvider', () => {
    it('should call the factory with autowired parameters', () => {
      container.addSingletonClass(Config);
      const provider = new FactoryInstanceProvider(
        Database,
        inject([Config], (config: Config) => new Database(config)),
        injector
      );

      expect(provider.get().config).toBe(container.get(Config));
    });

    it('should accept a subclass from the factory', () => {
      const provider = new FactoryInstanceProvider(Clock, () => new FixedClock(), injector);

      expect(provider.get()).toBeInstanceOf(FixedClock);
    });

    it('should reject a null result', () => {
      // JSON.parse stands in for a factory that breaks its declared type at runtime
      const provider = new FactoryInstanceProvider(Config, () => JSON.parse('null'), injector);

      const error = catchError(() => provider.get(), InstanceTypeError);
      expect(error.message).toBe('Expected an instance of Config, got null');
    });

    it('should reject an instance of an unrelated class', () => {
      const provider = new FactoryInstanceProvider(Clock, () => new OtherClock(), injector);

      expect(() => provider.get()).toThrow(InstanceTypeError);
    });
  });

  // ==========================================================================
  // ClassInstanceProvider
  // ==========================================================================

  describe('ClassInstanceProvider', () => {
    it('should construct the class with autowired parameters', () => {
      container.addSingletonClass(Config);

      const database = new ClassInstanceProvider(Database, undefined, injector).get();

      expect(database).toBeInstanceOf(Database);
      expect(database.config).toBe(container.get(Config));
    });

    it('should pass the new instance to the mutator', () => {
      const mutator = jest.fn((config: Config) => config.dsn);

      const config = new ClassInstanceProvider(Config, mutator, injector).get();

      expect(mutator).toHaveBeenCalledWith(config);
    });

    it('should autowire the remaining mutator parameters', () => {
      container.addSingletonInstance(Clock, new FixedClock());
      const seen: number[] = [];

      new ClassInstanceProvider(
        Config,
        inject([Config, Clock], (_config: Config, clock: Clock) => {
          seen.push(clock.now());
        }),
        injector
      ).get();

      expect(seen).toEqual([1000]);
    });
  });

  // ==========================================================================
  // ImplementationInstanceProvider
  // ==========================================================================

  describe('ImplementationInstanceProvider', () => {
    it('should resolve the implementation from the container', () => {
      container.addSingletonClass(FixedClock);
      const provider = new ImplementationInstanceProvider(Clock, FixedClock, container);

      expect(provider.get()).toBe(container.get(FixedClock));
    });

    it('should accept an indirect subclass', () => {
      container.addSingletonClass(SlowClock);

      expect(new ImplementationInstanceProvider(Clock, SlowClock, container).get().now()).toBe(500);
    });

    it('should reject the type itself at construction', () => {
      const error = catchError(
        () => new ImplementationInstanceProvider(Clock, Clock, container),
        ImplementationError
      );

      expect(error.type).toBe(Clock);
      expect(error.implementation).toBe(Clock);
    });

    it('should reject a class outside the hierarchy at construction', () => {
      expect(() => new ImplementationInstanceProvider(Clock, OtherClock, container)).toThrow(
        ImplementationError
      );
    });
  });
});
