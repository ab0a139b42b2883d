/**
 * @fileoverview Unit tests for the error hierarchy and error composition
 */

import {
  CircularDependencyError,
  ContextStackError,
  DependencyInjectionError,
  DuplicateBindingError,
  ImplementationError,
  InstanceTypeError,
  ResolutionFrameError,
  UnknownContextError,
  UnresolvedDependencyError,
  UnresolvedParameterError,
  UnresolvedTypeError,
} from '../../../src';
import { Clock, Config, Database, InvoiceService, OtherClock } from '../../fixtures/services';

describe('DependencyInjectionError', () => {
  // ==========================================================================
  // Composition
  // ==========================================================================

  describe('Composition', () => {
    it('should keep the message when nothing is composed', () => {
      const error = new DependencyInjectionError('Message1');

      expect(error.message).toBe('Message1');
      expect(error.consolidated).toBeUndefined();
      expect(error.cause).toBeUndefined();
    });

    it('should append the message of a composed dependency injection error', () => {
      const original = new DependencyInjectionError('Message1');
      const error = new DependencyInjectionError('Message2', original);

      expect(error.message).toBe('Message2\nMessage1');
      expect(error.consolidated).toBe(original);
      expect(error.cause).toBeUndefined();
    });

    it('should keep an unrelated error as the standard cause', () => {
      const previous = new Error('Message1');
      const error = new DependencyInjectionError('Message2', previous);

      expect(error.message).toBe('Message2');
      expect(error.cause).toBe(previous);
      expect(error.consolidated).toBeUndefined();
    });

    it('should compose through several levels', () => {
      const inner = new UnresolvedTypeError(Config);
      const middle = new DependencyInjectionError('middle', inner);
      const outer = new DependencyInjectionError('outer', middle);

      expect(outer.message).toBe('outer\nmiddle\nUnable to resolve type Config');
      expect(outer.consolidated?.consolidated).toBe(inner);
    });
  });

  // ==========================================================================
  // Hierarchy
  // ==========================================================================

  describe('Hierarchy', () => {
    it('should keep instanceof working for every subclass', () => {
      const errors = [
        new UnresolvedTypeError(Config),
        new UnresolvedParameterError('f()', 0, undefined, undefined),
        new CircularDependencyError(Config, []),
        new ImplementationError(Clock, Clock),
        new InstanceTypeError(Clock, 'null'),
        new DuplicateBindingError(Config),
        new UnknownContextError('audit'),
        new ContextStackError(),
        new ResolutionFrameError(Config, Database),
      ];

      for (const error of errors) {
        expect(error).toBeInstanceOf(DependencyInjectionError);
        expect(error).toBeInstanceOf(Error);
      }
      expect(errors[0]).toBeInstanceOf(UnresolvedDependencyError);
      expect(errors[1]).toBeInstanceOf(UnresolvedDependencyError);
      expect(errors[2]).not.toBeInstanceOf(UnresolvedDependencyError);
    });

    it('should name each error after its class', () => {
      expect(new UnresolvedTypeError(Config).name).toBe('UnresolvedTypeError');
      expect(new CircularDependencyError(Config, []).name).toBe('CircularDependencyError');
      expect(new ContextStackError().name).toBe('ContextStackError');
      expect(new ResolutionFrameError(Config, undefined).name).toBe('ResolutionFrameError');
    });
  });

  // ==========================================================================
  // Messages
  // ==========================================================================

  describe('Messages', () => {
    it('should name the unresolved type', () => {
      const error = new UnresolvedTypeError(Config);

      expect(error.message).toBe('Unable to resolve type Config');
      expect(error.type).toBe(Config);
    });

    it('should use the qualified name of a namespaced type', () => {
      expect(new UnresolvedTypeError(InvoiceService).message).toBe(
        'Unable to resolve type app.billing.InvoiceService'
      );
    });

    it('should describe the unresolved parameter', () => {
      expect(new UnresolvedParameterError('Database constructor', 0, undefined, Config).message).toBe(
        'Unable to resolve parameter #0 (Config) of Database constructor'
      );
      expect(new UnresolvedParameterError('send()', 1, 'to', undefined).message).toBe(
        'Unable to resolve parameter #1 (to) of send()'
      );
      expect(new UnresolvedParameterError('send()', 2, 'clock', Clock).message).toBe(
        'Unable to resolve parameter #2 (clock: Clock) of send()'
      );
      expect(new UnresolvedParameterError('send()', 3, undefined, undefined).message).toBe(
        'Unable to resolve parameter #3 of send()'
      );
    });

    it('should render the circular path as a tree', () => {
      const error = new CircularDependencyError(Config, [Config, Database]);

      expect(error.dependencyGraph).toBe('Config\n└─ Database\n   └─ Config');
      expect(error.message).toBe(
        'Circular dependency detected while resolving Config\nConfig\n└─ Database\n   └─ Config'
      );
      expect(error.path).toEqual([Config, Database]);
    });

    it('should explain both kinds of implementation errors', () => {
      expect(new ImplementationError(Clock, Clock).message).toBe(
        'Implementation of Clock cannot be the type itself'
      );
      expect(new ImplementationError(Clock, OtherClock).message).toBe(
        'OtherClock is not a subclass of Clock'
      );
    });

    it('should report the actual type of a wrong instance', () => {
      const error = new InstanceTypeError(Clock, 'OtherClock');

      expect(error.message).toBe('Expected an instance of Clock, got OtherClock');
      expect(error.actualTypeName).toBe('OtherClock');
    });

    it('should describe context errors', () => {
      expect(new UnknownContextError('audit').message).toBe('Unknown context "audit"');
      expect(new UnknownContextError(Symbol('tenant')).message).toBe('Unknown context "tenant"');
      expect(new ContextStackError().message).toBe('Context stack is empty');
      expect(new DuplicateBindingError(Config).message).toBe('A binding for Config already exists');
    });
  });
});
