/**
 * @fileoverview Dependency injection errors
 *
 * @packageDocumentation
 * @module wirestack/domain/exceptions
 *
 * ## Hierarchy
 *
 * ```
 * DependencyInjectionError
 * ├─ UnresolvedDependencyError
 * │  ├─ UnresolvedTypeError
 * │  └─ UnresolvedParameterError
 * ├─ CircularDependencyError
 * ├─ ImplementationError
 * ├─ InstanceTypeError
 * ├─ DuplicateBindingError
 * ├─ UnknownContextError
 * ├─ ContextStackError
 * └─ ResolutionFrameError
 * ```
 *
 * ## Composition
 *
 * An error raised while handling another dependency injection error folds the
 * earlier message into its own, so the top-level message reads as a trail
 * from the outermost request down to the original failure:
 *
 * ```
 * Unable to resolve parameter #0 (repository) of UserService constructor
 * Unable to resolve type UserRepository
 * ```
 */

import {
  ContextName,
  ServiceType,
  describeContext,
  getTypeName,
} from '../../infrastructure/reflection';

/**
 * Base class of every error thrown by the containers and injectors.
 *
 * @remarks
 * When `previous` is itself a `DependencyInjectionError`, its message is
 * appended on a new line and it is kept as {@link consolidated} rather than
 * as `cause`. Any other `previous` becomes the standard `cause`.
 *
 * @example
 * ```typescript
 * try {
 *   container.get(ReportService);
 * } catch (error) {
 *   if (error instanceof DependencyInjectionError) {
 *     console.error(error.message);
 *   }
 * }
 * ```
 */
export class DependencyInjectionError extends Error {
  /**
   * The dependency injection error this one was composed from.
   */
  public readonly consolidated?: DependencyInjectionError;

  constructor(message: string, previous?: unknown) {
    const consolidated = previous instanceof DependencyInjectionError ? previous : undefined;

    super(
      consolidated ? `${message}\n${consolidated.message}` : message,
      consolidated || previous === undefined ? undefined : { cause: previous }
    );

    this.name = 'DependencyInjectionError';
    this.consolidated = consolidated;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Something that was asked for could not be supplied.
 */
export class UnresolvedDependencyError extends DependencyInjectionError {
  constructor(message: string, previous?: unknown) {
    super(message, previous);
    this.name = 'UnresolvedDependencyError';
  }
}

/**
 * No binding, nested container or context can supply the type.
 */
export class UnresolvedTypeError extends UnresolvedDependencyError {
  constructor(
    public readonly type: ServiceType,
    previous?: unknown
  ) {
    super(`Unable to resolve type ${getTypeName(type)}`, previous);
    this.name = 'UnresolvedTypeError';
  }
}

/**
 * A required parameter of a constructor or function could not be supplied.
 */
export class UnresolvedParameterError extends UnresolvedDependencyError {
  constructor(
    public readonly callableName: string,
    public readonly parameterIndex: number,
    public readonly parameterName: string | undefined,
    public readonly type: ServiceType | undefined,
    previous?: unknown
  ) {
    super(
      `Unable to resolve parameter ${describeParameter(parameterIndex, parameterName, type)} of ${callableName}`,
      previous
    );
    this.name = 'UnresolvedParameterError';
  }
}

/**
 * A type was requested again while it was still being resolved by the same
 * container.
 *
 * @example
 * ```
 * Circular dependency detected while resolving ServiceA
 * ServiceA
 * └─ ServiceB
 *    └─ ServiceA
 * ```
 */
export class CircularDependencyError extends DependencyInjectionError {
  /**
   * Visual dependency path, outermost first, ending with the repeated type.
   */
  public readonly dependencyGraph: string;

  constructor(
    public readonly type: ServiceType,
    public readonly path: readonly ServiceType[]
  ) {
    const graph = buildDependencyGraph([...path, type]);
    super(`Circular dependency detected while resolving ${getTypeName(type)}\n${graph}`);
    this.name = 'CircularDependencyError';
    this.dependencyGraph = graph;
  }
}

/**
 * An implementation binding names a class that is not a strict subclass of
 * the bound type.
 */
export class ImplementationError extends DependencyInjectionError {
  constructor(
    public readonly type: ServiceType,
    public readonly implementation: ServiceType
  ) {
    super(
      implementation === type
        ? `Implementation of ${getTypeName(type)} cannot be the type itself`
        : `${getTypeName(implementation)} is not a subclass of ${getTypeName(type)}`
    );
    this.name = 'ImplementationError';
  }
}

/**
 * A provider produced `null`, `undefined` or a value of another type.
 */
export class InstanceTypeError extends DependencyInjectionError {
  constructor(
    public readonly type: ServiceType,
    public readonly actualTypeName: string
  ) {
    super(`Expected an instance of ${getTypeName(type)}, got ${actualTypeName}`);
    this.name = 'InstanceTypeError';
  }
}

/**
 * A binding was added for a type that is already bound, and the container
 * rejects duplicates.
 */
export class DuplicateBindingError extends DependencyInjectionError {
  constructor(public readonly type: ServiceType) {
    super(`A binding for ${getTypeName(type)} already exists`);
    this.name = 'DuplicateBindingError';
  }
}

export class UnknownContextError extends DependencyInjectionError {
  constructor(public readonly context: ContextName) {
    super(`Unknown context "${describeContext(context)}"`);
    this.name = 'UnknownContextError';
  }
}

/**
 * Pop on an empty context stack.
 */
export class ContextStackError extends DependencyInjectionError {
  constructor(message = 'Context stack is empty') {
    super(message);
    this.name = 'ContextStackError';
  }
}

/**
 * A resolution frame left out of order. Signals a container that does not
 * pair `enter()` and `leave()` around each resolution.
 */
export class ResolutionFrameError extends DependencyInjectionError {
  constructor(
    public readonly type: ServiceType,
    public readonly innermost: ServiceType | undefined
  ) {
    super(
      `Resolution frame mismatch for ${getTypeName(type)}` +
        (innermost ? ` (innermost frame: ${getTypeName(innermost)})` : ' (no active frame)')
    );
    this.name = 'ResolutionFrameError';
  }
}

// ============================================================================
// Formatting
// ============================================================================

function describeParameter(
  index: number,
  name: string | undefined,
  type: ServiceType | undefined
): string {
  const details = [name, type ? getTypeName(type) : undefined].filter(Boolean).join(': ');
  return details ? `#${index} (${details})` : `#${index}`;
}

/**
 * Render a resolution path as an indented tree.
 */
function buildDependencyGraph(path: readonly ServiceType[]): string {
  return path
    .map((type, depth) => {
      if (depth === 0) {
        return getTypeName(type);
      }
      return `${'   '.repeat(depth - 1)}└─ ${getTypeName(type)}`;
    })
    .join('\n');
}
