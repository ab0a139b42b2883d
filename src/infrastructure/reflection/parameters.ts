/**
 * @fileoverview Parameter inspection
 *
 * Produces the ordered parameter list of a constructor or function: name,
 * declared type, whether a default exists, whether `null` is acceptable, and
 * the contexts attached to it.
 *
 * ## Sources
 *
 * | Callable | Types | Names | Defaults |
 * |----------|-------|-------|----------|
 * | Class constructor | `design:paramtypes`, `@Inject` | `@Named` | `Function.length` |
 * | Function | {@link inject} declarations | {@link inject} declarations | `Function.length` |
 *
 * `Function.length` counts the parameters before the first one with a
 * default value, so every parameter at or past that index is taken to have
 * one. A required parameter declared after a defaulted one cannot be told
 * apart at runtime; mark it with `@Required()` (or `required: true` in an
 * {@link inject} declaration) so that it fails when unresolvable.
 *
 * @module wirestack/infrastructure/reflection
 */

import 'reflect-metadata';

import {
  METADATA_KEYS,
  getDeclaredContexts,
  getParameterAnnotation,
  getTypeName,
  readOwnMetadata,
} from './metadata';
import {
  AnyFunction,
  ContextName,
  ServiceType,
  isServiceType,
} from './types';

/**
 * One parameter of a callable.
 */
export interface ParameterDescriptor {
  /** Zero-based position */
  index: number;

  /** Name for explicit argument lookup, when declared */
  name?: string;

  /** Type resolved from the container, when known */
  type?: ServiceType;

  /** The parameter has a JavaScript default value */
  hasDefault: boolean;

  /** `null` is acceptable when nothing else supplies a value */
  nullable: boolean;

  /** Contexts pushed while resolving this parameter */
  contexts: readonly ContextName[];
}

/**
 * A callable together with its parameter list.
 */
export interface CallableDescriptor {
  /** Display name used in error messages */
  name: string;

  /** Parameters in declaration order */
  parameters: readonly ParameterDescriptor[];

  /**
   * Contexts of the declaring class (constructors only).
   */
  ownerContexts: readonly ContextName[];

  /** Contexts declared on the callable itself */
  contexts: readonly ContextName[];
}

/**
 * Parameter declaration for a plain function.
 *
 * @remarks
 * A bare class stands for `{ type: TheClass }`.
 */
export type ParameterDeclaration =
  | ServiceType
  | {
      type?: ServiceType;
      name?: string;
      optional?: boolean;
      /** No default value even though it follows a defaulted parameter */
      required?: boolean;
      context?: ContextName[];
    };

/**
 * Options for {@link inject}.
 */
export interface InjectOptions {
  /** Contexts applied to every parameter of the function */
  context?: ContextName[];
}

/**
 * Instance types of a tuple of service types.
 */
export type InstanceTypes<P extends ServiceType[]> = {
  [K in keyof P]: P[K] extends ServiceType<infer T> ? T : never;
};

const DESIGN_PARAMTYPES = 'design:paramtypes';

interface FunctionDeclaration {
  parameters: ParameterDeclaration[];
  contexts: ContextName[];
}

// ============================================================================
// Declarations
// ============================================================================

/**
 * Declare the parameters of a plain function so the injector can supply them.
 *
 * @remarks
 * TypeScript emits no parameter metadata for functions, so factories,
 * mutators and callables passed to `Injector.call()` declare theirs here.
 * Returns the function itself.
 *
 * @example Typed form
 * ```typescript
 * const createMailer = inject([Config, Logger], (config, logger) =>
 *   new Mailer(config.smtpUrl, logger)
 * );
 * ```
 *
 * @example Declaration objects
 * ```typescript
 * const greet = inject(
 *   [{ name: 'who' }, { type: Logger, optional: true }],
 *   (who: string, logger: Logger | null) => logger?.info(`hello ${who}`)
 * );
 *
 * injector.call(greet, { who: 'world' });
 * ```
 */
export function inject<P extends ServiceType[], R>(
  types: [...P],
  fn: (...args: InstanceTypes<P>) => R,
  options?: InjectOptions
): (...args: InstanceTypes<P>) => R;
export function inject<F extends AnyFunction>(
  parameters: ParameterDeclaration[],
  fn: F,
  options?: InjectOptions
): F;
export function inject(
  parameters: ParameterDeclaration[],
  fn: AnyFunction,
  options: InjectOptions = {}
): AnyFunction {
  const declaration: FunctionDeclaration = {
    parameters: [...parameters],
    contexts: [...(options.context ?? [])],
  };
  Reflect.defineMetadata(METADATA_KEYS.function, declaration, fn);
  return fn;
}

// ============================================================================
// Inspection
// ============================================================================

/**
 * Describe the constructor of a class.
 *
 * @remarks
 * A class without its own decorated constructor uses the parameters and the
 * class-level contexts of the nearest ancestor that has one.
 *
 * Parameters at or past `Function.length` are reported as defaulted unless
 * annotated with `@Required()`: in `constructor(a: A, b = 1, c: C)` the
 * runtime reports a length of 1, and `c` is indistinguishable from a
 * defaulted parameter.
 */
export function describeConstructor(type: ServiceType): CallableDescriptor {
  const owner = findParameterTypesOwner(type);
  const emitted = owner ? readParameterTypes(owner) : [];
  const declaredLength = owner ? owner.length : type.length;
  const count = Math.max(emitted.length, declaredLength);

  const parameters: ParameterDescriptor[] = [];
  for (let index = 0; index < count; index++) {
    const annotation = getParameterAnnotation(owner ?? type, index);
    parameters.push({
      index,
      name: annotation.name,
      type: annotation.type ?? emitted[index],
      hasDefault: index >= declaredLength && !annotation.required,
      nullable: annotation.optional ?? false,
      contexts: annotation.contexts ?? [],
    });
  }

  return {
    name: `${getTypeName(type)} constructor`,
    parameters,
    ownerContexts: getDeclaredContexts(owner ?? type),
    contexts: [],
  };
}

/**
 * Describe a plain function.
 *
 * @remarks
 * Undeclared functions report `fn.length` untyped, unnamed parameters;
 * those can only be supplied as explicit arguments by position.
 */
export function describeFunction(fn: AnyFunction): CallableDescriptor {
  const declaration = readOwnMetadata<FunctionDeclaration | undefined>(
    METADATA_KEYS.function,
    fn,
    undefined
  );
  const declared = declaration?.parameters ?? [];
  const count = Math.max(declared.length, fn.length);

  const parameters: ParameterDescriptor[] = [];
  for (let index = 0; index < count; index++) {
    const entry = declared[index];
    const hasDefault = index >= fn.length;

    if (entry === undefined) {
      parameters.push({ index, hasDefault, nullable: false, contexts: [] });
    } else if (isServiceType(entry)) {
      parameters.push({ index, type: entry, hasDefault, nullable: false, contexts: [] });
    } else {
      parameters.push({
        index,
        name: entry.name,
        type: entry.type,
        hasDefault: hasDefault && !entry.required,
        nullable: entry.optional ?? false,
        contexts: entry.context ?? [],
      });
    }
  }

  return {
    name: fn.name ? `${fn.name}()` : 'anonymous function',
    parameters,
    ownerContexts: [],
    contexts: [...(declaration?.contexts ?? []), ...getDeclaredContexts(fn)],
  };
}

/**
 * Walk the prototype chain to the class that declares the constructor.
 *
 * A subclass without its own constructor inherits its parent's parameters.
 */
function findParameterTypesOwner(type: ServiceType): ServiceType | undefined {
  let current: unknown = type;
  while (isServiceType(current)) {
    if (Reflect.hasOwnMetadata(DESIGN_PARAMTYPES, current)) {
      return current;
    }
    current = Object.getPrototypeOf(current);
  }
  return undefined;
}

function readParameterTypes(owner: ServiceType): (ServiceType | undefined)[] {
  const emitted: unknown = Reflect.getOwnMetadata(DESIGN_PARAMTYPES, owner);
  if (!Array.isArray(emitted)) {
    return [];
  }
  return emitted.map((entry: unknown) => (isServiceType(entry) ? entry : undefined));
}
