/**
 * @fileoverview Decorators
 *
 * Decorators are thin writers over the `wirestack:*` reflect metadata. `@Injectable()`
 * exists so that TypeScript emits `design:paramtypes` for the class; all
 * other decorators record what the emitted metadata cannot express.
 *
 * Requires `experimentalDecorators` and `emitDecoratorMetadata`:
 *
 * ```json
 * {
 *   "compilerOptions": {
 *     "experimentalDecorators": true,
 *     "emitDecoratorMetadata": true
 *   }
 * }
 * ```
 *
 * @module wirestack/infrastructure/reflection
 */

import 'reflect-metadata';

import {
  annotate,
  annotateParameter,
  declareContext,
  registerNamespace,
} from './metadata';
import { ContextName, ServiceType } from './types';

/**
 * Parameter decorators receive the constructor typed as `Object`.
 */
function asOwner(target: unknown): object {
  if ((typeof target === 'object' && target !== null) || typeof target === 'function') {
    return target;
  }
  throw new TypeError('Decorators can only be applied to classes and constructor parameters');
}

/**
 * Marks a class for constructor autowiring.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class UserService {
 *   constructor(private readonly repository: UserRepository) {}
 * }
 * ```
 */
export function Injectable(): ClassDecorator {
  return () => undefined;
}

/**
 * Resolve a constructor parameter as `type` instead of its declared type.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Mailer {
 *   constructor(@Inject(SmtpTransport) transport: Transport) {}
 * }
 * ```
 */
export function Inject(type: ServiceType): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    annotateParameter(asOwner(target), parameterIndex, { type });
  };
}

/**
 * Name a constructor parameter so that explicit arguments can address it by name.
 */
export function Named(name: string): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    annotateParameter(asOwner(target), parameterIndex, { name });
  };
}

/**
 * Inject `null` when nothing can supply the parameter.
 */
export function Optional(): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    annotateParameter(asOwner(target), parameterIndex, { optional: true });
  };
}

/**
 * Declare that a constructor parameter has no default value.
 *
 * Needed only after a parameter that does have one, since those all count
 * as defaulted otherwise.
 *
 * @example
 * ```typescript
 * @Injectable()
 * class Exporter {
 *   constructor(retries = 3, @Required() readonly target: ExportTarget) {}
 * }
 * ```
 */
export function Required(): ParameterDecorator {
  return (target, _propertyKey, parameterIndex) => {
    annotateParameter(asOwner(target), parameterIndex, { required: true });
  };
}

/**
 * Push contexts while resolving dependencies.
 *
 * On a class, the contexts apply to every constructor parameter. On a
 * constructor parameter, they apply to that parameter only. Only a
 * {@link ContextInjector} reads them.
 *
 * @example
 * ```typescript
 * @Injectable()
 * @Context('reporting')
 * class ReportJob {
 *   constructor(
 *     readonly db: Database,                      // reporting → default
 *     @Context('audit') readonly log: AuditLog,   // audit → reporting → default
 *   ) {}
 * }
 * ```
 */
export function Context(...names: ContextName[]): ClassDecorator & ParameterDecorator {
  return (target: unknown, _propertyKey?: string | symbol, parameterIndex?: number): void => {
    if (typeof parameterIndex === 'number') {
      annotateParameter(asOwner(target), parameterIndex, { contexts: names });
    } else {
      declareContext(asOwner(target), ...names);
    }
  };
}

/**
 * Place a class in a dot-separated namespace.
 */
export function Namespace(namespace: string): ClassDecorator {
  return (target) => {
    registerNamespace(target, namespace);
  };
}

/**
 * Attach attribute instances to a class, for use with an {@link AttributeContainer}.
 */
export function Annotate(...attributes: object[]): ClassDecorator {
  return (target) => {
    annotate(target, ...attributes);
  };
}
