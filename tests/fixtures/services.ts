/**
 * @fileoverview Shared test services
 *
 * Dependencies are declared before their dependants: `design:paramtypes`
 * is evaluated when a class is decorated.
 */

import {
  Annotate,
  Context,
  Inject,
  Injectable,
  Named,
  Namespace,
  Optional,
  Required,
} from '../../src';

// ============================================================================
// Basic Graph
// ============================================================================

export class Config {
  readonly dsn: string = 'memory://test';
}

export abstract class Clock {
  abstract now(): number;
}

export class FixedClock extends Clock {
  now(): number {
    return 1000;
  }
}

export class SlowClock extends FixedClock {
  override now(): number {
    return 500;
  }
}

/**
 * Same shape as {@link Clock}, outside its hierarchy.
 */
export class OtherClock {
  now(): number {
    return 42;
  }
}

@Injectable()
export class Database {
  constructor(readonly config: Config) {}
}

@Injectable()
export class UserRepository {
  constructor(readonly database: Database) {}
}

@Injectable()
export class UserService {
  constructor(
    readonly repository: UserRepository,
    readonly clock: Clock
  ) {}
}

// ============================================================================
// Parameter Shapes
// ============================================================================

@Injectable()
export class WithDefault {
  constructor(
    readonly config: Config,
    readonly retries: number = 3
  ) {}
}

@Injectable()
export class WithRequiredAfterDefault {
  constructor(
    readonly config: Config,
    readonly retries: number = 3,
    @Required() readonly clock: Clock
  ) {}
}

@Injectable()
export class WithOptional {
  constructor(@Optional() @Inject(Clock) readonly clock: Clock | null) {}
}

@Injectable()
export class WithNamed {
  constructor(
    @Named('label') readonly label: string,
    readonly config: Config
  ) {}
}

@Injectable()
export class WithInjectOverride {
  constructor(@Inject(FixedClock) readonly clock: Clock) {}
}

// ============================================================================
// Namespaces
// ============================================================================

@Namespace('app.billing')
@Injectable()
export class InvoiceService {
  constructor(readonly config: Config) {}
}

@Namespace('app.billing.tax')
export class TaxTable {}

@Namespace('app.shipping')
export class ShippingService {}

@Namespace('appendix')
export class Appendix {}

// ============================================================================
// Interfaces
// ============================================================================

export abstract class Handler {
  abstract handle(): string;
}

export class CreateUserHandler extends Handler {
  handle(): string {
    return 'create';
  }
}

@Injectable()
export class DeleteUserHandler extends Handler {
  constructor(readonly repository: UserRepository) {
    super();
  }

  handle(): string {
    return 'delete';
  }
}

// ============================================================================
// Attributes
// ============================================================================

export class Route {
  constructor(readonly path: string) {}
}

export class Tag {
  constructor(readonly label: string) {}
}

@Annotate(new Route('/users'))
@Injectable()
export class UsersController {
  constructor(readonly config: Config) {}
}

@Annotate(new Tag('health'), new Route('/health'))
@Injectable()
export class HealthController {
  constructor(@Named('path') readonly path: string) {}
}

@Annotate(new Tag('untracked'))
export class TaggedOnly {}

// ============================================================================
// Contexts
// ============================================================================

export abstract class Sink {
  abstract readonly kind: string;
}

export class ConsoleSink extends Sink {
  readonly kind: string = 'console';
}

export class AuditSink extends Sink {
  readonly kind: string = 'audit';
}

@Injectable()
export class Reporter {
  constructor(readonly sink: Sink) {}
}

@Injectable()
@Context('audit')
export class AuditedReporter {
  constructor(readonly sink: Sink) {}
}

@Injectable()
export class MixedReporter {
  constructor(
    @Context('audit') readonly audited: Sink,
    readonly plain: Sink
  ) {}
}

@Injectable()
@Context('missing')
export class MisconfiguredReporter {
  constructor(readonly sink: Sink) {}
}

@Injectable()
export class PartlyMisconfiguredReporter {
  constructor(@Context('audit', 'missing') readonly sink: Sink) {}
}

/** Inherits the constructor, and so the contexts, of AuditedReporter */
export class InheritedAuditedReporter extends AuditedReporter {}

/** Its constructor is declared by Reporter, which has no contexts */
@Context('audit')
export class ContextOnlyReporter extends Reporter {}
