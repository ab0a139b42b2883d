/**
 * wirestack v1.0.0 - Basic Example
 *
 * Demonstrates:
 * - Singleton and transient bindings
 * - Constructor autowiring with decorators
 * - Factories declared with inject()
 * - Interface containers for handler discovery
 * - Context-selected bindings
 * - Error reporting
 */

import 'reflect-metadata';

import {
  Container,
  Context,
  ContextContainer,
  DEFAULT_CONTEXT,
  DependencyInjectionError,
  Injectable,
  createConsoleLogger,
  inject,
} from '../src/index';

// ==================== Services ====================

class Settings {
  readonly greeting = 'Hello';
}

abstract class Clock {
  abstract now(): Date;
}

class SystemClock extends Clock {
  now(): Date {
    return new Date();
  }
}

@Injectable()
class Greeter {
  constructor(
    private readonly settings: Settings,
    private readonly clock: Clock
  ) {}

  greet(name: string): string {
    return `${this.settings.greeting}, ${name} (${this.clock.now().toISOString()})`;
  }
}

class Session {
  constructor(readonly startedAt: Date) {}
}

// ==================== Handlers ====================

abstract class CommandHandler {
  abstract execute(): string;
}

@Injectable()
class GreetCommandHandler extends CommandHandler {
  constructor(private readonly greeter: Greeter) {
    super();
  }

  execute(): string {
    return this.greeter.greet('world');
  }
}

// ==================== Contexts ====================

abstract class Storage {
  abstract readonly location: string;
}

class LocalStorage extends Storage {
  readonly location = 'local disk';
}

class ArchiveStorage extends Storage {
  readonly location = 'cold archive';
}

@Injectable()
@Context('archive')
class ArchiveJob {
  constructor(readonly storage: Storage) {}
}

@Injectable()
class ExportJob {
  constructor(readonly storage: Storage) {}
}

// ==================== Main ====================

function main(): void {
  console.log('═══════════════════════════════════════════════════════════');
  console.log('  wirestack v1.0.0 - Container Demo');
  console.log('═══════════════════════════════════════════════════════════\n');

  const container = new Container({ logger: createConsoleLogger('debug') }).build((c) => {
    c.addSingletonClass(Settings)
      .addSingletonImplementation(Clock, SystemClock)
      .addSingletonClass(SystemClock)
      .addSingletonClass(Greeter)
      .addTransientFactory(
        Session,
        inject([Clock], (clock: Clock) => new Session(clock.now()))
      )
      .addTransientInterface(CommandHandler);
  });

  // 1. Autowired singleton
  console.log('--- Greeter ---');
  console.log(container.get(Greeter).greet('container'));
  console.log('Same instance:', container.get(Greeter) === container.get(Greeter));
  console.log();

  // 2. Transient factory
  console.log('--- Session ---');
  console.log('Distinct sessions:', container.get(Session) !== container.get(Session));
  console.log();

  // 3. Handler found through its base class
  console.log('--- Command handler ---');
  console.log(container.get(GreetCommandHandler).execute());
  console.log();

  // 4. Contexts
  console.log('--- Contexts ---');
  const contexts = new ContextContainer();
  contexts
    .createContext(DEFAULT_CONTEXT)
    .addSingletonImplementation(Storage, LocalStorage)
    .addSingletonClass(LocalStorage)
    .addTransientClass(ArchiveJob)
    .addTransientClass(ExportJob);
  contexts
    .createContext('archive')
    .addSingletonImplementation(Storage, ArchiveStorage)
    .addSingletonClass(ArchiveStorage);

  console.log('ExportJob writes to', contexts.get(ExportJob).storage.location);
  console.log('ArchiveJob writes to', contexts.get(ArchiveJob).storage.location);
  console.log(
    'ExportJob in archive context writes to',
    contexts.runInContext(['archive'], () => contexts.get(ExportJob)).storage.location
  );
  console.log();

  // 5. Errors
  console.log('--- Missing binding ---');
  try {
    new Container().addSingletonClass(Greeter).get(Greeter);
  } catch (error) {
    if (!(error instanceof DependencyInjectionError)) {
      throw error;
    }
    console.log(error.message);
  }

  console.log('\n═══════════════════════════════════════════════════════════');
  console.log('  Demo Complete!');
  console.log('═══════════════════════════════════════════════════════════\n');
}

// Run
main();
