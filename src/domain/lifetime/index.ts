export type { ILifetimeStrategy, LifetimeStrategyFactory } from './ILifetimeStrategy';
export {
  SingletonStrategy,
  TransientStrategy,
  singletonStrategyFactory,
  transientStrategyFactory,
} from './strategies';
