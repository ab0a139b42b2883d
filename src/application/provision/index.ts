export type { IInstanceProvider, Factory, Mutator } from './IInstanceProvider';
export {
  InstanceValueProvider,
  FactoryInstanceProvider,
  ClassInstanceProvider,
  ImplementationInstanceProvider,
} from './providers';
