export { ResolutionStack } from './ResolutionStack';
