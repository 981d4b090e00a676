export {
  ShimError,
  SubscriptionError,
  WorkspaceNotFoundError,
  UnresolvableContextError,
  EngineInitError,
  JobError,
  errorMessage,
  describeError,
} from './errors';
