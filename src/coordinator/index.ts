export {
  type CoordinatorState,
  type CoordinatorStateKind,
  type CoordinatorOptions,
  type WatchStatus,
  type EngineCoordinator,
  createEngineCoordinator,
} from './engineCoordinator';
