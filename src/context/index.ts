export {
  type EntityRef,
  type Context,
  createContext,
  entitiesEqual,
  contextsEqual,
  formatContext,
} from './context';

export {
  type Workspace,
  type WorkspaceDefinition,
  type WorkspaceProvider,
  normalizePath,
  deepestEntity,
  createWorkspaceProvider,
} from './workspaceProvider';

export {
  type ResolveOutcome,
  type ResolveOutcomeKind,
  type ContextResolver,
  createContextResolver,
} from './contextResolver';
