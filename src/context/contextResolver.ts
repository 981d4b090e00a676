/**
 * ContextResolver: decides what a host event means for the engine:
 * keep it, rebuild it, or disable the integration.
 */

import { errorMessage } from '../errors';
import { contextsEqual, type Context } from './context';
import type { Workspace, WorkspaceProvider } from './workspaceProvider';

export type ResolveOutcome =
  /** Empty path: a new, unsaved document. Keep whatever is running. */
  | { readonly kind: 'unchanged' }
  /** No workspace for the path. */
  | { readonly kind: 'unresolvable'; readonly reason: string }
  /** Same context as before. Keep the engine. */
  | { readonly kind: 'same'; readonly context: Context; readonly workspace: Workspace }
  /** Different context. Rebuild. */
  | { readonly kind: 'changed'; readonly context: Context; readonly workspace: Workspace };

export type ResolveOutcomeKind = ResolveOutcome['kind'];

export interface ContextResolver {
  resolve(documentPath: string, previousContext: Context | null): ResolveOutcome;
}

const UNCHANGED: ResolveOutcome = Object.freeze({ kind: 'unchanged' });

export function createContextResolver(provider: WorkspaceProvider): ContextResolver {
  return {
    resolve(documentPath: string, previousContext: Context | null): ResolveOutcome {
      if (documentPath.trim() === '') {
        return UNCHANGED;
      }

      let workspace: Workspace;
      try {
        workspace = provider.workspaceFromPath(documentPath);
      } catch (err) {
        return { kind: 'unresolvable', reason: errorMessage(err) };
      }

      const context = provider.contextFromPath(workspace, documentPath, previousContext);

      if (contextsEqual(context, previousContext)) {
        return { kind: 'same', context, workspace };
      }
      return { kind: 'changed', context, workspace };
    },
  };
}
