/**
 * Workspace provider: maps document paths onto configured project
 * workspaces and the context inside them.
 *
 * Layout under a workspace root: one directory per entity level, then an
 * optional task directory, then the document.
 *
 *   /proj/shotA/seq01/shot010/anim/scene.ma
 *               └Sequence └Shot  └task
 */

import { posix } from 'node:path';
import { WorkspaceNotFoundError } from '../errors';
import { createContext, entitiesEqual, type Context, type EntityRef } from './context';

// ── Types ───────────────────────────────────────────────────────────

export interface Workspace {
  readonly projectId: string;
  /** Normalized absolute root, no trailing slash */
  readonly root: string;
  /** Entity type per directory level below the root */
  readonly entityLevels: readonly string[];
}

export interface WorkspaceDefinition {
  projectId: string;
  root: string;
  entityLevels: readonly string[];
}

export interface WorkspaceProvider {
  /** Throws WorkspaceNotFoundError when no workspace contains the path. */
  workspaceFromPath(path: string): Workspace;
  /**
   * Context for a path inside `workspace`. The path decides the entity and
   * the task; `hint` only supplies a task the path leaves out, and only when
   * it names the same project and entity.
   */
  contextFromPath(workspace: Workspace, path: string, hint: Context | null): Context;
}

// ── Helpers ─────────────────────────────────────────────────────────

export function normalizePath(path: string): string {
  const normalized = posix.normalize(path.replace(/\\/g, '/'));
  return normalized.length > 1 ? normalized.replace(/\/+$/, '') : normalized;
}

function isWithin(root: string, path: string): boolean {
  if (root === '/') return path.startsWith('/');
  return path === root || path.startsWith(`${root}/`);
}

/**
 * Most specific entity the directories name, or null above the first level.
 */
export function deepestEntity(workspace: Workspace, dirs: readonly string[]): EntityRef | null {
  const depth = Math.min(dirs.length, workspace.entityLevels.length);
  if (depth === 0) return null;
  return { type: workspace.entityLevels[depth - 1], name: dirs[depth - 1] };
}

// ── Provider ────────────────────────────────────────────────────────

export function createWorkspaceProvider(
  definitions: readonly WorkspaceDefinition[],
): WorkspaceProvider {
  const workspaces: Workspace[] = definitions
    .map((def) => Object.freeze({
      projectId: def.projectId,
      root: normalizePath(def.root),
      entityLevels: Object.freeze([...def.entityLevels]),
    }))
    // Longest root first so nested projects win over their parents
    .sort((a, b) => b.root.length - a.root.length);

  return {
    workspaceFromPath(path: string): Workspace {
      const normalized = normalizePath(path);
      const match = workspaces.find((ws) => isWithin(ws.root, normalized));
      if (!match) {
        throw new WorkspaceNotFoundError(path);
      }
      return match;
    },

    contextFromPath(workspace: Workspace, path: string, hint: Context | null): Context {
      const normalized = normalizePath(path);
      const relative = normalized === workspace.root
        ? ''
        : normalized.slice(workspace.root === '/' ? 1 : workspace.root.length + 1);

      // Last segment is the document itself
      const dirs = relative.split('/').filter(Boolean).slice(0, -1);
      const entity = deepestEntity(workspace, dirs);

      if (!entity) {
        return createContext(workspace.projectId);
      }

      const taskDir = dirs.length > workspace.entityLevels.length
        ? dirs[workspace.entityLevels.length]
        : null;
      if (taskDir !== null) {
        return createContext(workspace.projectId, entity, taskDir);
      }

      // A document saved beside the task folders stays in the hinted task
      const inheritsTask = hint !== null
        && hint.project === workspace.projectId
        && entitiesEqual(hint.entity, entity);

      return createContext(workspace.projectId, entity, inheritsTask ? hint.task : null);
    },
  };
}
