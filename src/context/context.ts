/**
 * Context: immutable value naming where work happens: a project, optionally
 * an entity inside it, optionally a task on that entity.
 */

export interface EntityRef {
  readonly type: string;
  readonly name: string;
}

export interface Context {
  readonly project: string | null;
  readonly entity: EntityRef | null;
  readonly task: string | null;
}

export function createContext(
  project: string | null,
  entity: EntityRef | null = null,
  task: string | null = null,
): Context {
  return Object.freeze({
    project,
    entity: entity ? Object.freeze({ type: entity.type, name: entity.name }) : null,
    task,
  });
}

export function entitiesEqual(a: EntityRef | null, b: EntityRef | null): boolean {
  if (a === null || b === null) return a === b;
  return a.type === b.type && a.name === b.name;
}

/** Value equality over every identifying field. */
export function contextsEqual(a: Context | null, b: Context | null): boolean {
  if (a === null || b === null) return a === b;
  return a.project === b.project && entitiesEqual(a.entity, b.entity) && a.task === b.task;
}

export function formatContext(ctx: Context | null): string {
  if (ctx === null) return '<no context>';
  const parts = [ctx.project ?? '<no project>'];
  if (ctx.entity) parts.push(`${ctx.entity.type} ${ctx.entity.name}`);
  if (ctx.task) parts.push(ctx.task);
  return parts.join(', ');
}
