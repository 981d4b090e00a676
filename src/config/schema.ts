import { z } from 'zod';
import { HOST_EVENT_KINDS } from '../host/types';

export const HostEventKindSchema = z.enum(HOST_EVENT_KINDS);

export const EngineConfigSchema = z.object({
  name: z.string().min(1).describe('Engine instance name started for each context'),
  debugLogging: z.boolean().describe('Emit engine debug messages'),
  watchEvents: z.array(HostEventKindSchema).min(1).describe('Host events that trigger a context refresh'),
}).strict();

export const WorkspaceConfigSchema = z.object({
  projectId: z.string().min(1).describe('Project identifier carried by every context in this workspace'),
  root: z.string().min(1).refine((root) => root.startsWith('/'), {
    message: 'Workspace root must be an absolute path',
  }).describe('Absolute project root'),
  entityLevels: z.array(z.string().min(1)).default([]).describe('Entity type for each directory level under the root'),
}).strict();

export const RuntimeConfigSchema = z.object({
  logLevel: z.enum(['debug', 'info', 'warn', 'error']).describe('Logging level'),
}).strict();

export const AppConfigSchema = z.object({
  engine: EngineConfigSchema,
  engines: z.array(z.string().min(1)).min(1).describe('Engine names the factory may start'),
  workspaces: z.array(WorkspaceConfigSchema).describe('Known project workspaces'),
  runtime: RuntimeConfigSchema,
}).strict().superRefine((cfg, ctx) => {
  if (!cfg.engines.includes(cfg.engine.name)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['engine', 'name'],
      message: `Engine "${cfg.engine.name}" is not listed in engines`,
    });
  }

  const seen = new Set<string>();
  cfg.workspaces.forEach((ws, i) => {
    if (seen.has(ws.projectId)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['workspaces', i, 'projectId'],
        message: `Duplicate projectId "${ws.projectId}"`,
      });
    }
    seen.add(ws.projectId);
  });
});

export type AppConfigInput = z.input<typeof AppConfigSchema>;
export type AppConfig = z.output<typeof AppConfigSchema>;

export interface DerivedConfig {
  workspaceCount: number;
}

export interface ValidatedConfig {
  engine: AppConfig['engine'];
  engines: AppConfig['engines'];
  workspaces: AppConfig['workspaces'];
  runtime: AppConfig['runtime'];
  derived: DerivedConfig;
}
