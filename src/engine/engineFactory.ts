/**
 * EngineFactory: validates a start request and constructs the engine.
 *
 * Construction failures surface as EngineInitError so the coordinator can
 * tell them apart from unexpected errors.
 */

import { EngineInitError, errorMessage } from '../errors';
import { formatContext, type Context, type Workspace } from '../context';
import type { ProgressSink } from '../queue';
import { createEngine, type Engine, type EngineSettings } from './engine';

export interface EngineFactory {
  /** Throws EngineInitError if the engine cannot start for this context. */
  startEngine(name: string, workspace: Workspace, context: Context): Engine;
}

export interface EngineFactoryOptions {
  /** Engine names this factory knows how to start */
  engines: readonly string[];
  settings: EngineSettings;
  /** Shared progress sink for every engine's queue */
  progress?: ProgressSink;
}

export function createEngineFactory(options: EngineFactoryOptions): EngineFactory {
  let nextInstanceId = 1;

  return {
    startEngine(name: string, workspace: Workspace, context: Context): Engine {
      if (!options.engines.includes(name)) {
        throw new EngineInitError(
          `Unknown engine "${name}". Available engines: ${options.engines.join(', ') || '(none)'}`
        );
      }

      if (context.project === null) {
        throw new EngineInitError(
          `The engine needs at least a project in the context in order to start! Your context: ${formatContext(context)}`
        );
      }

      try {
        return createEngine({
          name,
          instanceId: nextInstanceId++,
          workspace,
          context,
          settings: options.settings,
          progress: options.progress,
        });
      } catch (err) {
        throw new EngineInitError(`Engine "${name}" failed to initialize: ${errorMessage(err)}`, { cause: err });
      }
    },
  };
}
