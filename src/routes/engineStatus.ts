import { Router, Request, Response } from 'express';
import { getRuntime } from '../runtime';
import { DISABLED_MESSAGE, DISABLED_TITLE } from '../ui';

const router = Router();

export function getEngineStatus(req: Request, res: Response): void {
  const runtime = getRuntime();

  if (!runtime) {
    res.status(503).json({ error: 'Runtime is not initialized' });
    return;
  }

  const { coordinator, indicator, progress } = runtime;
  const state = coordinator.getState();
  const engine = coordinator.getActiveEngine();

  res.status(200).json({
    state: state.kind,
    lastOutcome: coordinator.getLastOutcome(),
    documentPath: runtime.host.currentDocumentPath(),
    engine: engine
      ? {
        name: engine.name,
        instanceId: engine.instanceId,
        retained: state.kind === 'disabled',
        context: engine.context,
        projectRoot: engine.workspace.root,
        queuedJobs: engine.queue.pendingNames(),
      }
      : null,
    disabled: indicator.isShown()
      ? { title: DISABLED_TITLE, message: DISABLED_MESSAGE, reason: indicator.getReason() }
      : null,
    watcher: coordinator.getWatchStatus(),
    progress: progress.snapshot(),
  });
}

router.get('/', getEngineStatus);

export default router;
