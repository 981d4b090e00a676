import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { HOST_EVENT_KINDS } from '../host';
import { createLogger } from '../logging';
import { getRuntime } from '../runtime';

export const HostEventBodySchema = z.object({
  event: z.enum(HOST_EVENT_KINDS),
  documentPath: z.string().optional(),
}).strict();

const router = Router();
const logger = createLogger('HostEvents');

/**
 * The host plugin posts each lifecycle event here. A document path, when
 * given, becomes the host's current document before the event is dispatched.
 * A document event after the host exited means the host came back, so the
 * coordinator is started again before dispatch.
 */
export function postHostEvent(req: Request, res: Response): void {
  const runtime = getRuntime();

  if (!runtime) {
    res.status(503).json({ error: 'Runtime is not initialized' });
    return;
  }

  const parsed = HostEventBodySchema.safeParse(req.body);
  if (!parsed.success) {
    res.status(400).json({
      error: 'Invalid host event',
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.') || 'root',
        message: issue.message,
      })),
    });
    return;
  }

  const { event, documentPath } = parsed.data;
  if (documentPath !== undefined) {
    runtime.host.setDocumentPath(documentPath);
  }

  const { coordinator } = runtime;
  if (event !== 'host-exiting' && coordinator.isStopped()) {
    logger.info(`Host is back (${event}), restarting the coordinator`);
    coordinator.start();
  }

  const handlers = runtime.host.dispatch(event);

  res.status(202).json({
    event,
    handlers,
    state: coordinator.getState().kind,
    context: coordinator.getContext(),
  });
}

router.post('/', postHostEvent);

export default router;
