/**
 * Error taxonomy for the shim.
 *
 * Every class is recovered somewhere: subscription failures by the watcher,
 * unresolvable contexts and engine init failures by the coordinator, job
 * failures by the queue. Only configuration errors reach the process.
 */

export class ShimError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** One host event kind could not be subscribed. */
export class SubscriptionError extends ShimError {
  constructor(readonly eventKind: string, cause: unknown) {
    super(`Could not subscribe to "${eventKind}": ${errorMessage(cause)}`, { cause });
  }
}

/** No known workspace contains the document path. */
export class WorkspaceNotFoundError extends ShimError {
  constructor(readonly documentPath: string) {
    super(`Path "${documentPath}" is not inside any known project`);
  }
}

/** A document path produced no workspace or context. */
export class UnresolvableContextError extends ShimError {
  constructor(readonly documentPath: string, reason: string) {
    super(`Cannot resolve a context for "${documentPath}": ${reason}`);
  }
}

/** Engine construction failed for a resolvable context. */
export class EngineInitError extends ShimError {}

/** A queued job's action threw. */
export class JobError extends ShimError {
  constructor(readonly jobName: string, cause: unknown) {
    super(`Job "${jobName}" failed: ${errorMessage(cause)}`, { cause });
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * Multi-line diagnostic for an unexpected failure during event handling.
 * Local only; never sent anywhere.
 */
export function describeError(err: unknown): string {
  const lines = ['There was a problem starting the engine.'];

  if (err instanceof Error) {
    lines.push(`Exception: ${err.name} - ${err.message}`);
    if (err.stack) {
      lines.push('Stack (most recent call first):');
      lines.push(...err.stack.split('\n').slice(1).map((l) => l.trimEnd()));
    }
    if (err.cause !== undefined) {
      lines.push(`Caused by: ${errorMessage(err.cause)}`);
    }
  } else {
    lines.push(`Exception: ${String(err)}`);
  }

  return lines.join('\n');
}
