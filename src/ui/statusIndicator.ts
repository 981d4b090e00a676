/**
 * Disabled indicator: what the host shows while the integration is inert.
 */

export const DISABLED_TITLE = 'Pipeline integration is disabled';

export const DISABLED_MESSAGE =
  'The pipeline integration is disabled because it cannot recognize the currently opened file. ' +
  'Try opening another file or restarting the host application.';

export interface DisabledIndicator {
  showDisabledIndicator(reason: string): void;
  clearDisabledIndicator(): void;
}

export interface StatusIndicator extends DisabledIndicator {
  isShown(): boolean;
  /** Reason passed to the last `showDisabledIndicator`, null while cleared */
  getReason(): string | null;
}

export function createStatusIndicator(): StatusIndicator {
  let reason: string | null = null;

  return {
    showDisabledIndicator(newReason: string): void {
      reason = newReason;
    },

    clearDisabledIndicator(): void {
      reason = null;
    },

    isShown(): boolean {
      return reason !== null;
    },

    getReason(): string | null {
      return reason;
    },
  };
}
