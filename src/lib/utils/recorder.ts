import debug from 'debug';

import { DEBUG_NAMESPACE } from './debug.js';

export type EventFields = Record<string, unknown>;

/**
 * Structured diagnostics sink injected into the client.
 *
 * Implementations must not throw; recording is never part of control flow.
 */
export interface EventRecorder {
  record(event: string, fields?: EventFields): void;
}

export const noopRecorder: EventRecorder = {
  record: () => undefined,
};

/** Render fields as `key=value` pairs; strings verbatim, everything else as JSON */
export function formatFields(fields: EventFields): string {
  return Object.entries(fields)
    .filter(([, value]) => value !== undefined)
    .map(([key, value]) => `${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`)
    .join(' ');
}

/**
 * Recorder writing through the debug package under `acme-conductor:<area>`.
 */
export function debugRecorder(area = 'client'): EventRecorder {
  const log = debug(`${DEBUG_NAMESPACE}:${area}`);

  return {
    record(event, fields = {}) {
      if (!log.enabled) return;
      const rendered = formatFields(fields);
      log('%s', rendered ? `${event} ${rendered}` : event);
    },
  };
}
