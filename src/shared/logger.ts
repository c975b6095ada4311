/**
 * @file src/shared/logger.ts
 * @description Logger contract handed to workflows, the client and the API. Messages carry their
 *              own `[tag]` prefix; the default implementation is the console.
 */

export type WorkflowLogger = Pick<Console, 'log' | 'warn' | 'error'>;

export const silentLogger: WorkflowLogger = {
  log: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
