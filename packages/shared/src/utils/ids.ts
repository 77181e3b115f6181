import { randomUUID } from 'node:crypto';

/**
 * Run ids sort by start time: `run-20240101T120000Z-1a2b3c4d`.
 */
export function generateRunId(startedAt: Date = new Date()): string {
  const stamp = startedAt.toISOString().replace(/[-:]/g, '').replace(/\.\d{3}/, '');
  return `run-${stamp}-${randomUUID().slice(0, 8)}`;
}

/**
 * Worker IDs are stable within a run: `<runId>/w<index>`.
 */
export function workerId(runId: string, index: number): string {
  return `${runId}/w${index + 1}`;
}
