/**
 * @module @crew-control/metrics/task-record
 * Single definitions of the derived timing values of a task record.
 *
 * Every component asks these functions whether a record was late; nobody
 * recomputes it inline.
 */

import { randomUUID } from 'node:crypto';
import type { TaskExecutionRecord, TeamName } from '@crew-control/contracts';

export interface TaskRecordInput {
  recordId?: string;
  taskId: string;
  team: TeamName;
  agent: string;
  description: string;
  startedAt: number;
  endedAt: number;
  deadline?: number;
  success: boolean;
  error?: string;
  quality?: number;
  taskSize?: number;
  tokensUsed?: number;
  agentCount?: number;
}

export function clampScore(score: number): number {
  if (!Number.isFinite(score)) {
    return 0;
  }
  return Math.min(1, Math.max(0, score));
}

export function createTaskRecord(input: TaskRecordInput): TaskExecutionRecord {
  const record: TaskExecutionRecord = {
    recordId: input.recordId ?? randomUUID(),
    taskId: input.taskId,
    team: input.team,
    agent: input.agent,
    description: input.description,
    startedAt: input.startedAt,
    endedAt: input.endedAt,
    success: input.success,
    quality: clampScore(input.quality ?? 0),
    taskSize: input.taskSize ?? 1.0,
    tokensUsed: input.tokensUsed ?? 0,
    agentCount: input.agentCount ?? 1,
    reviewed: false,
  };
  return {
    ...record,
    ...(input.deadline !== undefined ? { deadline: input.deadline } : {}),
    ...(input.error !== undefined ? { error: input.error } : {}),
  };
}

/** Milliseconds between start and end; never negative. */
export function duration(record: TaskExecutionRecord): number {
  return Math.max(0, record.endedAt - record.startedAt);
}

/** True when no deadline was set, otherwise `at ≤ deadline`. */
export function withinDeadline(at: number, deadline: number | undefined): boolean {
  return deadline === undefined || at <= deadline;
}

export function deadlineMet(record: TaskExecutionRecord): boolean {
  return withinDeadline(record.endedAt, record.deadline);
}

/** Signed slack in milliseconds; 0 without a deadline. */
export function deadlineBuffer(record: TaskExecutionRecord): number {
  return record.deadline === undefined ? 0 : record.deadline - record.endedAt;
}

/**
 * Apply the one allowed late quality patch. A second patch is ignored.
 */
export function patchQuality(record: TaskExecutionRecord, score: number): TaskExecutionRecord {
  if (record.reviewed) {
    return record;
  }
  return { ...record, quality: clampScore(score), reviewed: true };
}

/**
 * Last `n` entries of an unbounded log.
 */
export function recentRecords<T>(records: readonly T[], n = 10): T[] {
  if (n <= 0) {
    return [];
  }
  return records.slice(-n);
}
