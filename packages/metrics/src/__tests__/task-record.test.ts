/**
 * Tests for task record derivations
 */

import { describe, it, expect } from 'vitest';
import {
  createTaskRecord,
  deadlineBuffer,
  deadlineMet,
  duration,
  patchQuality,
  recentRecords,
} from '../task-record.js';

const base = {
  taskId: 'task-1',
  team: 'research' as const,
  agent: 'search',
  description: 'Collect sources',
  startedAt: 1_000,
  endedAt: 4_000,
  success: true,
};

describe('derived timing', () => {
  it('should report deadline met and zero buffer without a deadline', () => {
    const record = createTaskRecord(base);

    expect(record.deadline).toBeUndefined();
    expect(deadlineMet(record)).toBe(true);
    expect(deadlineBuffer(record)).toBe(0);
  });

  it('should compute duration as end minus start', () => {
    expect(duration(createTaskRecord(base))).toBe(3_000);
  });

  it('should treat finishing exactly on the deadline as met', () => {
    const record = createTaskRecord({ ...base, deadline: 4_000 });

    expect(deadlineMet(record)).toBe(true);
    expect(deadlineBuffer(record)).toBe(0);
  });

  it('should report a negative buffer when late', () => {
    const record = createTaskRecord({ ...base, deadline: 3_500 });

    expect(deadlineMet(record)).toBe(false);
    expect(deadlineBuffer(record)).toBe(-500);
  });

  it('should report positive slack when early', () => {
    expect(deadlineBuffer(createTaskRecord({ ...base, deadline: 10_000 }))).toBe(6_000);
  });
});

describe('createTaskRecord', () => {
  it('should default size, tokens and agent count', () => {
    const record = createTaskRecord(base);

    expect(record.taskSize).toBe(1.0);
    expect(record.tokensUsed).toBe(0);
    expect(record.agentCount).toBe(1);
    expect(record.quality).toBe(0);
    expect(record.reviewed).toBe(false);
    expect(record.recordId).toMatch(/[0-9a-f-]{36}/);
  });

  it('should clamp quality into [0, 1]', () => {
    expect(createTaskRecord({ ...base, quality: 1.7 }).quality).toBe(1);
    expect(createTaskRecord({ ...base, quality: -0.2 }).quality).toBe(0);
  });

  it('should keep error text on failed records', () => {
    const record = createTaskRecord({ ...base, success: false, error: 'boom' });
    expect(record.error).toBe('boom');
    expect(record.success).toBe(false);
  });
});

describe('patchQuality', () => {
  it('should apply the first patch only', () => {
    const record = createTaskRecord({ ...base, quality: 0.2 });
    const patched = patchQuality(record, 0.9);
    const again = patchQuality(patched, 0.1);

    expect(record.quality).toBe(0.2);
    expect(patched.quality).toBe(0.9);
    expect(patched.reviewed).toBe(true);
    expect(again).toBe(patched);
  });
});

describe('recentRecords', () => {
  it('should return the last n entries', () => {
    const log = Array.from({ length: 15 }, (_, i) => i);

    expect(recentRecords(log)).toEqual([5, 6, 7, 8, 9, 10, 11, 12, 13, 14]);
    expect(recentRecords(log, 3)).toEqual([12, 13, 14]);
    expect(recentRecords(log, 0)).toEqual([]);
    expect(recentRecords([1, 2], 10)).toEqual([1, 2]);
  });
});
