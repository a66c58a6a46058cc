/**
 * Tests for ProgressReporter
 */

import { describe, it, expect, vi } from "vitest";
import { ProgressReporter } from "../reporter.js";
import type { ILogger } from "@crew-control/contracts";
import type { ProgressEvent } from "../types.js";

// Mock logger
const createMockLogger = (): ILogger => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
});

/** Clock advancing one second per reading. */
const createClock = (start = 1_000_000) => {
  let t = start - 1_000;
  return () => (t += 1_000);
};

describe("ProgressReporter", () => {
  describe("Event emission", () => {
    it("should emit cycle_started event", () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e), () => 42);

      reporter.cycleStarted(1, "Summarize battery storage options");

      expect(events).toEqual([
        { type: "cycle_started", timestamp: 42, data: { cycle: 1, task: "Summarize battery storage options" } },
      ]);
      expect(logger.info).toHaveBeenCalledWith("🎯 Cycle 1: Summarize battery storage options");
    });

    it("should emit team lifecycle events", () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.team("research", "started");
      reporter.team("research", "completed", { durationMs: 1500 });
      reporter.team("writing", "failed", { error: "doc_writer crashed" });

      expect(events.map((e) => e.type)).toEqual(["team_started", "team_completed", "team_failed"]);
      expect(events[1]?.data).toEqual({ team: "research", durationMs: 1500 });
      expect(logger.info).toHaveBeenCalledWith("✓ research team completed in 1.5s");
      expect(logger.warn).toHaveBeenCalledWith("✗ writing team failed: doc_writer crashed");
    });

    it("should emit team_graded event", () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.graded("writing", 0.4, false);

      expect(events[0]).toMatchObject({ type: "team_graded", data: { team: "writing", score: 0.4, deadlineMet: false } });
      expect(logger.info).toHaveBeenCalledWith("📝 writing graded 0.40 (deadline missed)");
    });

    it("should emit escalated and resources_scaled events", () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e));

      reporter.escalated("writing", ["low_quality_streak"]);
      reporter.resourcesScaled("research", 1, 2);

      expect(events[0]).toMatchObject({ type: "escalated", data: { team: "writing", reasons: ["low_quality_streak"] } });
      expect(events[1]).toMatchObject({
        type: "resources_scaled",
        data: { team: "research", fromAgents: 1, toAgents: 2 },
      });
      expect(logger.info).toHaveBeenCalledWith("📈 research team scaled 1 → 2 agents");
    });

    it("should emit run_completed with duration since the first cycle", () => {
      const events: ProgressEvent[] = [];
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger, (e) => events.push(e), createClock());

      reporter.cycleStarted(1, "Task one");
      reporter.cycleStarted(2, "Task two");
      reporter.complete("max_cycles", 2);

      const completeEvent = events.find((e) => e.type === "run_completed");
      expect(completeEvent?.data).toEqual({ stopReason: "max_cycles", cycles: 2, totalDuration: 2000 });
      expect(logger.info).toHaveBeenLastCalledWith("✅ Run finished (max_cycles) after 2 cycle(s) in 2.0s");
    });
  });

  describe("Event history", () => {
    it("should store all emitted events", () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.cycleStarted(1, "Test");
      reporter.team("research", "started");
      reporter.graded("research", 0.9, true);

      const events = reporter.getEvents();
      expect(events.map((e) => e.type)).toEqual(["cycle_started", "team_started", "team_graded"]);
    });

    it("should clear events", () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      reporter.cycleStarted(1, "Test");
      reporter.team("research", "started");

      expect(reporter.getEvents()).toHaveLength(2);

      reporter.clear();
      expect(reporter.getEvents()).toHaveLength(0);
    });
  });

  describe("No callback mode", () => {
    it("should work without callback (CLI mode)", () => {
      const logger = createMockLogger();
      const reporter = new ProgressReporter(logger);

      expect(() => {
        reporter.cycleStarted(1, "Test");
        reporter.complete("end", 1);
      }).not.toThrow();

      expect(logger.info).toHaveBeenCalled();
    });
  });
});
