/**
 * @module @crew-control/progress-reporter/types
 * Type definitions for run progress events.
 */

import type { StopReason, TeamName } from "@crew-control/contracts";

/**
 * Progress event types.
 */
export type ProgressEventType =
  | "cycle_started"
  | "team_started"
  | "team_completed"
  | "team_failed"
  | "team_graded"
  | "escalated"
  | "resources_scaled"
  | "run_completed";

/**
 * Base progress event.
 */
export interface BaseProgressEvent {
  type: ProgressEventType;
  timestamp: number;
}

export interface CycleStartedEvent extends BaseProgressEvent {
  type: "cycle_started";
  data: {
    cycle: number;
    task: string;
  };
}

/**
 * Team lifecycle event.
 */
export interface TeamEvent extends BaseProgressEvent {
  type: "team_started" | "team_completed" | "team_failed";
  data: {
    team: TeamName;
    durationMs?: number; // completed/failed only
    error?: string; // Only for 'failed'
  };
}

export interface TeamGradedEvent extends BaseProgressEvent {
  type: "team_graded";
  data: {
    team: TeamName;
    score: number;
    deadlineMet: boolean;
  };
}

export interface EscalatedEvent extends BaseProgressEvent {
  type: "escalated";
  data: {
    team: TeamName;
    reasons: string[];
  };
}

export interface ResourcesScaledEvent extends BaseProgressEvent {
  type: "resources_scaled";
  data: {
    team: TeamName;
    fromAgents: number;
    toAgents: number;
  };
}

export interface RunCompletedEvent extends BaseProgressEvent {
  type: "run_completed";
  data: {
    stopReason: StopReason;
    cycles: number;
    totalDuration: number;
  };
}

/**
 * Union of all progress events.
 */
export type ProgressEvent =
  | CycleStartedEvent
  | TeamEvent
  | TeamGradedEvent
  | EscalatedEvent
  | ResourcesScaledEvent
  | RunCompletedEvent;

/**
 * Progress callback function.
 */
export type ProgressCallback = (event: ProgressEvent) => void;
