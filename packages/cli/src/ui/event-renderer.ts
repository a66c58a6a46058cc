/**
 * Progress event renderer for the terminal.
 *
 * One line per event; colors only when the output is a TTY.
 */

import type { ProgressCallback, ProgressEvent } from '@crew-control/progress-reporter';

// ═══════════════════════════════════════════════════════════════════════════
// ANSI Colors & Symbols
// ═══════════════════════════════════════════════════════════════════════════

const CSI = '\x1b[';
const RESET = '\x1b[0m';

type Paint = (t: string) => string;

const ansi = {
  success: (t: string) => `${CSI}32m${t}${RESET}`,
  error: (t: string) => `${CSI}31m${t}${RESET}`,
  warning: (t: string) => `${CSI}33m${t}${RESET}`,
  info: (t: string) => `${CSI}36m${t}${RESET}`,
  dim: (t: string) => `${CSI}90m${t}${RESET}`,
  bold: (t: string) => `${CSI}1m${t}${RESET}`,
};

const plain: typeof ansi = {
  success: (t) => t,
  error: (t) => t,
  warning: (t) => t,
  info: (t) => t,
  dim: (t) => t,
  bold: (t) => t,
};

const seconds = (ms: number | undefined): string => (ms === undefined ? '' : ` (${(ms / 1000).toFixed(1)}s)`);

export function renderEvent(event: ProgressEvent, color: Record<keyof typeof ansi, Paint> = plain): string {
  switch (event.type) {
    case 'cycle_started':
      return color.bold(`━━ Cycle ${event.data.cycle} ━━ ${event.data.task}`);
    case 'team_started':
      return color.dim(`  ▶ ${event.data.team}`);
    case 'team_completed':
      return `  ${color.success('✓')} ${event.data.team}${color.dim(seconds(event.data.durationMs))}`;
    case 'team_failed':
      return `  ${color.error('✗')} ${event.data.team}: ${event.data.error ?? 'unknown error'}`;
    case 'team_graded': {
      const score = event.data.score.toFixed(2);
      const deadline = event.data.deadlineMet ? '' : color.warning(' deadline missed');
      return `    score ${event.data.score >= 0.7 ? color.success(score) : color.warning(score)}${deadline}`;
    }
    case 'escalated':
      return color.warning(`  ⚠ ${event.data.team} escalated: ${event.data.reasons.join(', ')}`);
    case 'resources_scaled':
      return color.info(`  ⚙ ${event.data.team} agents ${event.data.fromAgents} → ${event.data.toAgents}`);
    case 'run_completed':
      return color.bold(
        `Run finished: ${event.data.stopReason} after ${event.data.cycles} cycle(s)${seconds(event.data.totalDuration)}`
      );
  }
}

export function createEventRenderer(write: (line: string) => void, options: { color?: boolean } = {}): ProgressCallback {
  const palette = options.color ? ansi : plain;
  return (event) => write(renderEvent(event, palette));
}
