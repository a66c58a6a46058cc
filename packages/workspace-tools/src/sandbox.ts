/**
 * Sandbox result handling. Execution itself sits behind SandboxExecutor.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { errorMessage, type SandboxExecutor, type SandboxSubmission, type ToolResult } from '@crew-control/contracts';
import { toolError } from './tool-error.js';

/**
 * A non-empty stderr is a failure, whatever stdout says.
 */
export function interpretSandboxResult(submission: SandboxSubmission): ToolResult {
  if (submission.stderr.trim().length > 0) {
    return toolError({
      code: 'SANDBOX_ERROR',
      message: submission.stderr.trim(),
      details: { stdout: submission.stdout },
    });
  }
  return {
    success: true,
    output: submission.stdout,
    metadata: { resultBindings: submission.resultBindings },
  };
}

/**
 * Submit code and interpret the outcome. An executor that throws is reported
 * like a failed run.
 */
export async function runInSandbox(
  executor: SandboxExecutor,
  code: string,
  context?: Record<string, unknown>
): Promise<ToolResult> {
  try {
    return interpretSandboxResult(await executor.submit(code, context));
  } catch (error) {
    return toolError({ code: 'SANDBOX_UNAVAILABLE', message: errorMessage(error) });
  }
}

const PROPOSAL_FILE = /^proposal-(\d+)\.txt$/;

/**
 * Executor that runs nothing: each submission is written to the next
 * `proposal-N.txt` in its directory for a person to review and apply.
 */
export class StagingSandbox implements SandboxExecutor {
  readonly directory: string;

  constructor(directory: string) {
    this.directory = path.resolve(directory);
  }

  async submit(code: string, context?: Record<string, unknown>): Promise<SandboxSubmission> {
    await fs.mkdir(this.directory, { recursive: true });
    const taken = (await fs.readdir(this.directory)).map((name) => Number(PROPOSAL_FILE.exec(name)?.[1] ?? 0));
    const fileName = `proposal-${Math.max(0, ...taken) + 1}.txt`;

    const header = context ? `# context: ${JSON.stringify(context)}\n` : '';
    await fs.writeFile(path.join(this.directory, fileName), `${header}${code}\n`, 'utf-8');
    return { stdout: `Staged ${fileName} for review`, stderr: '', resultBindings: { file: fileName } };
  }
}
