/**
 * run command - one autonomous run from the configured oracle
 */

import { ConfigurationError } from '@crew-control/contracts';
import { formatReport } from '@crew-control/evaluation-engine';
import { createEventRenderer } from '../ui/event-renderer.js';
import { defineCommand } from './command.js';
import { setupRun, type RunSetup } from './setup.js';

export default defineCommand({
  id: 'run',
  description: 'Run tasks through the research, writing and improvement teams',
  usage: 'crew-control run [--config path] [--task text] [--max-cycles n] [--no-auto-generate] [--json]',

  handler: {
    async execute(ctx, flags) {
      const json = flags.json ?? false;
      const onProgress = json
        ? (event: unknown) => ctx.ui.write(JSON.stringify(event))
        : createEventRenderer((line) => ctx.ui.write(line), { color: ctx.color ?? false });

      let setup: RunSetup;
      try {
        setup = await setupRun(ctx, flags, onProgress);
      } catch (error) {
        if (error instanceof ConfigurationError) {
          ctx.ui.error(`Configuration error: ${error.message}`);
          return { exitCode: 1 };
        }
        throw error;
      }

      const result = await setup.controller.run(flags.task);
      const report = await setup.controller.engine.generateReport(result.state);

      if (json) {
        ctx.ui.write(
          JSON.stringify({
            type: 'result',
            runId: result.state.runId,
            stopReason: result.stopReason,
            cycles: result.cycles,
            completedTasks: result.state.completedTasks,
            report,
          })
        );
      } else {
        ctx.ui.write('');
        ctx.ui.write(formatReport(report));
      }
      return { exitCode: 0 };
    },
  },
});
