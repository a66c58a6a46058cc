/**
 * report command - run quietly, print only the evaluation report
 */

import { ConfigurationError } from '@crew-control/contracts';
import { formatReport } from '@crew-control/evaluation-engine';
import { defineCommand } from './command.js';
import { setupRun } from './setup.js';

export default defineCommand({
  id: 'report',
  description: 'Run and print the system evaluation report',
  usage: 'crew-control report [--config path] [--task text] [--max-cycles n] [--no-auto-generate] [--json]',

  handler: {
    async execute(ctx, flags) {
      try {
        const { controller } = await setupRun(ctx, flags);
        const { state } = await controller.run(flags.task);
        const report = await controller.engine.generateReport(state);
        ctx.ui.write(flags.json ? JSON.stringify(report, null, 2) : formatReport(report));
        return { exitCode: 0 };
      } catch (error) {
        if (error instanceof ConfigurationError) {
          ctx.ui.error(`Configuration error: ${error.message}`);
          return { exitCode: 1 };
        }
        throw error;
      }
    },
  },
});
