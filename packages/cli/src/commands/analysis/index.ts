/**
 * Analysis command group: batch metrics screening and the single-company view
 */

import { cli, define } from 'gunshi';
import { CLI_NAME, CLI_VERSION } from '../../utils/constants.js';
import { companyCommand } from './company.js';
import { metricsCommand } from './metrics.js';

const GROUP_DESCRIPTION = 'Financial metrics and value-creation analysis';

export const analysisCommand = define({
  name: 'analysis',
  description: GROUP_DESCRIPTION,
  run: (ctx) => {
    ctx.log(`Available commands: ${Object.keys(subCommands).join(', ')}`);
    ctx.log(`Use "${CLI_NAME} analysis <command> --help" for more information`);
  },
});

const subCommands = {
  metrics: metricsCommand,
  company: companyCommand,
};

export default async function analysisCommandRunner(args: string[]): Promise<void> {
  await cli(args, analysisCommand, {
    name: `${CLI_NAME} analysis`,
    version: CLI_VERSION,
    description: GROUP_DESCRIPTION,
    subCommands,
  });
}
