import type { CommandModule } from 'yargs';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { buildCommandContext } from '../utils/context.js';
import { listClusterStacks } from '../utils/cfn.js';
import { handleError } from '../utils/errors.js';
import { STACK_PREFIX } from '../constants.js';
import { formatStackStatus } from './describe-image.js';

interface ListStacksArgs {
  region?: string;
  profile?: string;
}

export const listStacksCommand: CommandModule<{}, ListStacksArgs> = {
  command: 'list-stacks',
  describe: `List top-level stacks named ${STACK_PREFIX}*`,

  builder: (yargs) => {
    return yargs
      .option('region', {
        alias: 'r',
        type: 'string',
        describe: 'AWS region',
      })
      .option('profile', {
        type: 'string',
        describe: 'AWS profile',
      });
  },

  handler: async (argv) => {
    try {
      const ctx = await buildCommandContext({ region: argv.region, profile: argv.profile });
      const stacks = await listClusterStacks(ctx.region);

      if (stacks.length === 0) {
        logger.info(`No stacks found in ${ctx.region}`);
        return;
      }

      logger.title('Image Configuration - Stacks');
      stacks.forEach((stack) => {
        console.log('  ' + chalk.cyan(stack.StackName ?? '') + '  ' + formatStackStatus(stack.StackStatus ?? 'UNKNOWN'));
      });
    } catch (error) {
      handleError(error);
    }
  },
};

export default listStacksCommand;
