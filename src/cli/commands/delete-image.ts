import type { CommandModule } from 'yargs';
import ora from 'ora';
import prompts from 'prompts';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { buildCommandContext } from '../utils/context.js';
import { deleteStack, describeStack } from '../utils/cfn.js';
import { handleError, StackNotFoundError } from '../utils/errors.js';
import { getImageStackName, requireImageId } from '../utils/validation.js';

interface DeleteImageArgs {
  imageId: string;
  region?: string;
  profile?: string;
  force: boolean;
}

export const deleteImageCommand: CommandModule<{}, DeleteImageArgs> = {
  command: 'delete-image',
  describe: 'Delete the build stack of an image',

  builder: (yargs) => {
    return yargs
      .option('image-id', {
        alias: 'i',
        type: 'string',
        describe: 'Id of the image',
        demandOption: true,
      })
      .option('region', {
        alias: 'r',
        type: 'string',
        describe: 'AWS region',
      })
      .option('profile', {
        type: 'string',
        describe: 'AWS profile',
      })
      .option('force', {
        type: 'boolean',
        describe: 'Skip confirmation prompt',
        default: false,
      });
  },

  handler: async (argv) => {
    try {
      const imageId = requireImageId(argv.imageId);
      const ctx = await buildCommandContext({
        region: argv.region,
        profile: argv.profile,
        requireCredentials: true
      });
      const stackName = getImageStackName(imageId);

      logger.title('Image Configuration - Delete');

      const spinner = ora('Checking stack status...').start();
      try {
        await describeStack(stackName, ctx.region);
        spinner.succeed(`Stack found: ${stackName}`);
      } catch (error) {
        if (error instanceof StackNotFoundError) {
          spinner.warn('Stack not found (may already be deleted)');
          logger.info('Nothing to delete');
          return;
        }
        spinner.fail('Failed to check stack');
        throw error;
      }

      console.log('\n' + chalk.red('⚠ WARNING:') + ' This will delete the CloudFormation stack ' + chalk.bold(stackName) + '\n');

      if (!argv.force) {
        const { confirmText } = await prompts({
          type: 'text',
          name: 'confirmText',
          message: `Type "${imageId}" to confirm:`,
          validate: (value: string) => value === imageId || `You must type ${imageId} to confirm`,
        });

        if (confirmText !== imageId) {
          logger.warn('Deletion cancelled');
          return;
        }
      }

      const deleteSpinner = ora('Requesting stack deletion...').start();
      try {
        await deleteStack(stackName, ctx.region);
        deleteSpinner.succeed(`Deletion started for ${stackName}`);
      } catch (error) {
        deleteSpinner.fail('Deletion failed');
        throw error;
      }
    } catch (error) {
      handleError(error);
    }
  },
};

export default deleteImageCommand;
