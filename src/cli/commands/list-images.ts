import type { CommandModule } from 'yargs';
import ora from 'ora';
import chalk from 'chalk';
import type { Stack } from '@aws-sdk/client-cloudformation';
import { logger } from '../utils/logger.js';
import { buildCommandContext } from '../utils/context.js';
import { getStackTag, listImageBuilderStacks } from '../utils/cfn.js';
import { handleError, withRetry } from '../utils/errors.js';
import { IMAGE_NAME_TAG } from '../constants.js';
import type { ImageStackSummary } from '../types/index.js';
import { formatStackStatus } from './describe-image.js';

export function toImageStackSummary(stack: Stack, region: string): ImageStackSummary {
  return {
    imageId: getStackTag(stack, IMAGE_NAME_TAG) ?? '',
    stackName: stack.StackName ?? '',
    stackStatus: stack.StackStatus ?? 'UNKNOWN',
    region,
    createdAt: stack.CreationTime?.toISOString()
  };
}

interface ListImagesArgs {
  region?: string;
  profile?: string;
}

export const listImagesCommand: CommandModule<{}, ListImagesArgs> = {
  command: 'list-images',
  describe: 'List image build stacks in a region',

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
      const spinner = ora('Listing images...').start();

      let images: ImageStackSummary[];
      try {
        const stacks = await withRetry(() => listImageBuilderStacks(ctx.region), {
          maxAttempts: 2,
          operationName: 'list image stacks'
        });
        images = stacks.map((stack) => toImageStackSummary(stack, ctx.region));
        spinner.succeed(`Found ${images.length} image(s)`);
      } catch (error) {
        spinner.fail('Failed to list images');
        throw error;
      }

      if (images.length === 0) {
        logger.info(`No images found in ${ctx.region}`);
        console.log('\nRun: ' + chalk.cyan('hpc-image-builder build-image --image-id <id>'));
        return;
      }

      logger.title('Image Configuration - Images');
      images.forEach((image) => {
        console.log('  ' + chalk.cyan(image.imageId) + '  ' + formatStackStatus(image.stackStatus));
        console.log('    ' + chalk.gray(`${image.stackName}${image.createdAt ? ` · ${image.createdAt}` : ''}`));
      });
    } catch (error) {
      handleError(error);
    }
  },
};

export default listImagesCommand;
