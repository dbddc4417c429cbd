import type { CommandModule } from 'yargs';
import ora from 'ora';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { buildCommandContext } from '../utils/context.js';
import { describeStack, describeStackResource, getStackTemplate } from '../utils/cfn.js';
import { handleError, StackNotFoundError, withRetry } from '../utils/errors.js';
import { getImageStackName, requireImageId } from '../utils/validation.js';
import { IMAGE_RESOURCE_LOGICAL_ID } from '../constants.js';

export function formatStackStatus(status: string): string {
  if (status.includes('FAILED') || status.includes('ROLLBACK')) return chalk.red('✗ ' + status);
  if (status.includes('COMPLETE')) return chalk.green('✓ ' + status);
  return chalk.yellow('⚙ ' + status);
}

interface DescribeImageArgs {
  imageId: string;
  region?: string;
  profile?: string;
  showTemplate: boolean;
}

export const describeImageCommand: CommandModule<{}, DescribeImageArgs> = {
  command: 'describe-image',
  describe: 'Show the build stack of an image',

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
      .option('show-template', {
        type: 'boolean',
        describe: 'Print the stack template',
        default: false,
      });
  },

  handler: async (argv) => {
    try {
      const imageId = requireImageId(argv.imageId);
      const ctx = await buildCommandContext({ region: argv.region, profile: argv.profile });
      const stackName = getImageStackName(imageId);

      const spinner = ora('Describing image stack...').start();

      try {
        const stack = await withRetry(() => describeStack(stackName, ctx.region), {
          maxAttempts: 2,
          operationName: 'describe stack'
        });
        spinner.succeed('Stack retrieved');

        logger.title('Image Configuration - Describe');
        console.log(chalk.bold('Image:'), imageId);
        console.log(chalk.bold('Stack:'), stackName, chalk.gray(`(${ctx.region})`));
        console.log(chalk.bold('Status:'), formatStackStatus(stack.StackStatus ?? 'UNKNOWN'));
        if (stack.StackStatusReason) {
          console.log(chalk.bold('Reason:'), stack.StackStatusReason);
        }
        if (stack.CreationTime) {
          console.log(chalk.bold('Created:'), stack.CreationTime.toISOString());
        }

        if (stack.StackStatus === 'CREATE_COMPLETE') {
          const resource = await describeStackResource(stackName, IMAGE_RESOURCE_LOGICAL_ID, ctx.region);
          if (resource?.PhysicalResourceId) {
            console.log(chalk.bold('Image ARN:'), resource.PhysicalResourceId);
          }
        }

        const outputs = stack.Outputs ?? [];
        if (outputs.length > 0) {
          console.log('\n' + chalk.bold('Outputs:'));
          outputs.forEach((output) => {
            console.log(`  ${chalk.cyan(output.OutputKey ?? '')}: ${output.OutputValue ?? ''}`);
          });
        }

        if (argv.showTemplate) {
          const template = await getStackTemplate(stackName, ctx.region);
          console.log('\n' + chalk.bold('Template:'));
          console.log(template ?? '');
        }
      } catch (error) {
        spinner.fail('Failed to describe image');

        if (error instanceof StackNotFoundError) {
          console.log('\n' + chalk.yellow(`⚠ No image found with id ${imageId}`));
          console.log('\nRun: ' + chalk.cyan('hpc-image-builder list-images'));
        } else {
          throw error;
        }
      }
    } catch (error) {
      handleError(error);
    }
  },
};

export default describeImageCommand;
