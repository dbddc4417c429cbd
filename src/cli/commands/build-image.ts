import type { CommandModule } from 'yargs';
import ora from 'ora';
import chalk from 'chalk';
import type { Tag } from '@aws-sdk/client-cloudformation';
import { logger } from '../utils/logger.js';
import { buildCommandContext } from '../utils/context.js';
import { createStackFromUrl, stackExists } from '../utils/cfn.js';
import { handleError, AWSError, ValidationError } from '../utils/errors.js';
import { getImageStackName, parseFailureLevel, requireImageId } from '../utils/validation.js';
import { validationFailureSuggestions } from '../utils/suggestions.js';
import { parseUrlScheme } from '../validators/url-validators.js';
import { runConfigValidation } from './validate.js';
import { DEFAULT_CONFIG_FILE, IMAGE_NAME_TAG } from '../constants.js';
import type { ImageBuilderConfig } from '../types/index.js';

interface BuildImageArgs {
  imageId: string;
  configFile: string;
  templateUrl: string;
  region?: string;
  profile?: string;
  rollbackOnFailure: boolean;
  validationFailureLevel: string;
  suppressValidators?: string[];
}

export function buildStackTags(imageId: string, config: ImageBuilderConfig): Tag[] {
  return [
    { Key: IMAGE_NAME_TAG, Value: imageId },
    ...(config.image?.tags ?? []).map((tag) => ({ Key: tag.key, Value: tag.value })),
  ];
}

export const buildImageCommand: CommandModule<{}, BuildImageArgs> = {
  command: 'build-image',
  describe: 'Validate a configuration and create the image build stack',

  builder: (yargs) => {
    return yargs
      .option('image-id', {
        alias: 'i',
        type: 'string',
        describe: 'Id of the image to build',
        demandOption: true,
      })
      .option('config-file', {
        alias: 'c',
        type: 'string',
        describe: 'Path to the YAML/JSON configuration file',
        default: DEFAULT_CONFIG_FILE,
      })
      .option('template-url', {
        type: 'string',
        describe: 'HTTPS URL of the CloudFormation template for the build stack',
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
      .option('rollback-on-failure', {
        type: 'boolean',
        describe: 'Roll the stack back if the build fails',
        default: false,
      })
      .option('validation-failure-level', {
        type: 'string',
        describe: 'Minimum failure level that blocks the build (INFO, WARNING, ERROR)',
        default: 'ERROR',
      })
      .option('suppress-validators', {
        type: 'string',
        array: true,
        describe: 'Validators to skip: ALL or type:<ValidatorName>',
      });
  },

  handler: async (argv) => {
    try {
      const imageId = requireImageId(argv.imageId);
      const failureLevel = parseFailureLevel(argv.validationFailureLevel);

      if (parseUrlScheme(argv.templateUrl) !== 'https') {
        throw new ValidationError(`Template URL must use https: ${argv.templateUrl}`, [
          'Upload the template to S3 and pass its https URL'
        ]);
      }

      const ctx = await buildCommandContext({
        region: argv.region,
        profile: argv.profile,
        requireCredentials: true
      });

      logger.title('Image Configuration - Build');
      logger.info(`Building ${chalk.cyan(imageId)} in ${chalk.cyan(ctx.region)}`);

      const outcome = await runConfigValidation(argv.configFile, ctx, {
        failureLevel,
        suppress: argv.suppressValidators
      });

      if (outcome.blocked) {
        throw new ValidationError(
          `Build cancelled: configuration has failures at level ${failureLevel} or above`,
          validationFailureSuggestions()
        );
      }

      const stackName = getImageStackName(imageId);
      const spinner = ora(`Creating stack ${stackName}...`).start();

      try {
        if (await stackExists(stackName, ctx.region)) {
          throw new AWSError(`Image '${imageId}' already exists (stack ${stackName})`, [
            `Delete it first: hpc-image-builder delete-image --image-id ${imageId}`,
            'Or choose another --image-id'
          ]);
        }

        const stackId = await createStackFromUrl(
          stackName,
          argv.templateUrl,
          buildStackTags(imageId, outcome.config),
          ctx.region,
          !argv.rollbackOnFailure
        );
        spinner.succeed(`Stack creation started: ${stackName}`);
        if (stackId) {
          console.log(chalk.bold('Stack ID:'), stackId);
        }
      } catch (error) {
        spinner.fail('Stack creation failed');
        throw error;
      }

      console.log('\n' + chalk.bold('Next steps:'));
      console.log(`  ${chalk.cyan(`hpc-image-builder describe-image --image-id ${imageId}`)}  - Follow the build`);
    } catch (error) {
      handleError(error);
    }
  },
};

export default buildImageCommand;
