import type { CommandModule } from 'yargs';
import ora from 'ora';
import chalk from 'chalk';
import { logger } from '../utils/logger.js';
import { loadImageBuilderConfig } from '../utils/config.js';
import { buildCommandContext, createValidationCollaborators, type CommandContext } from '../utils/context.js';
import { handleError, ValidationError } from '../utils/errors.js';
import { printValidationReport } from '../utils/report.js';
import { parseFailureLevel } from '../utils/validation.js';
import { validationFailureSuggestions } from '../utils/suggestions.js';
import { validateImageBuilderConfig } from '../models/imagebuilder-config.js';
import { hasBlockingFailures } from '../validators/runner.js';
import type { FailureLevel, ValidationFailure } from '../validators/common.js';
import type { ImageBuilderConfig } from '../types/index.js';
import { DEFAULT_CONFIG_FILE } from '../constants.js';

export interface ValidateArgs {
  configFile: string;
  region?: string;
  profile?: string;
  validationFailureLevel: string;
  suppressValidators?: string[];
}

export interface ConfigValidationOutcome {
  config: ImageBuilderConfig;
  failures: ValidationFailure[];
  blocked: boolean;
}

/**
 * Parses the config file and runs every semantic check, printing the report.
 * Parsing errors throw; rule violations are returned.
 */
export async function runConfigValidation(
  configFile: string,
  ctx: CommandContext,
  options: { failureLevel: FailureLevel; suppress?: string[] }
): Promise<ConfigValidationOutcome> {
  const config = loadImageBuilderConfig(configFile);
  logger.success(`Configuration parsed (${configFile})`);

  const spinner = ora('Running configuration validators...').start();
  let failures: ValidationFailure[];
  try {
    failures = await validateImageBuilderConfig(config, createValidationCollaborators(ctx), {
      suppress: options.suppress
    });
    spinner.succeed('Validators finished');
  } catch (error) {
    spinner.fail('Validators could not run');
    throw error;
  }

  printValidationReport(failures);

  return {
    config,
    failures,
    blocked: hasBlockingFailures(failures, options.failureLevel)
  };
}

export const validateCommand: CommandModule<{}, ValidateArgs> = {
  command: 'validate',
  describe: 'Validate an image build configuration file',

  builder: (yargs) => {
    return yargs
      .option('config-file', {
        alias: 'c',
        type: 'string',
        describe: 'Path to the YAML/JSON configuration file',
        default: DEFAULT_CONFIG_FILE,
      })
      .option('region', {
        alias: 'r',
        type: 'string',
        describe: 'AWS region used for snapshot and S3 lookups',
      })
      .option('profile', {
        type: 'string',
        describe: 'AWS profile',
      })
      .option('validation-failure-level', {
        type: 'string',
        describe: 'Minimum failure level that fails validation (INFO, WARNING, ERROR)',
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
      const failureLevel = parseFailureLevel(argv.validationFailureLevel);
      const ctx = await buildCommandContext({ region: argv.region, profile: argv.profile });

      logger.title('Image Configuration - Validate');
      logger.info(`Region: ${chalk.cyan(ctx.region)}`);

      const outcome = await runConfigValidation(argv.configFile, ctx, {
        failureLevel,
        suppress: argv.suppressValidators
      });

      if (outcome.blocked) {
        throw new ValidationError(
          `Configuration has failures at level ${failureLevel} or above`,
          validationFailureSuggestions()
        );
      }
    } catch (error) {
      handleError(error);
    }
  },
};

export default validateCommand;
