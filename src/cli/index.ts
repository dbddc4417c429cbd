#!/usr/bin/env node
import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import validateCommand from './commands/validate.js';
import buildImageCommand from './commands/build-image.js';
import describeImageCommand from './commands/describe-image.js';
import listImagesCommand from './commands/list-images.js';
import listStacksCommand from './commands/list-stacks.js';
import deleteImageCommand from './commands/delete-image.js';
import { validateNodeVersion } from './utils/aws-validation.js';
import { handleError } from './utils/errors.js';

try {
  validateNodeVersion();
} catch (error) {
  handleError(error);
}

await yargs(hideBin(process.argv))
  .scriptName('hpc-image-builder')
  .usage('$0 <command> [options]')
  .command(validateCommand)
  .command(buildImageCommand)
  .command(describeImageCommand)
  .command(listImagesCommand)
  .command(listStacksCommand)
  .command(deleteImageCommand)
  .demandCommand(1, 'You must specify a command')
  .help()
  .alias('h', 'help')
  .version()
  .alias('v', 'version')
  .strict()
  .parseAsync();
