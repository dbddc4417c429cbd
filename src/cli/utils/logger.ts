import chalk from 'chalk';
import type { FailureLevel } from '../validators/common.js';

const LEVEL_STYLES: Record<FailureLevel, (text: string) => string> = {
  ERROR: chalk.red,
  WARNING: chalk.yellow,
  INFO: chalk.blue,
};

export const logger = {
  info: (msg: string) => console.log(chalk.blue('ℹ'), msg),
  success: (msg: string) => console.log(chalk.green('✓'), msg),
  warn: (msg: string) => console.log(chalk.yellow('⚠'), msg),
  error: (msg: string) => console.log(chalk.red('✗'), msg),

  /** One line of a validation report, e.g. `[ERROR] EbsVolumeIopsValidator: ...` */
  failure: (level: FailureLevel, source: string, msg: string) => {
    console.log(LEVEL_STYLES[level](`[${level}]`), chalk.bold(source + ':'), msg);
  },

  title: (msg: string) => {
    const border = '─'.repeat(msg.length + 4);
    console.log(chalk.bold(`\n┌${border}┐`));
    console.log(chalk.bold(`│  ${msg}  │`));
    console.log(chalk.bold(`└${border}┘\n`));
  }
};
