import chalk from 'chalk';
import { logger } from './logger.js';
import {
  awsCredentialSuggestions,
  configNotFoundSuggestions,
  networkSuggestions,
  stackNotFoundSuggestions
} from './suggestions.js';

export class CLIError extends Error {
  constructor(
    message: string,
    public readonly suggestions: string[] = [],
    public readonly exitCode: number = 1
  ) {
    super(message);
    this.name = 'CLIError';
  }
}

function printSuggestions(suggestions: string[]): void {
  if (suggestions.length === 0) return;
  console.log('\n' + chalk.bold('Suggestions:'));
  suggestions.forEach(suggestion => {
    console.log('  ' + chalk.cyan('→') + ' ' + suggestion);
  });
}

export function handleError(error: unknown): never {
  if (error instanceof CLIError) {
    logger.error(error.message);
    printSuggestions(error.suggestions);
    process.exit(error.exitCode);
  }

  if (error instanceof Error) {
    logger.error(error.message);
    printSuggestions(getErrorSuggestions(error));
    process.exit(1);
  }

  logger.error('An unknown error occurred: ' + String(error));
  process.exit(1);
}

export function getErrorSuggestions(error: Error): string[] {
  const message = error.message.toLowerCase();
  const suggestions: string[] = [];

  if (message.includes('credentials') || message.includes('access denied')) {
    suggestions.push(...awsCredentialSuggestions());
  }

  if (message.includes('stack') && (message.includes('not found') || message.includes('does not exist'))) {
    suggestions.push(...stackNotFoundSuggestions());
  }

  if (message.includes('config') && message.includes('not found')) {
    suggestions.push(...configNotFoundSuggestions());
  }

  if (message.includes('timeout') || message.includes('network')) {
    suggestions.push(...networkSuggestions());
  }

  return suggestions;
}

export async function withRetry<T>(
  operation: () => Promise<T>,
  options: {
    maxAttempts?: number;
    delayMs?: number;
    shouldRetry?: (error: unknown) => boolean;
    operationName?: string;
  } = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    delayMs = 1000,
    shouldRetry = isRetryableError
  } = options;

  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await operation();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error) || attempt === maxAttempts) {
        throw error;
      }

      // Exponential backoff
      const delay = delayMs * Math.pow(2, attempt - 1);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();

  if (
    message.includes('timeout') ||
    message.includes('network') ||
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('throttl')
  ) {
    return true;
  }

  if (error.name === 'ThrottlingException' || error.name === 'TooManyRequestsException' || error.name === 'Throttling') {
    return true;
  }

  return false;
}

export class ValidationError extends CLIError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, suggestions, 1);
    this.name = 'ValidationError';
  }
}

export class AWSError extends CLIError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, suggestions, 1);
    this.name = 'AWSError';
  }
}

export class ConfigError extends CLIError {
  constructor(message: string, suggestions: string[] = []) {
    super(message, suggestions, 1);
    this.name = 'ConfigError';
  }
}

export class StackNotFoundError extends AWSError {
  constructor(
    public readonly stackName: string,
    public readonly operation: string
  ) {
    super(`Stack '${stackName}' does not exist (${operation})`, stackNotFoundSuggestions());
    this.name = 'StackNotFoundError';
  }
}
