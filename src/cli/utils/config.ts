import path from 'path';
import fs from 'fs';
import * as yaml from 'js-yaml';
import type { ImageBuilderConfig } from '../types/index.js';
import { ConfigError } from './errors.js';
import { ImageBuilderConfigSchema, formatIssues } from '../schemas/imagebuilder-schema.js';
import { configInvalidSuggestions, configNotFoundSuggestions } from './suggestions.js';

function deepFreeze<T>(value: T): T {
  if (value && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.values(value).forEach(deepFreeze);
    Object.freeze(value);
  }
  return value;
}

export function resolveConfigPath(configFile: string): string {
  return path.resolve(process.cwd(), configFile);
}

/**
 * Maps a parsed YAML/JSON document onto the image builder model.
 * Every shape or format problem is reported at once, keyed by its path in the file.
 */
export function parseImageBuilderConfig(raw: unknown): ImageBuilderConfig {
  if (!raw || typeof raw !== 'object' || Array.isArray(raw)) {
    throw new ConfigError('Configuration must be a mapping of sections (Image, Build, ...)', configInvalidSuggestions());
  }

  const result = ImageBuilderConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(
      'Configuration parsing failed:\n  ' + formatIssues(result.error).join('\n  '),
      configInvalidSuggestions()
    );
  }

  return deepFreeze(result.data);
}

export function parseImageBuilderConfigText(content: string, source = 'configuration'): ImageBuilderConfig {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Failed to parse ${source}: ${reason}`, [
      'Check the file is valid YAML or JSON'
    ]);
  }
  return parseImageBuilderConfig(raw);
}

export function loadImageBuilderConfig(configFile: string): ImageBuilderConfig {
  const configPath = resolveConfigPath(configFile);

  if (!fs.existsSync(configPath)) {
    throw new ConfigError(`Config file not found: ${configPath}`, configNotFoundSuggestions());
  }

  const content = fs.readFileSync(configPath, 'utf-8');
  return parseImageBuilderConfigText(content, configPath);
}
