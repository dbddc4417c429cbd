import { describe, it, expect, afterEach, beforeEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { loadImageBuilderConfig, resolveConfigPath } from '../../src/cli/utils/config.js';
import { ConfigError } from '../../src/cli/utils/errors.js';

describe('config loading', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'hpcimg-config-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('resolves relative paths against the working directory', () => {
    expect(resolveConfigPath('image-config.yaml')).toBe(path.join(process.cwd(), 'image-config.yaml'));
    expect(resolveConfigPath('/etc/image.yaml')).toBe('/etc/image.yaml');
  });

  it('loads a YAML file', () => {
    const file = path.join(dir, 'image.yaml');
    fs.writeFileSync(file, 'Build:\n  InstanceType: t3.large\n  ParentImage: ami-0123456789abcdef0\n');

    const config = loadImageBuilderConfig(file);
    expect(config.build.instanceType).toBe('t3.large');
    expect(config.build.parentImage).toBe('ami-0123456789abcdef0');
  });

  it('throws a ConfigError for a missing file', () => {
    const file = path.join(dir, 'missing.yaml');
    expect(() => loadImageBuilderConfig(file)).toThrow(ConfigError);
    expect(() => loadImageBuilderConfig(file)).toThrow(`Config file not found: ${file}`);
  });

  it('names the file when it cannot be parsed', () => {
    const file = path.join(dir, 'broken.yaml');
    fs.writeFileSync(file, 'Build: [unclosed\n');
    expect(() => loadImageBuilderConfig(file)).toThrow(`Failed to parse ${file}:`);
  });
});
