/**
 * Configuration Tests
 */

import { afterEach, beforeEach, describe, it, expect } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { clearConfigCache, getNumberEnv, loadConfigFromYaml } from '../../src/config/index.js';
import { ConfigurationError } from '../../src/errors.js';

describe('getNumberEnv', () => {
  it('should parse numeric values', () => {
    expect(getNumberEnv('RADIUS', { RADIUS: '3' })).toBe(3);
    expect(getNumberEnv('RADIUS', { RADIUS: ' 2.5 ' })).toBe(2.5);
  });

  it('should return undefined for missing or blank values', () => {
    expect(getNumberEnv('RADIUS', {})).toBeUndefined();
    expect(getNumberEnv('RADIUS', { RADIUS: '  ' })).toBeUndefined();
  });

  it('should reject non-numeric values', () => {
    expect(() => getNumberEnv('RADIUS', { RADIUS: 'three' })).toThrow(ConfigurationError);
  });
});

describe('loadConfigFromYaml', () => {
  let dir: string;

  beforeEach(() => {
    clearConfigCache();
    dir = mkdtempSync(join(tmpdir(), 'tunekit-config-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('should load a mapping', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'run_config_search_radius: 2\nprofile_models:\n  - classifier\n');

    expect(loadConfigFromYaml(path)).toEqual({
      run_config_search_radius: 2,
      profile_models: ['classifier'],
    });
  });

  it('should cache per path until cleared', () => {
    const path = join(dir, 'config.yaml');
    writeFileSync(path, 'run_config_search_radius: 2\n');
    loadConfigFromYaml(path);
    writeFileSync(path, 'run_config_search_radius: 5\n');

    expect(loadConfigFromYaml(path)).toEqual({ run_config_search_radius: 2 });
    clearConfigCache();
    expect(loadConfigFromYaml(path)).toEqual({ run_config_search_radius: 5 });
  });

  it('should return an empty config for a missing file', () => {
    expect(loadConfigFromYaml(join(dir, 'missing.yaml'))).toEqual({});
  });

  it('should return an empty config for invalid YAML or a non-mapping', () => {
    const invalid = join(dir, 'invalid.yaml');
    writeFileSync(invalid, 'key: [unclosed\n');
    const list = join(dir, 'list.yaml');
    writeFileSync(list, '- a\n- b\n');

    expect(loadConfigFromYaml(invalid)).toEqual({});
    expect(loadConfigFromYaml(list)).toEqual({});
  });
});
