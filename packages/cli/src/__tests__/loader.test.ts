import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { XsqlError } from '@xsql/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findConfigFile, loadConfig, loadProjectConfig, mergeConfig, parseConfig } from '../config/loader.js';

describe('config loader', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xsql-config-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should find the config file in a parent directory', () => {
    const nested = path.join(tmpDir, 'a', 'b');
    fs.mkdirSync(nested, { recursive: true });
    fs.writeFileSync(path.join(tmpDir, '.xsqlrc.json'), '{}');

    expect(findConfigFile(nested)).toBe(path.join(tmpDir, '.xsqlrc.json'));
  });

  it('should resolve the input against the config file directory', async () => {
    fs.writeFileSync(
      path.join(tmpDir, '.xsqlrc.json'),
      JSON.stringify({ input: 'page.html', mode: 'table', engine: { maxRows: 10 } })
    );

    const config = await loadProjectConfig(tmpDir);
    expect(config.input).toBe(path.join(tmpDir, 'page.html'));
    expect(config.mode).toBe('table');
    expect(config.maxDisplayRows).toBeNull();
    expect(config.engine.maxRows).toBe(10);
    expect(config.engine.summaryLength).toBe(120);
  });

  it('should report a file that is not JSON', async () => {
    const configPath = path.join(tmpDir, 'broken.json');
    fs.writeFileSync(configPath, '{ mode: ');

    await expect(loadConfig(configPath)).rejects.toMatchObject({ code: 'XSQL_C700' });
    await expect(loadConfig(configPath)).rejects.toThrow(`Failed to load config from ${configPath}`);
  });

  it('should list invalid fields', () => {
    expect(() => parseConfig({ mode: 'grid' }, 'x.json')).toThrow('Invalid configuration in x.json: mode: ');
    expect(() => parseConfig({ colour: true })).toThrow(XsqlError);
  });

  it('should lay overrides over file values', () => {
    const config = mergeConfig(parseConfig({ input: 'a.html', engine: { maxRows: 10 } }), {
      maxRows: 3,
      verbose: true,
    });

    expect(config.input).toBe('a.html');
    expect(config.engine.maxRows).toBe(3);
    expect(config.engine.logger).toEqual({ level: 'debug', json: true });
  });
});
