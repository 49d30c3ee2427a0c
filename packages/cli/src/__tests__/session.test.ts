import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { SourceError } from '@xsql/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { runQuery } from '../commands/query.js';
import { parseConfig } from '../config/loader.js';
import { XsqlSession } from '../session.js';
import { PAGE, captureOutput, catchError, type CapturedOutput } from './helpers.js';

describe('XsqlSession', () => {
  let tmpDir: string;
  let output: CapturedOutput;
  let session: XsqlSession;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'xsql-session-test-'));
    fs.writeFileSync(path.join(tmpDir, 'page.html'), PAGE);
    output = captureOutput();
    session = new XsqlSession({ config: parseConfig({}), cwd: tmpDir, output });
    session.load('page.html');
  });

  afterEach(() => {
    session.destroy();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should print list results as JSON', async () => {
    expect(await session.run('SELECT a.href FROM doc')).toBe(true);
    expect(output.stdout).toEqual([JSON.stringify([{ 'a.href': '/one' }, { 'a.href': '/two' }], null, 2)]);
  });

  it('should print list results as a table in table mode', async () => {
    session.mode = 'table';
    await session.run('SELECT a.href FROM doc');
    expect(output.stdout).toEqual(['a.href\n------\n/one\n/two']);
  });

  it('should cap displayed table rows', async () => {
    session.mode = 'table';
    session.maxDisplayRows = 1;
    await session.run('SELECT a.href FROM doc');
    expect(output.stdout).toEqual(['a.href\n------\n/one\n(showing 1 of 2 rows)']);
  });

  it('should write CSV output relative to its directory', async () => {
    await session.run("SELECT a.href FROM doc TO CSV('links.csv')");
    const target = path.join(tmpDir, 'links.csv');

    expect(output.stdout).toEqual([`Wrote 2 rows to ${target}`]);
    expect(fs.readFileSync(target, 'utf-8')).toBe('a.href\n/one\n/two\n');
  });

  it('should point at parse errors', async () => {
    expect(await session.run('SELECT FROM doc')).toBe(false);
    expect(output.stdout).toEqual([]);

    const lines = (output.stderr[0] ?? '').split('\n');
    expect(lines[0]).toMatch(/^Error \[XSQL_P200\] /);
    expect(lines.slice(1, 3)).toEqual(['SELECT FROM doc', '       ^']);
  });

  it('should load aliased documents', async () => {
    fs.writeFileSync(path.join(tmpDir, 'menu.html'), '<ol><li>x</li><li>y</li></ol>');
    session.load('menu.html', 'menu');

    await session.run('SELECT li.text FROM menu');
    expect(output.stdout).toEqual([JSON.stringify([{ 'li.text': 'x' }, { 'li.text': 'y' }], null, 2)]);
  });

  it('should report unreadable files as source errors', () => {
    const error = catchError(() => session.load('missing.html'));
    expect(error).toBeInstanceOf(SourceError);
    expect(error).toMatchObject({ code: 'XSQL_S301' });
  });

  describe('runQuery', () => {
    it('should run every statement, the last without a terminator', async () => {
      expect(await runQuery(session, 'SELECT COUNT(li) FROM doc; SELECT a.href FROM doc')).toBe(0);
      expect(output.stdout).toHaveLength(2);
      expect(output.stdout[0]).toBe(JSON.stringify([{ 'COUNT(li)': 2 }], null, 2));
    });

    it('should stop at the first failing statement', async () => {
      expect(await runQuery(session, 'SELECT FROM doc; SELECT a.href FROM doc;')).toBe(1);
      expect(output.stdout).toEqual([]);
      expect(output.stderr).toHaveLength(1);
    });

    it('should ignore a trailing comment', async () => {
      expect(await runQuery(session, 'SELECT a.href FROM doc; -- done')).toBe(0);
      expect(output.stdout).toHaveLength(1);
    });
  });
});
