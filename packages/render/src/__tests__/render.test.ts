import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { ParquetReader } from '@dsnp/parquetjs';
import { OutputError, type ResultSet } from '@xsql/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { renderResult } from '../render.js';

const rows = [
  { tag: 'li', node_id: 9, attributes: [['class', 'item']], score: 0.5, visible: true },
  { tag: 'li', node_id: 10, attributes: null, score: 1.25, visible: null },
];
const columns = ['tag', 'node_id', 'attributes', 'score', 'visible'];

function asRecord(value: unknown): Record<string, unknown> {
  return typeof value === 'object' && value !== null ? Object.fromEntries(Object.entries(value)) : {};
}

async function readParquet(file: string): Promise<{ fields: string[]; records: Record<string, unknown>[] }> {
  const reader = await ParquetReader.openFile(file);
  try {
    const cursor = reader.getCursor();
    const records: Record<string, unknown>[] = [];
    for (let record = await cursor.next(); record !== null; record = await cursor.next()) {
      records.push(asRecord(record));
    }
    return { fields: reader.getSchema().fieldList.map((field) => field.name), records };
  } finally {
    await reader.close();
  }
}

describe('renderResult', () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'xsql-render-'));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should hand list results back unchanged', async () => {
    const result: ResultSet = { columns, rows, output: { kind: 'list' } };
    const rendering = await renderResult(result, { cwd: dir });
    expect(rendering).toEqual({ kind: 'list', result });
    expect(rendering.kind === 'list' && rendering.result).toBe(result);
  });

  it('should format tables without touching the filesystem', async () => {
    const rendering = await renderResult(
      { columns: ['tag'], rows: [{ tag: 'li' }], output: { kind: 'table', header: true, exportPath: null } },
      { cwd: dir }
    );
    expect(rendering).toEqual({ kind: 'table', text: 'tag\n---\nli', exportPath: null });
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('should export a table as CSV', async () => {
    const rendering = await renderResult(
      {
        columns: ['col1', 'col2'],
        rows: [{ col1: 'Apple', col2: '3' }],
        output: { kind: 'table', header: false, exportPath: 'fruit.csv' },
      },
      { cwd: dir }
    );
    expect(rendering).toEqual({ kind: 'table', text: 'Apple | 3', exportPath: path.join(dir, 'fruit.csv') });
    expect(fs.readFileSync(path.join(dir, 'fruit.csv'), 'utf-8')).toBe('col1,col2\nApple,3\n');
  });

  it('should write CSV relative to cwd', async () => {
    const rendering = await renderResult({ columns, rows, output: { kind: 'csv', path: 'out.csv' } }, { cwd: dir });
    expect(rendering).toEqual({ kind: 'file', format: 'csv', path: path.join(dir, 'out.csv'), rows: 2 });
    expect(fs.readFileSync(path.join(dir, 'out.csv'), 'utf-8')).toBe(
      'tag,node_id,attributes,score,visible\nli,9,"[[""class"",""item""]]",0.5,true\nli,10,,1.25,\n'
    );
    expect(fs.readdirSync(dir)).toEqual(['out.csv']);
  });

  it('should write Parquet with typed optional columns', async () => {
    const target = path.join(dir, 'out.parquet');
    await renderResult({
      columns: ['COUNT(*)', ...columns],
      rows: rows.map((row) => ({ 'COUNT(*)': 2, ...row })),
      output: { kind: 'parquet', path: target },
    });

    const { fields, records } = await readParquet(target);
    expect(fields).toEqual(['COUNT___', 'tag', 'node_id', 'attributes', 'score', 'visible']);
    expect(records.map((record) => Number(record['node_id']))).toEqual([9, 10]);
    expect(records.map((record) => record['tag'])).toEqual(['li', 'li']);
    expect(records.map((record) => record['attributes'] ?? null)).toEqual(['[["class","item"]]', null]);
    expect(records.map((record) => record['score'])).toEqual([0.5, 1.25]);
    expect(records.map((record) => record['visible'] ?? null)).toEqual([true, null]);
    expect(fs.readdirSync(dir)).toEqual(['out.parquet']);
  });

  it('should raise OutputError and leave no temporary file behind', async () => {
    fs.mkdirSync(path.join(dir, 'taken'));
    const render = renderResult({ columns, rows, output: { kind: 'csv', path: 'taken' } }, { cwd: dir });

    await expect(render).rejects.toBeInstanceOf(OutputError);
    await expect(render).rejects.toMatchObject({ code: 'XSQL_O600', path: path.join(dir, 'taken') });
    expect(fs.readdirSync(dir)).toEqual(['taken']);
  });
});
