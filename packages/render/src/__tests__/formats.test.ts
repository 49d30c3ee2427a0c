import { describe, expect, it } from 'vitest';
import { escapeCsvValue, toCsv } from '../csv.js';
import { inferColumnType, sanitizeColumnNames } from '../parquet.js';
import { displayValue, formatTable } from '../table.js';

describe('escapeCsvValue', () => {
  it('should leave plain values bare', () => {
    expect(escapeCsvValue('/home')).toBe('/home');
    expect(escapeCsvValue(3)).toBe('3');
    expect(escapeCsvValue(false)).toBe('false');
  });

  it('should write null as an empty field', () => {
    expect(escapeCsvValue(null)).toBe('');
  });

  it('should quote delimiters, quotes and line breaks', () => {
    expect(escapeCsvValue('a,b')).toBe('"a,b"');
    expect(escapeCsvValue('say "hi"')).toBe('"say ""hi"""');
    expect(escapeCsvValue('two\nlines')).toBe('"two\nlines"');
  });

  it('should encode lists as JSON', () => {
    expect(escapeCsvValue([['class', 'x']])).toBe('"[[""class"",""x""]]"');
  });
});

describe('toCsv', () => {
  it('should write a header row and end every line with a newline', () => {
    const csv = toCsv({
      columns: ['a.href', 'COUNT(*)'],
      rows: [
        { 'a.href': '/home', 'COUNT(*)': 3 },
        { 'a.href': null, 'COUNT(*)': 3 },
      ],
    });
    expect(csv).toBe('a.href,COUNT(*)\n/home,3\n,3\n');
  });

  it('should write only the header for an empty result', () => {
    expect(toCsv({ columns: ['li.text'], rows: [] })).toBe('li.text\n');
  });
});

describe('formatTable', () => {
  const result = {
    columns: ['tag', 'node_id'],
    rows: [
      { tag: 'a', node_id: 5 },
      { tag: 'li', node_id: null },
    ],
  };

  it('should align columns under a header and a dash rule', () => {
    expect(formatTable(result).split('\n')).toEqual(['tag | node_id', '----+--------', 'a   | 5', 'li  | NULL']);
  });

  it('should size columns by their cells without a header', () => {
    expect(formatTable(result, { header: false }).split('\n')).toEqual(['a  | 5', 'li | NULL']);
  });

  it('should render nothing without columns', () => {
    expect(formatTable({ columns: [], rows: [] })).toBe('');
  });

  it('should flatten line breaks in cells', () => {
    expect(displayValue('one\r\ntwo')).toBe('one two');
  });
});

describe('Parquet columns', () => {
  it('should sanitise and deduplicate names', () => {
    expect(sanitizeColumnNames(['a.href', 'COUNT(*)', 'a_href', ''])).toEqual([
      'a_href',
      'COUNT___',
      'a_href_2',
      'col4',
    ]);
  });

  it.each([
    [[1, 2, null], 'INT64'],
    [[1, 2.5], 'DOUBLE'],
    [[true, null], 'BOOLEAN'],
    [[null], 'UTF8'],
    [['x', 1], 'UTF8'],
  ] as const)('should infer %j as %s', (values, type) => {
    expect(inferColumnType([...values])).toBe(type);
  });
});
