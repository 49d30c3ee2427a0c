/**
 * Select-list sub-parser.
 *
 * Handles bare tags and `*`, `tag.field` and `tag(field, ...)` projections,
 * and the functions COUNT, SUMMARIZE, TFIDF, TRIM, TEXT, INNER_HTML and
 * FLATTEN_TEXT (alias FLATTEN).
 *
 * @module lang/parse-select
 */

import {
  isIntrinsicField,
  isNodeColumn,
  itemColumns,
  type FieldRef,
  type NodeColumn,
  type ProjectionItem,
  type SelectItem,
  type TfidfOptions,
} from './ast.js';
import type { TokenCursor } from './cursor.js';
import type { Token } from './tokens.js';

const FUNCTIONS = new Set(['COUNT', 'SUMMARIZE', 'TFIDF', 'TRIM', 'TEXT', 'INNER_HTML']);
const FLATTEN_FUNCTIONS = new Set(['FLATTEN_TEXT', 'FLATTEN']);

/** Items that produce exactly one column */
type NamedItem = Exclude<ProjectionItem, { kind: 'flatten_text' }>;

type FlattenItem = Extract<SelectItem, { kind: 'flatten_text' }>;

type Mutable<T> = { -readonly [K in keyof T]: T[K] };

export function parseSelectList(c: TokenCursor): SelectItem[] {
  const items: SelectItem[] = [];
  const starts: Token[] = [];
  do {
    const start = c.current();
    for (const item of parseSelectItem(c)) {
      items.push(item);
      starts.push(start);
    }
  } while (c.matchAndAdvance('COMMA'));

  validateSelectList(c, items, starts);
  return items;
}

function validateSelectList(c: TokenCursor, items: SelectItem[], starts: Token[]): void {
  const nodeItems = items.filter((item) => item.kind === 'node');
  const offending = (index: number): Token => starts[index] ?? c.current();

  if (nodeItems.length > 0 && nodeItems.length < items.length) {
    const index = items.findIndex((item) => item.kind !== 'node');
    throw c.violation('Cannot mix tag-only and projected fields in SELECT', offending(index), 'XSQL_P201');
  }
  if (nodeItems.length > 1 && nodeItems.some((item) => item.tag === null)) {
    const index = items.findIndex((item) => item.kind === 'node' && item.tag === null);
    throw c.violation('SELECT * cannot be combined with other items', offending(index), 'XSQL_P201');
  }

  const flattenAt = items.flatMap((item, index) => (item.kind === 'flatten_text' ? [index] : []));
  if (flattenAt.length > 1) {
    throw c.violation('FLATTEN_TEXT can appear only once per query', offending(flattenAt[1] ?? 0), 'XSQL_P201');
  }
  if (flattenAt.length > 0) {
    const index = items.findIndex((item) => item.kind === 'count' || item.kind === 'tfidf' || item.kind === 'summarize');
    if (index >= 0) {
      throw c.violation('FLATTEN_TEXT cannot be combined with aggregates', offending(index), 'XSQL_P201');
    }
  }

  const seen = new Set<string>();
  items.forEach((item, index) => {
    if (item.kind === 'node') return;
    for (const name of itemColumns(item)) {
      if (seen.has(name)) {
        throw c.violation(`Duplicate column name '${name}'`, offending(index), 'XSQL_P205');
      }
      seen.add(name);
    }
  });
}

function parseSelectItem(c: TokenCursor): SelectItem[] {
  if (c.matchAndAdvance('STAR')) {
    return [{ kind: 'node', tag: null }];
  }

  const token = c.current();
  if (token.type === 'IDENTIFIER' && c.peek().type === 'LPAREN') {
    const fn = token.value.toUpperCase();
    if (FUNCTIONS.has(fn)) return [withAlias(c, parseFunction(c))];
    if (FLATTEN_FUNCTIONS.has(fn)) return [parseFlattenText(c)];
  }

  const tag = c.expectTag();

  if (c.matchAndAdvance('DOT')) {
    const field = c.expectName('field name');
    return [withAlias(c, projection(tag, field.value))];
  }

  if (c.matchAndAdvance('LPAREN')) {
    const items: SelectItem[] = [];
    do {
      items.push(projection(tag, c.expectName('field name').value));
    } while (c.matchAndAdvance('COMMA'));
    c.expect('RPAREN', "')'");
    return items;
  }

  return [{ kind: 'node', tag }];
}

function withAlias(c: TokenCursor, item: NamedItem): SelectItem {
  if (!c.matchAndAdvance('AS')) return item;
  const alias = c.expectName('column alias').value;
  return { ...item, name: alias };
}

/** `tag.field`; `attributes.x` reads the candidate's own attribute */
function projection(tag: string, written: string): NamedItem {
  const field = written.toLowerCase();
  const name = `${tag}.${written}`;

  if (tag === 'attributes') {
    return { kind: 'field', name, tag: null, field: { kind: 'attribute', name: field }, trim: false };
  }
  if (field === 'inner_html') {
    return { kind: 'inner_html', name, tag, maxLength: null, trim: false };
  }

  let ref: FieldRef;
  if (field === 'attributes') {
    ref = { kind: 'attributes' };
  } else if (isIntrinsicField(field)) {
    ref = { kind: 'tag_field', field };
  } else {
    ref = { kind: 'attribute', name: field };
  }
  return { kind: 'field', name, tag, field: ref, trim: false };
}

function parseFunction(c: TokenCursor): NamedItem {
  const fnToken = c.advance();
  const fn = fnToken.value.toUpperCase();
  c.expect('LPAREN', "'('");

  let item: NamedItem;
  switch (fn) {
    case 'COUNT': {
      const tag = c.matchAndAdvance('STAR') ? null : c.expectTag();
      item = { kind: 'count', name: `COUNT(${tag ?? '*'})`, tag };
      break;
    }
    case 'SUMMARIZE':
      c.expect('STAR', "'*'");
      item = { kind: 'summarize', name: 'SUMMARIZE(*)' };
      break;
    case 'TEXT': {
      const tag = c.expectTag();
      item = { kind: 'text', name: `TEXT(${tag})`, tag, trim: false };
      break;
    }
    case 'INNER_HTML':
      item = parseInnerHtmlArgs(c);
      break;
    case 'TRIM':
      item = parseTrimArg(c);
      break;
    default:
      item = parseTfidfArgs(c, fnToken);
      break;
  }

  c.expect('RPAREN', "')'");
  return item;
}

function parseInnerHtmlArgs(c: TokenCursor): NamedItem {
  const tag = c.expectTag();
  const maxLength = c.matchAndAdvance('COMMA') ? c.expectInteger('maximum length') : null;
  return {
    kind: 'inner_html',
    name: maxLength === null ? `INNER_HTML(${tag})` : `INNER_HTML(${tag}, ${maxLength})`,
    tag,
    maxLength,
    trim: false,
  };
}

function parseTrimArg(c: TokenCursor): NamedItem {
  const token = c.current();
  let inner: NamedItem;

  if (c.checkWord('TEXT') && c.peek().type === 'LPAREN') {
    c.advance();
    c.advance();
    const tag = c.expectTag();
    c.expect('RPAREN', "')'");
    inner = { kind: 'text', name: `TEXT(${tag})`, tag, trim: false };
  } else if (c.checkWord('INNER_HTML') && c.peek().type === 'LPAREN') {
    c.advance();
    c.advance();
    inner = parseInnerHtmlArgs(c);
    c.expect('RPAREN', "')'");
  } else if (c.isTagToken() && c.peek().type === 'DOT') {
    const tag = c.expectTag();
    c.advance();
    inner = projection(tag, c.expectName('field name').value);
  } else {
    throw c.error('TEXT(tag), INNER_HTML(tag[, n]) or tag.field');
  }

  switch (inner.kind) {
    case 'text':
    case 'inner_html':
    case 'field':
      return { ...inner, name: `TRIM(${inner.name})`, trim: true };
    default:
      throw c.violation('TRIM accepts TEXT, INNER_HTML or a field projection', token, 'XSQL_P201');
  }
}

function parseTfidfArgs(c: TokenCursor, fnToken: Token): NamedItem {
  const tags: string[] = [];
  const terms: string[] = [];
  const labels: string[] = [];
  const options: Mutable<TfidfOptions> = { topTerms: null, minDf: null, maxDf: null, stopwords: null };
  let star = false;
  let sawOption = false;

  do {
    const token = c.current();
    if (token.type === 'STAR') {
      if (tags.length > 0 || sawOption) {
        throw c.violation('TFIDF(*) cannot be combined with tags', token, 'XSQL_P203');
      }
      c.advance();
      star = true;
      labels.push('*');
    } else if (token.type === 'STRING') {
      if (sawOption) throw c.violation('TFIDF terms must precede options', token, 'XSQL_P203');
      c.advance();
      terms.push(token.value);
      labels.push(`'${token.value}'`);
    } else if (token.type === 'IDENTIFIER' && c.peek().type === 'EQ') {
      sawOption = true;
      labels.push(parseTfidfOption(c, options));
    } else if (c.isTagToken(token)) {
      if (star) throw c.violation('TFIDF(*) cannot be combined with tags', token, 'XSQL_P203');
      if (sawOption) throw c.violation('TFIDF tags must precede options', token, 'XSQL_P203');
      const tag = c.expectTag();
      tags.push(tag);
      labels.push(tag);
    } else {
      throw c.error('TFIDF argument');
    }
  } while (c.matchAndAdvance('COMMA'));

  if (labels.length === 0) {
    throw c.violation('TFIDF requires at least one argument', fnToken, 'XSQL_P203');
  }

  return {
    kind: 'tfidf',
    name: `TFIDF(${labels.join(', ')})`,
    tags: star || tags.length === 0 ? null : tags,
    terms,
    options,
  };
}

function parseTfidfOption(c: TokenCursor, options: Mutable<TfidfOptions>): string {
  const nameToken = c.advance();
  const name = nameToken.value.toUpperCase();
  c.advance();

  switch (name) {
    case 'TOP_TERMS': {
      const valueToken = c.current();
      const value = c.expectInteger('positive integer');
      if (value <= 0) throw c.violation('TOP_TERMS must be greater than 0', valueToken, 'XSQL_P203');
      options.topTerms = value;
      return `TOP_TERMS=${value}`;
    }
    case 'MIN_DF':
      options.minDf = c.expectInteger('non-negative integer');
      return `MIN_DF=${options.minDf}`;
    case 'MAX_DF':
      options.maxDf = c.expectInteger('non-negative integer');
      return `MAX_DF=${options.maxDf}`;
    case 'STOPWORDS': {
      const valueToken = c.expectName('ENGLISH, DEFAULT, NONE or OFF');
      const value = valueToken.value.toUpperCase();
      if (value === 'ENGLISH' || value === 'DEFAULT') {
        options.stopwords = 'english';
      } else if (value === 'NONE' || value === 'OFF') {
        options.stopwords = 'none';
      } else {
        throw c.violation(`Unknown STOPWORDS value '${valueToken.value}'`, valueToken, 'XSQL_P203');
      }
      return `STOPWORDS=${value}`;
    }
    default:
      throw c.violation(`Unknown TFIDF option '${nameToken.value}'`, nameToken, 'XSQL_P203');
  }
}

/**
 * `FLATTEN_TEXT(tag[, depth]) [AS (col, ...)]`. Without AS the single column
 * is named `flatten_text`.
 */
function parseFlattenText(c: TokenCursor): FlattenItem {
  c.advance();
  c.expect('LPAREN', "'('");
  const tag = c.expectTag();
  const depth = c.matchAndAdvance('COMMA') ? c.expectInteger('depth') : null;
  c.expect('RPAREN', "')'");

  if (!c.matchAndAdvance('AS')) {
    return { kind: 'flatten_text', tag, depth, columns: ['flatten_text'] };
  }
  if (!c.matchAndAdvance('LPAREN')) {
    return { kind: 'flatten_text', tag, depth, columns: [c.expectName('column alias').value] };
  }
  const columns: string[] = [];
  do {
    columns.push(c.expectName('column alias').value);
  } while (c.matchAndAdvance('COMMA'));
  c.expect('RPAREN', "')'");
  return { kind: 'flatten_text', tag, depth, columns };
}

/** `EXCLUDE field` or `EXCLUDE (field, ...)` */
export function parseExcludeList(c: TokenCursor): NodeColumn[] {
  const fields: NodeColumn[] = [];
  const parenthesised = c.matchAndAdvance('LPAREN');
  do {
    const token = c.expectName('field name');
    const name = token.value.toLowerCase();
    if (!isNodeColumn(name)) {
      throw c.violation(`Unknown EXCLUDE field '${token.value}'`, token, 'XSQL_P202');
    }
    fields.push(name);
  } while (parenthesised && c.matchAndAdvance('COMMA'));
  if (parenthesised) c.expect('RPAREN', "')'");
  return fields;
}
