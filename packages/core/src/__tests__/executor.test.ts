import { parseHtml, outerHtml } from '@xsql/dom';
import { describe, expect, it } from 'vitest';
import { resolveEngineConfig } from '../config.js';
import { execute } from '../engine/executor.js';
import type { ResultSet } from '../engine/values.js';
import { ExecutionError, FilterError, XsqlError } from '../errors/index.js';
import { parseQuery } from '../lang/parser.js';
import { SHOP_PAGE, shopTree } from './fixtures.js';
import { catchError } from './helpers.js';

const tree = shopTree();

function run(text: string, options: Parameters<typeof execute>[2] = {}): ResultSet {
  return execute(parseQuery(text), tree, options);
}

function column(result: ResultSet, name: string): unknown[] {
  return result.rows.map((row) => row[name]);
}

function executionFailure(text: string, options: Parameters<typeof execute>[2] = {}): ExecutionError {
  const error = catchError(() => run(text, options));
  if (!(error instanceof ExecutionError)) throw new Error(`Expected an ExecutionError, got ${String(error)}`);
  return error;
}

describe('execute', () => {
  describe('node rows', () => {
    it('should return the identity columns for a bare tag', () => {
      const result = run('SELECT li FROM doc');
      expect(result.columns).toEqual([
        'node_id',
        'tag',
        'attributes',
        'parent_id',
        'sibling_pos',
        'max_depth',
        'doc_order',
        'source_uri',
      ]);
      expect(result.rows).toHaveLength(3);
      expect(result.rows[0]).toEqual({
        node_id: 9,
        tag: 'li',
        attributes: [['class', 'item']],
        parent_id: 8,
        sibling_pos: 1,
        max_depth: 0,
        doc_order: 9,
        source_uri: 'shop.html',
      });
      expect(result.output).toEqual({ kind: 'list' });
    });

    it('should drop EXCLUDEd columns and keep key order', () => {
      const result = run('SELECT * EXCLUDE (attributes, source_uri) FROM doc LIMIT 2');
      expect(result.columns).toEqual(['node_id', 'tag', 'parent_id', 'sibling_pos', 'max_depth', 'doc_order']);
      expect(result.rows).toEqual([
        { node_id: 0, tag: 'html', parent_id: null, sibling_pos: 1, max_depth: 3, doc_order: 0 },
        { node_id: 1, tag: 'head', parent_id: 0, sibling_pos: 1, max_depth: 1, doc_order: 1 },
      ]);
      expect(Object.keys(result.rows[1] ?? {})).toEqual(result.columns);
    });

    it('should keep document order across several tags', () => {
      const result = run('SELECT title, ul FROM doc');
      expect(column(result, 'node_id')).toEqual([2, 8]);
    });
  });

  describe('projections', () => {
    it('should read from the candidate or its first matching descendant', () => {
      const result = run('SELECT TEXT(p), INNER_HTML(p), INNER_HTML(div, 10) FROM doc');
      expect(result.columns).toEqual(['TEXT(p)', 'INNER_HTML(p)', 'INNER_HTML(div, 10)']);
      expect(result.rows).toEqual([
        { 'TEXT(p)': null, 'INNER_HTML(p)': null, 'INNER_HTML(div, 10)': '<a href="/' },
        { 'TEXT(p)': 'Contact us', 'INNER_HTML(p)': 'Contact <a href="mailto:x">us</a>', 'INNER_HTML(div, 10)': null },
      ]);
    });

    it('should read the candidate own attribute for attributes.x', () => {
      const result = run("SELECT attributes.href FROM doc WHERE tag = 'a' AND attributes.href <> ''");
      expect(column(result, 'attributes.href')).toEqual(['/home', '/docs', 'mailto:x']);
    });

    it('should cut INNER_HTML at whole code points', () => {
      const result = run("SELECT INNER_HTML(p, 4) AS head FROM RAW('<p>caf\u{1F600}s</p>')");
      expect(result.rows).toEqual([{ head: 'caf\u{1F600}' }]);
    });

    it('should trim and alias', () => {
      const result = run("SELECT TRIM(TEXT(b)) AS t, b.text FROM RAW('<b>  hi  </b>')");
      expect(result.rows).toEqual([{ t: 'hi', 'b.text': '  hi  ' }]);
    });

    it('should summarize readable text', () => {
      const result = run("SELECT SUMMARIZE(*) FROM RAW('<div>alpha beta gamma<script>var x</script></div>')", {
        config: resolveEngineConfig({ summaryLength: 10 }),
      });
      expect(column(result, 'SUMMARIZE(*)')).toEqual(['alpha beta...', '']);
    });
  });

  describe('FLATTEN_TEXT', () => {
    const CARDS =
      '<div id="a"><section><p>One</p><span>Two</span></section></div>' +
      '<div id="b"><section><p>Three</p></section></div>';

    it('should spread filtered descendant texts over the named columns, padding with null', () => {
      const result = run(
        `SELECT div.node_id, FLATTEN_TEXT(div) AS (col1, col2) FROM RAW('${CARDS}') WHERE descendant.tag IN ('p', 'span')`
      );
      expect(result.columns).toEqual(['div.node_id', 'col1', 'col2']);
      expect(result.rows).toEqual([
        { 'div.node_id': 0, col1: 'One', col2: 'Two' },
        { 'div.node_id': 4, col1: 'Three', col2: null },
      ]);
    });

    it('should keep the other comparisons for choosing base nodes', () => {
      const result = run(
        `SELECT FLATTEN_TEXT(div) AS (first) FROM RAW('${CARDS}') WHERE attributes.id = 'b' AND descendant.tag = 'p'`
      );
      expect(result.rows).toEqual([{ first: 'Three' }]);
    });

    it('should drop values beyond the last column', () => {
      const result = run("SELECT FLATTEN_TEXT(div) AS (col1) FROM RAW('<div><p>One</p><p>Two</p></div>')");
      expect(result.rows).toEqual([{ col1: 'One' }]);
    });

    it('should skip empty texts and name the column flatten_text without AS', () => {
      const result = run("SELECT FLATTEN_TEXT(div) FROM RAW('<div><span><i></i></span><p>Text</p></div>')");
      expect(result.columns).toEqual(['flatten_text']);
      expect(result.rows).toEqual([{ flatten_text: 'Text' }]);
    });

    it('should take only one level with a depth and keep its empty texts', () => {
      expect(run("SELECT FLATTEN_TEXT(div, 1) AS (col1) FROM RAW('<div><section> Alpha <p>One</p></section></div>')").rows).toEqual([
        { col1: 'Alpha' },
      ]);
      expect(run("SELECT FLATTEN_TEXT(ul, 1) AS (a, b, c) FROM RAW('<ul><li>x</li><li></li><li>z</li></ul>')").rows).toEqual([
        { a: 'x', b: '', c: 'z' },
      ]);
    });

    it('should fall back to inline text for a node without text of its own', () => {
      const result = run("SELECT FLATTEN_TEXT(li, 1) AS (label) FROM RAW('<ul><li><div><b>Fast</b> <em>lane</em></div></li></ul>')");
      expect(result.rows).toEqual([{ label: 'Fast lane' }]);
    });

    it('should filter descendants by attribute through the FLATTEN alias', () => {
      const markup =
        '<div><span data-testid="flight-time-1">08:00</span><span data-testid="flight_price_1">US$1</span>' +
        '<span data-testid="seat">12A</span></div>';
      const result = run(
        `SELECT FLATTEN(div) AS (depart, price) FROM RAW('${markup}') ` +
          "WHERE descendant.attributes.data-testid CONTAINS ANY ('flight-time-', 'flight_price_')"
      );
      expect(result.rows).toEqual([{ depart: '08:00', price: 'US$1' }]);
    });

    it('should reject a descendant comparison under OR', () => {
      const error = executionFailure("SELECT FLATTEN_TEXT(div) FROM doc WHERE descendant.tag = 'p' OR tag = 'div'");
      expect(error.stage).toBe('filter');
      expect(XsqlError.isCode(error.cause, 'XSQL_F403')).toBe(true);
    });
  });

  describe('EXISTS', () => {
    const count = (markup: string, clause: string): unknown =>
      run(`SELECT COUNT(div) FROM RAW('${markup}') WHERE ${clause}`).rows[0]?.['COUNT(div)'];

    it('should test whether the axis has any node', () => {
      expect(count('<div><span></span></div><div></div>', 'EXISTS(child)')).toBe(1);
    });

    it('should evaluate the inner WHERE with each axis node as the candidate', () => {
      expect(count('<div><h2></h2></div><div><span></span></div>', "EXISTS(child WHERE tag = 'h2')")).toBe(1);
      expect(
        count(
          '<div><span class="price">1</span><h2></h2></div><div><span></span><h2 class="price"></h2></div>',
          "EXISTS(child WHERE tag = 'span' AND attributes.class = 'price')"
        )
      ).toBe(1);
    });
  });

  describe('aggregates', () => {
    it('should return one row when every item is COUNT', () => {
      expect(run('SELECT COUNT(a), COUNT(li) FROM doc').rows).toEqual([{ 'COUNT(a)': 5, 'COUNT(li)': 3 }]);
      expect(run("SELECT COUNT(*) FROM doc WHERE tag = 'table'").rows).toEqual([{ 'COUNT(*)': 0 }]);
    });

    it('should repeat the total on every row beside projections', () => {
      const result = run('SELECT li.text, COUNT(li) FROM doc');
      expect(result.rows).toEqual([
        { 'li.text': 'Apple pie', 'COUNT(li)': 3 },
        { 'li.text': 'Banana bread', 'COUNT(li)': 3 },
        { 'li.text': 'Cherry tart', 'COUNT(li)': 3 },
      ]);
    });

    it('should answer the single-title table scenario', () => {
      const small = parseHtml('<html><head><title>Shop</title></head></html>');
      const result = execute(
        parseQuery("SELECT title.text, COUNT(*) FROM doc WHERE child.tag = 'title' LIMIT 1 TO TABLE(HEADER=ON)"),
        small
      );
      expect(result.columns).toEqual(['title.text', 'COUNT(*)']);
      expect(result.rows).toEqual([{ 'title.text': 'Shop', 'COUNT(*)': 1 }]);
      expect(result.output).toEqual({ kind: 'table', header: true, exportPath: null });
    });

    it('should score TFIDF query terms per candidate', () => {
      const result = run("SELECT TFIDF(p, 'cat') AS score FROM RAW('<p>cat dog</p><p>cat cat fish</p>')");
      const [first, second] = column(result, 'score');
      expect(first).toBeCloseTo(0.5);
      expect(second).toBeCloseTo(2 / 3);
    });

    it('should list TFIDF top terms', () => {
      const result = run("SELECT TFIDF(p, TOP_TERMS=1) AS terms FROM RAW('<p>the cat dog</p><p>cat cat fish</p>')");
      expect(column(result, 'terms')).toEqual([
        [['dog', expect.closeTo(0.5 * (Math.log(3 / 2) + 1), 6)]],
        [['cat', expect.closeTo(2 / 3, 6)]],
      ]);
    });
  });

  describe('ORDER BY and LIMIT', () => {
    it('should sort stably by a node field', () => {
      const result = run('SELECT a.href FROM doc ORDER BY sibling_pos');
      expect(column(result, 'a.href')).toEqual(['/home', 'mailto:x', '/docs', '', null]);
    });

    it('should put nulls last in both directions', () => {
      expect(column(run('SELECT a.href FROM doc ORDER BY a.href'), 'a.href')).toEqual([
        '',
        '/docs',
        '/home',
        'mailto:x',
        null,
      ]);
      expect(column(run('SELECT a.href FROM doc ORDER BY a.href DESC'), 'a.href')).toEqual([
        'mailto:x',
        '/home',
        '/docs',
        '',
        null,
      ]);
    });

    it('should match a column key whatever the case of its tag', () => {
      const result = run('SELECT A.href FROM doc ORDER BY A.href');
      expect(result.columns).toEqual(['a.href']);
      expect(column(result, 'a.href')).toEqual(['', '/docs', '/home', 'mailto:x', null]);
    });

    it('should sort by an alias', () => {
      const result = run('SELECT li.class AS c, li.text FROM doc ORDER BY c DESC');
      expect(column(result, 'li.text')).toEqual(['Banana bread', 'Apple pie', 'Cherry tart']);
    });

    it('should fail on an unknown key', () => {
      const error = executionFailure('SELECT a.href FROM doc ORDER BY rank');
      expect(error.stage).toBe('order_by');
      expect(error.code).toBe('XSQL_E502');
      expect(error.message).toBe("Execution failed in order_by stage: Unknown ORDER BY key 'rank'");
    });

    it('should truncate without reordering', () => {
      const full = run('SELECT a.href FROM doc ORDER BY a.href DESC');
      const limited = run('SELECT a.href FROM doc ORDER BY a.href DESC LIMIT 2');
      expect(limited.rows).toEqual(full.rows.slice(0, 2));
      expect(run('SELECT a FROM doc LIMIT 0').rows).toEqual([]);
    });

    it('should cap rows at maxRows after LIMIT', () => {
      const result = run('SELECT a.href FROM doc LIMIT 4', { config: resolveEngineConfig({ maxRows: 2 }) });
      expect(result.rows).toHaveLength(2);
    });
  });

  describe('sources', () => {
    it('should load a file through the readFile hook', () => {
      const read: string[] = [];
      const result = run("SELECT title.text, title.node_id FROM 'pages/shop.html'", {
        readFile: (path) => {
          read.push(path);
          return SHOP_PAGE;
        },
      });
      expect(read).toEqual(['pages/shop.html']);
      expect(result.rows).toEqual([{ 'title.text': 'Shop', 'title.node_id': 2 }]);
    });

    it('should parse a string literal that holds markup', () => {
      expect(run("SELECT b.text FROM '  <b>x</b>'").rows).toEqual([{ 'b.text': 'x' }]);
    });

    it('should refuse URLs', () => {
      const error = executionFailure("SELECT a FROM 'https://example.com/'");
      expect(error.stage).toBe('resolve_source');
      expect(XsqlError.isCode(error.cause, 'XSQL_S303')).toBe(true);
    });

    it('should wrap read failures', () => {
      const error = executionFailure("SELECT a FROM 'missing.html'", {
        readFile: () => {
          throw new Error('ENOENT');
        },
      });
      expect(XsqlError.isCode(error.cause, 'XSQL_S301')).toBe(true);
      expect(error.cause?.message).toBe("Cannot read 'missing.html': ENOENT");
    });

    it('should resolve registered aliases and reject unknown ones', () => {
      const aliases = new Map([['menu', parseHtml('<ol><li>x</li></ol>')]]);
      expect(run('SELECT li.text FROM menu', { aliases }).rows).toEqual([{ 'li.text': 'x' }]);

      const error = executionFailure('SELECT li FROM nowhere', { aliases });
      expect(XsqlError.isCode(error.cause, 'XSQL_S300')).toBe(true);
    });

    it('should treat each RAW fragment as a root', () => {
      const result = run("SELECT li FROM FRAGMENTS(RAW('<li>a</li><li>b</li>')) AS f WHERE f.text = 'b'");
      expect(result.rows).toEqual([
        expect.objectContaining({ node_id: 1, parent_id: null, sibling_pos: 2, source_uri: null }),
      ]);
    });

    it('should parse string rows of a FRAGMENTS subquery', () => {
      const result = run('SELECT li.text FROM FRAGMENTS(SELECT INNER_HTML(ul) FROM doc)');
      expect(column(result, 'li.text')).toEqual(['Apple pie', 'Banana bread', 'Cherry tart']);
    });

    it('should use the outer markup of node rows in a FRAGMENTS subquery', () => {
      const result = run('SELECT a.href FROM FRAGMENTS(SELECT div FROM doc)');
      expect(column(result, 'a.href')).toEqual(['/home', '/docs', '']);
    });

    it('should return an empty result for zero fragments', () => {
      const result = run('SELECT li.text, COUNT(li) FROM FRAGMENTS(SELECT INNER_HTML(table) FROM doc)');
      expect(result.columns).toEqual(['li.text', 'COUNT(li)']);
      expect(result.rows).toEqual([]);
    });

    it('should reject a subquery with several columns', () => {
      const error = executionFailure('SELECT li FROM FRAGMENTS(SELECT TEXT(p), TEXT(a) FROM doc)');
      expect(XsqlError.isCode(error.cause, 'XSQL_S302')).toBe(true);
    });
  });

  describe('table extraction', () => {
    const markup =
      '<table><tr><th>Name</th><th>Qty</th></tr><tr><td>Apple</td><td> 3 </td></tr><tr><td>Pear</td></tr></table>';

    it('should use the first row as the header', () => {
      const result = run(`SELECT table FROM RAW('${markup}') TO TABLE()`);
      expect(result.columns).toEqual(['Name', 'Qty']);
      expect(result.rows).toEqual([
        { Name: 'Apple', Qty: '3' },
        { Name: 'Pear', Qty: null },
      ]);
    });

    it('should number columns without a header', () => {
      const result = run(`SELECT table FROM RAW('${markup}') TO TABLE(HEADER=OFF)`);
      expect(result.columns).toEqual(['col1', 'col2']);
      expect(result.rows[0]).toEqual({ col1: 'Name', col2: 'Qty' });
      expect(result.rows).toHaveLength(3);
    });

    it('should require a single table', () => {
      const error = executionFailure(`SELECT table FROM RAW('${markup}${markup}') TO TABLE()`);
      expect(error.stage).toBe('project');
      expect(error.code).toBe('XSQL_E503');
    });
  });

  describe('failures', () => {
    it('should surface filter errors from the filter stage', () => {
      const error = executionFailure("SELECT a FROM doc WHERE node_id = 'x'");
      expect(error.stage).toBe('filter');
      expect(error.code).toBe('XSQL_E500');
      expect(error.cause).toBeInstanceOf(FilterError);
    });

    it('should stop before the first stage when aborted', () => {
      const controller = new AbortController();
      controller.abort();
      const error = executionFailure('SELECT a FROM doc', { signal: controller.signal });
      expect(error.stage).toBe('aborted');
      expect(error.code).toBe('XSQL_E501');
    });
  });

  describe('events', () => {
    it('should report every stage in order', () => {
      const stages: string[] = [];
      run('SELECT COUNT(a) FROM doc', { onEvent: (event) => stages.push(`${event.type}:${event.stage}`) });
      expect(stages).toEqual([
        'stage-start:resolve_source',
        'stage-end:resolve_source',
        'stage-start:filter',
        'stage-end:filter',
        'stage-start:project',
        'stage-end:project',
        'stage-start:aggregate',
        'stage-end:aggregate',
        'stage-start:order_by',
        'stage-end:order_by',
        'stage-start:limit',
        'stage-end:limit',
        'stage-start:bind',
        'stage-end:bind',
      ]);
    });

    it('should skip the aggregate stage without COUNT or TFIDF', () => {
      const stages: string[] = [];
      run('SELECT a FROM doc', { onEvent: (event) => event.type === 'stage-start' && stages.push(event.stage) });
      expect(stages).toEqual(['resolve_source', 'filter', 'project', 'order_by', 'limit', 'bind']);
    });
  });

  describe('purity', () => {
    it('should leave the document untouched', () => {
      const before = outerHtml(tree, 0);
      run("SELECT a.href, COUNT(*) FROM doc WHERE ancestor.tag = 'body' ORDER BY a.href DESC LIMIT 2");
      run('SELECT li.text FROM FRAGMENTS(SELECT INNER_HTML(ul) FROM doc)');
      expect(outerHtml(tree, 0)).toBe(before);
      expect(tree.nodes).toHaveLength(15);
    });
  });

  describe('meta statements', () => {
    it('should show the input', () => {
      expect(run('SHOW INPUT').rows).toEqual([{ key: 'source_uri', value: 'shop.html' }]);
    });

    it('should list the document and bound aliases', () => {
      const aliases = new Map([['menu', parseHtml('<ol></ol>', { sourceUri: 'menu.html' })]]);
      expect(run('SHOW INPUTS', { aliases }).rows).toEqual([
        { alias: 'document', source_uri: 'shop.html' },
        { alias: 'menu', source_uri: 'menu.html' },
      ]);
    });

    it('should serve the static tables', () => {
      const axes = run('SHOW AXES');
      expect(axes.columns).toEqual(['axis', 'description']);
      expect(column(axes, 'axis')).toEqual(['parent', 'child', 'ancestor', 'descendant']);

      const schema = run('DESCRIBE DOC');
      expect(column(schema, 'column_name')).toEqual([
        'node_id',
        'tag',
        'attributes',
        'parent_id',
        'sibling_pos',
        'max_depth',
        'doc_order',
        'source_uri',
      ]);
      expect(run('SHOW OPERATORS').rows[0]).toEqual({ operator: '=', description: 'Equality' });
    });
  });
});
