// Types
export type {
  ContentSegment,
  DocumentNode,
  DocumentTree,
  ParseHtmlOptions,
} from './types.js';

// Parsing
export { mergeTrees, parseHtml } from './parse-html.js';

// Serialisation
export {
  escapeAttribute,
  escapeText,
  innerHtml,
  isInlineTag,
  isVoidTag,
  nodeAt,
  outerHtml,
  textContent,
} from './serialize.js';
export type { TextContentOptions } from './serialize.js';

// Traversal
export {
  ancestorsOf,
  childrenOf,
  descendantsOf,
  findDescendant,
  parentOf,
} from './traversal.js';
