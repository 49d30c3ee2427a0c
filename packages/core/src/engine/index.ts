export { XsqlEngine, createXsqlEngine, type RunOptions, type XsqlEngineOptions } from './engine.js';
export { Executor, execute, type ExecuteOptions, type ExecutionEvent, type Stage } from './executor.js';
export { compileFilter, type FilterContext, type NodePredicate } from './filter.js';
export { sortRows, type WorkingRow } from './order.js';
export { executeMeta, type BoundInputs } from './registry.js';
export type { ReadFile } from './source.js';
export { scoreTfidf, summarizeText, tokenizeText, type TfidfParams } from './text-analysis.js';
export {
  LIST_OUTPUT,
  compareValues,
  makeRow,
  valueToString,
  type ResultRow,
  type ResultSet,
  type Value,
} from './values.js';
