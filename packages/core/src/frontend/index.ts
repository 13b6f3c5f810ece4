/**
 * Front-end - babel-based binding resolution feeding the usage trackers
 */

export { resolveTraverse, type TraverseFunction } from './babelTraverse.js';
export { parseSourceUnit, parserPluginsFor, type SourceUnit } from './SourceUnit.js';
export { ClassIndex, describeClass, describeInterface, type TypeEntry } from './ClassIndex.js';
export {
  collectFields,
  PrivateFieldNameIndex,
  type FieldCollection,
  type FieldCollectorOptions,
  type FieldTable,
  type FieldTables,
} from './FieldCollector.js';
export {
  collectCallables,
  type BindingRoute,
  type CallableCollection,
  type CallableCollectorOptions,
  type CallableParameter,
  type CallableScope,
} from './CallableCollector.js';
export {
  finalizeCallable,
  recordOccurrences,
  type OccurrenceRecorderOptions,
  type UnitUsage,
} from './OccurrenceRecorder.js';
export { identifierContext, expressionContext } from './accessContext.js';
export { spanOf, formatLocation, positionKey } from './location.js';
