/**
 * Item notation: parse and serialize one item per line.
 */

export { Scanner } from './scanner.js';
export { parseItem, isItemLine, type ParseOptions } from './parser.js';
export { serializeItem } from './serializer.js';
export { parseDuration, parseDurationInput } from './duration.js';
export { parseTimeConstraint, formatTimeConstraint, formatConsequence } from './constraint.js';
