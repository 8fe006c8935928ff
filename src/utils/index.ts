// utils/index.ts
// ==========================
// 📦 Utility Exports
// ==========================

export { formatError, formatAnyError, formatLocation } from './format.js';
export { highlightSnippet } from './highlight.js';
export { createLogger } from './log.js';
export type { Logger, LoggerOptions } from './log.js';
export type { Location, Position, FormatOptions } from './types.js';
