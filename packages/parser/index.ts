/**
 * Statement Parser - Unified Entry Point
 */

export {
  parseProgram,
  parseProgramWithErrors,
  tokenize,
  isPlainIdentifier,
} from './chevrotain-parser.js';
export type { ParseResult } from './chevrotain-parser.js';

export { StatementParseError, formatIssue } from './errors.js';
export type { ParseIssue } from './errors.js';

// Re-export types
export * from './ast.js';

// Re-export prettifier
export { formatProgram, formatStatement } from './prettifier.js';
