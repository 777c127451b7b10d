/**
 * Analysis Module
 *
 * Output validation, parameter extraction and diagnostic analysis.
 */

export * from './types.js';
export { validateOutput, deepEqual } from './validate.js';
export { analyzeOutput } from './output-analysis.js';
export { analyzeDiagnostics } from './diagnostic-analysis.js';
