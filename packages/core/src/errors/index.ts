/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { ChartVaultBaseError } from './ChartVaultBaseError.js';
export { ChartVaultRuntimeError } from './ChartVaultRuntimeError.js';
export { ChartVaultValidationError } from './ChartVaultValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { ChartVaultErrorCode, Issue, Severity } from './types.js';
