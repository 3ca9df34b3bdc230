/**
 * SME Hunt - Shared Types
 */

export * from './types/api.js';
export * from './types/directory.js';
export * from './types/ticket.js';
