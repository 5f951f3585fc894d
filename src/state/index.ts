/**
 * State management module
 * Issue ledger, backup store and the files they live in
 */

export * from './persistence.js';
export * from './registry.js';
export * from './backup-store.js';
