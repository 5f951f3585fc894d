/**
 * Central type exports
 */

export * from './issue.js';
export * from './project.js';
export * from './fix.js';
export * from './rules.js';
export * from './report.js';
export * from './errors.js';
