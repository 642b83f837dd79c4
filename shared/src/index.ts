/**
 * @hours-monitor/shared - Weekly hours engine, schemas and errors
 *
 * Pure code only: no network, file or environment access. The server
 * feeds it fetched snapshots; the CLI uses it for local calculations.
 */

export * from './domain/index.js';
export * from './schemas/index.js';
export * from './errors/index.js';
export * from './utils/index.js';
