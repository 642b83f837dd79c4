/**
 * Domain Layer
 *
 * Pure business logic, shared by the server and the CLI.
 */

export * from './hours/index.js';
