export * from './hours.js';
