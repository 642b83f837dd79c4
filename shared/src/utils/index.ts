export * from './dateHelpers.js';
