/**
 * Weekly hours engine: period resolution, leave stitching, holiday
 * inference, requirements and compliance.
 */

export * from './types.js';
export * from './names.js';
export * from './markings.js';
export * from './week.js';
export * from './periods.js';
export * from './leaveIndex.js';
export * from './holidays.js';
export * from './requirements.js';
export * from './compliance.js';
export * from './employeeFilter.js';
export * from './evaluateWeek.js';
