export * from './layout.js';
export * from './lowHoursAlert.js';
export * from './weeklySummary.js';
