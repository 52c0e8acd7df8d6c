export * from './utils/calendar-date-utils.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
