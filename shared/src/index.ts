export * from './types.js';
export * from './api-types.js';
export * from './i18n.js';
