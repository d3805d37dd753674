export * from './invoice.js';
export * from './qr.js';
export * from './rates.js';
export * from './output.js';
export * from './report.js';
