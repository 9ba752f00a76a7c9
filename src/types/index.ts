export * from './certificate.js';
export * from './reference.js';
export * from './output.js';
