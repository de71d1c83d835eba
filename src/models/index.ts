export * from './document.js';
export * from './invoice.js';
export * from './validation.js';
export * from './claim.js';
export * from './dead-letter.js';
export * from './review.js';
export * from './audit.js';
