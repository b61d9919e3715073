export * from './errors.js';
export * from './taxonomy.js';
export * from './complaint.js';
