export * from './exit-codes.js';
export * from './task.js';
export * from './user.js';
export * from './config.js';
