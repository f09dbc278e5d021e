export * from './types.js';
export * from './errors.js';
export * from './phone.js';
export * from './otp.js';
export * from './fields.js';
export * from './matching.js';
export * from './commands.js';
