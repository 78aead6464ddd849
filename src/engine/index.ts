export * from './config.js';
export * from './context.js';
export * from './errors.js';
export * from './hooks.js';
export * from './metadata.js';
export * from './requirements.js';
export * from './result.js';
export * from './test-case.js';
export * from './test-program.js';
