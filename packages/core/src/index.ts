// Errors
export * from './errors/index.js';

// Observability
export * from './observability/index.js';

// Configuration
export * from './config.js';

// Language
export * from './lang/index.js';

// Engine
export * from './engine/index.js';
