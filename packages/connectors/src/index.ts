// Export PDF connector
export * from './pdf/index.js';

// Export generative service clients
export * from './llm/index.js';
