// re-export core types and utilities
export * from '@did-webs/core';

// node-specific functionality
export * from './keria-mapping.js';
export * from './keria-state-loader.js';
export * from './kel-publisher.js';
