export * from './types/did.js';
export * from './types/keri.js';

export * from './did/prefix.js';
export * from './did/query.js';
export * from './did/uri.js';
export * from './did/key-conversion.js';
export * from './did/thresholds.js';
export * from './did/aliases.js';
export * from './did/webs-document.js';
export * from './did/scheme.js';
export * from './did/extractors.js';
export * from './did/webs-resolver.js';

export * from './state/memory.js';

export * from './utils/errors.js';
export * from './utils/timestamps.js';
