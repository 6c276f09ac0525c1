/**
 * @devtree/storage - Plain-text persistence
 *
 * Line-oriented registries behind typed stores, with atomic replace.
 */

export { writeFileAtomic, tempPathFor } from './atomic-write.js';
export { LineStore } from './line-store.js';
export type { LineCodec } from './line-store.js';
export { parseEnv, setEnvValue, readEnvFile, readPort, writeEnvFile } from './env-file.js';

export * from './stores/index.js';
