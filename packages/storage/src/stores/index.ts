export { RecentAccessStore, recentEntryCodec } from './recent.js';
export type { RecentAccessStoreOptions } from './recent.js';
export { ProjectStore } from './projects.js';
