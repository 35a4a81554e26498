export { createDrizzleBackingStore, type DrizzleBackingStoreOptions } from './drizzle-backing-store.js';
export * as schema from './schema/index.js';
