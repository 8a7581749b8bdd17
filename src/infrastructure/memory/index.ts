export { InMemoryOutboxStore, DuplicateKeyError } from './in-memory-outbox-store.js';
export type { InMemoryOutboxStoreOptions } from './in-memory-outbox-store.js';
