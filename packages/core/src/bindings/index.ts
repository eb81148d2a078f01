export { DEFAULT_BINDING_TTL_SECONDS } from './store';
export type { ThreadBinding, ThreadBindingStore, ThreadBindingStoreContext } from './store';
export { InMemoryThreadBindingStore } from './in-memory-store';
