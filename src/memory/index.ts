export {
  RunStateStore,
  StateFileSchema,
  DEFAULT_MAX_URIS,
  type RunState,
  type RunStateStoreConfig,
  type StateFile,
} from "./store.js";
