export { messagesRoutes } from "./routes.js";
export type { MessagesRoutesOptions } from "./routes.js";
export { createMessageStore } from "./repo.js";
export type {
  MessageStore,
  MessageStoreOptions,
  StoreFailure,
  StoreFailureKind,
  StoreResult,
} from "./repo.js";
