import type { DocumentStore } from "../database.js";
import { StorageUnavailableError } from "../errors.js";

const unavailable = (operation: string) => (): never => {
  throw new StorageUnavailableError(operation, new Error("connection refused"));
};

/** A store whose every call fails, unless overridden. */
export function unavailableStore(overrides: Partial<DocumentStore> = {}): DocumentStore {
  return {
    insert: unavailable("insert"),
    find: unavailable("find"),
    count: unavailable("count"),
    deleteOne: unavailable("deleteOne"),
    listCollections: unavailable("listCollections"),
    close: () => {},
    ...overrides,
  };
}

/** Delegates to `backing` except where overridden. */
export function wrapStore(backing: DocumentStore, overrides: Partial<DocumentStore>): DocumentStore {
  return {
    insert: (collection, doc) => backing.insert(collection, doc),
    find: (collection, filter) => backing.find(collection, filter),
    count: (collection, filter) => backing.count(collection, filter),
    deleteOne: (collection, filter) => backing.deleteOne(collection, filter),
    listCollections: () => backing.listCollections(),
    close: () => backing.close(),
    ...overrides,
  };
}
