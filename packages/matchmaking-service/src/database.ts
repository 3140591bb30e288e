import Database from 'better-sqlite3';
import { loadConfig } from './config.js';
import { StorageUnavailableError } from './errors.js';

type Scalar = string | number | boolean | null;

/** Matches when the field equals the scalar, or equals any value listed under `in`. */
type FieldCondition = Scalar | { in: readonly Scalar[] };

/** Exact-match conditions that must all hold. An empty filter matches every document. */
export type FieldFilter = Record<string, FieldCondition>;

/** A single filter, or a list of filters of which any one must match. */
export type DocumentFilter = FieldFilter | FieldFilter[];

export interface StoredDocument {
  id: string;
  createdAt: string;
  data: Record<string, unknown>;
}

/**
 * Storage collaborator. Calls are atomic request/response; a failing call
 * throws {@link StorageUnavailableError} and never returns partial results.
 */
export interface DocumentStore {
  insert(collection: string, doc: object): string;
  find(collection: string, filter?: DocumentFilter): StoredDocument[];
  count(collection: string, filter?: DocumentFilter): number;
  deleteOne(collection: string, filter: DocumentFilter): boolean;
  listCollections(): string[];
  close(): void;
}

interface DocumentRow {
  id: number;
  body: string;
  created_at: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function valueMatches(actual: unknown, expected: Scalar): boolean {
  if (Array.isArray(actual)) {
    return actual.some(element => element === expected);
  }
  if (expected === null) {
    return actual === null || actual === undefined;
  }
  return actual === expected;
}

function conditionMatches(actual: unknown, condition: FieldCondition): boolean {
  if (condition !== null && typeof condition === 'object') {
    return condition.in.some(expected => valueMatches(actual, expected));
  }
  return valueMatches(actual, condition);
}

export function matchesFilter(data: Record<string, unknown>, filter: DocumentFilter = {}): boolean {
  const alternatives = Array.isArray(filter) ? filter : [filter];
  return alternatives.some(fields =>
    Object.entries(fields).every(([field, condition]) => conditionMatches(data[field], condition))
  );
}

export class SqliteDocumentStore implements DocumentStore {
  private db: Database.Database;

  constructor(dbPath: string) {
    try {
      this.db = new Database(dbPath);
      this.initializeTables();
    } catch (error) {
      throw new Error(`Failed to initialize database at ${dbPath}: ${error instanceof Error ? error.message : 'Unknown error'}`);
    }
  }

  private initializeTables() {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS documents (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        collection TEXT NOT NULL,
        body TEXT NOT NULL,
        created_at TEXT NOT NULL
      )
    `);

    this.db.exec(`CREATE INDEX IF NOT EXISTS idx_documents_collection ON documents(collection);`);
  }

  private guard<T>(operation: string, run: () => T): T {
    try {
      return run();
    } catch (error) {
      throw new StorageUnavailableError(operation, error);
    }
  }

  private scan(collection: string): StoredDocument[] {
    const stmt = this.db.prepare<[string], DocumentRow>(`
      SELECT id, body, created_at
      FROM documents
      WHERE collection = ?
      ORDER BY id
    `);

    return stmt.all(collection).map(row => {
      const data: unknown = JSON.parse(row.body);
      if (!isRecord(data)) {
        throw new Error(`Document ${row.id} in ${collection} is not an object`);
      }
      return {
        id: String(row.id),
        createdAt: row.created_at,
        data
      };
    });
  }

  insert(collection: string, doc: object): string {
    return this.guard(`insert into ${collection}`, () => {
      const stmt = this.db.prepare<[string, string, string]>(`
        INSERT INTO documents (collection, body, created_at)
        VALUES (?, ?, ?)
      `);
      const result = stmt.run(collection, JSON.stringify(doc), new Date().toISOString());
      return String(result.lastInsertRowid);
    });
  }

  find(collection: string, filter?: DocumentFilter): StoredDocument[] {
    return this.guard(`find in ${collection}`, () =>
      this.scan(collection).filter(doc => matchesFilter(doc.data, filter))
    );
  }

  count(collection: string, filter?: DocumentFilter): number {
    return this.guard(`count in ${collection}`, () =>
      this.scan(collection).filter(doc => matchesFilter(doc.data, filter)).length
    );
  }

  deleteOne(collection: string, filter: DocumentFilter): boolean {
    return this.guard(`delete from ${collection}`, () => {
      const target = this.scan(collection).find(doc => matchesFilter(doc.data, filter));
      if (!target) {
        return false;
      }

      const stmt = this.db.prepare<[number, string]>('DELETE FROM documents WHERE id = ? AND collection = ?');
      const result = stmt.run(Number(target.id), collection);
      return result.changes > 0;
    });
  }

  listCollections(): string[] {
    return this.guard('list collections', () => {
      const stmt = this.db.prepare<[], { collection: string }>('SELECT DISTINCT collection FROM documents ORDER BY collection');
      return stmt.all().map(row => row.collection);
    });
  }

  close() {
    this.db.close();
  }
}

// Export singleton instance with lazy initialization
let storeInstance: SqliteDocumentStore | null = null;

export const db = {
  get instance(): SqliteDocumentStore {
    if (!storeInstance) {
      storeInstance = new SqliteDocumentStore(loadConfig().dbPath);
    }
    return storeInstance;
  },

  close: () => {
    if (storeInstance) {
      storeInstance.close();
      storeInstance = null;
    }
  }
};
