import { randomUUID } from 'node:crypto';
import { sql } from 'drizzle-orm';
import type {
  CollectionDocuments,
  CollectionName,
  DocumentField,
  Id,
  IndexSpec,
} from '@runmeta/protocol';
import type { Database } from '../db.js';
import type { DocumentCollection, InsertOptions } from '../../interfaces/index.js';
import { buildCreateIndexSql } from './index-ddl.js';
import { toStorageError } from './errors.js';

/**
 * Shared behavior of the Postgres-backed collections.
 *
 * Subclasses map documents to rows of their table. Index names already
 * ensured through this instance are remembered, so repeated saves issue
 * the DDL only once per store.
 */
export abstract class PgDocumentCollection<N extends CollectionName>
  implements DocumentCollection<N>
{
  private ensured = new Set<string>();

  constructor(
    readonly name: N,
    protected db: Database
  ) {}

  async insert(document: CollectionDocuments[N], options: InsertOptions = {}): Promise<Id> {
    const id = options.id ?? randomUUID();
    await this.run(() => this.insertRow(id, document));
    return id;
  }

  async ensureIndex(spec: IndexSpec<DocumentField<N>>): Promise<void> {
    if (this.ensured.has(spec.name)) return;

    await this.run(() => this.db.execute(sql.raw(buildCreateIndexSql(this.name, spec))));
    this.ensured.add(spec.name);
  }

  async findById(id: Id): Promise<CollectionDocuments[N] | null> {
    return this.run(() => this.selectRow(id));
  }

  protected abstract insertRow(id: Id, document: CollectionDocuments[N]): Promise<void>;

  protected abstract selectRow(id: Id): Promise<CollectionDocuments[N] | null>;

  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw toStorageError(this.name, error);
    }
  }
}
