import { eq } from 'drizzle-orm';
import type { BeamlineConfigDocument, Id } from '@runmeta/protocol';
import type { Database } from '../db.js';
import { beamlineConfig } from '../schema/index.js';
import { PgDocumentCollection } from './pg-document-collection.js';

export function beamlineConfigToRow(
  id: Id,
  document: BeamlineConfigDocument
): typeof beamlineConfig.$inferInsert {
  return {
    id,
    headerId: document.header_id,
    configParams: document.config_params,
  };
}

export function rowToBeamlineConfig(
  row: typeof beamlineConfig.$inferSelect
): BeamlineConfigDocument {
  return {
    header_id: row.headerId,
    config_params: row.configParams,
  };
}

export class PgBeamlineConfigCollection extends PgDocumentCollection<'beamline_config'> {
  constructor(db: Database) {
    super('beamline_config', db);
  }

  protected async insertRow(id: Id, document: BeamlineConfigDocument): Promise<void> {
    await this.db.insert(beamlineConfig).values(beamlineConfigToRow(id, document));
  }

  protected async selectRow(id: Id): Promise<BeamlineConfigDocument | null> {
    const [row] = await this.db.select().from(beamlineConfig).where(eq(beamlineConfig.id, id));
    return row ? rowToBeamlineConfig(row) : null;
  }
}
