import type { BeamlineConfigDocument, DocumentMap, Id } from '@runmeta/protocol';
import { validateDict, validateString } from '../validation/fields.js';
import { saveDocument, type SaveOptions } from './save.js';

export type BeamlineConfigInput = {
  headerId: Id;
  /** Configuration parameter name -> value */
  configParams?: DocumentMap;
};

export class BeamlineConfig {
  readonly headerId: Id;
  readonly configParams: Readonly<DocumentMap>;

  constructor(input: BeamlineConfigInput) {
    this.headerId = validateString(input.headerId, { field: 'header_id', nonEmpty: true });
    this.configParams = validateDict(input.configParams, 'config_params');
  }

  composeDocument(): BeamlineConfigDocument {
    return {
      header_id: this.headerId,
      config_params: { ...this.configParams },
    };
  }

  save(options: SaveOptions = {}): Promise<Id> {
    return saveDocument('beamline_config', this.composeDocument(), options);
  }
}
