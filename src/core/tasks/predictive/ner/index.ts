/**
 * Named Entity Recognition
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { type NERCandidates, nerBridges } from './bridges';
import { createExampleSchema, type NERExample, type NEROutput } from './schemas';

export type { LocatedEntity, NERExample, NERResult } from './schemas';

export interface NEROptions extends PredictiveTaskOptions<NERExample> {
  entityTypes?: readonly string[];
}

const TASK_NAME = 'NER';

export const DEFAULT_ENTITY_TYPES: readonly string[] = ['PERSON', 'LOCATION', 'ORGANIZATION'];

export class NER extends PredictiveTask<NEROutput, NERCandidates, NERExample> {
  readonly entityTypes: readonly string[];

  constructor(options: NEROptions) {
    const entityTypes = options.entityTypes ?? DEFAULT_ENTITY_TYPES;
    if (entityTypes.length === 0) {
      throw new ConfigurationError(`${TASK_NAME}: at least one entity type is required`);
    }
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      nerBridges({ entityTypes }),
      { taskId: options.id ?? 'ner', promptInstructions: options.promptInstructions },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'ner', bridge, createExampleSchema(entityTypes));
    this.entityTypes = entityTypes;
  }
}
