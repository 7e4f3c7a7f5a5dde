/**
 * Relation Extraction
 *
 * Finds (head, relation, tail) triplets for a closed set of relation types.
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { type RelationExtractionSettings, relationExtractionBridges } from './bridges';
import {
  createExampleSchema,
  type RelationExtractionExample,
  type RelationExtractionOutput,
  type RelationExtractionResult
} from './schemas';

export type {
  RelationEntity,
  RelationExtractionExample,
  RelationExtractionResult,
  RelationTriplet
} from './schemas';

export interface RelationExtractionOptions
  extends PredictiveTaskOptions<RelationExtractionExample> {
  relations: readonly string[];
  /** Optional description per relation, added to the prompt */
  relationDescriptions?: Readonly<Record<string, string>>;
  /** Restrict head and tail entity types; open when omitted */
  entityTypes?: readonly string[];
}

const TASK_NAME = 'RelationExtraction';

function uniqueNames(names: readonly string[], what: string): string[] {
  const trimmed = names.map((name) => name.trim());
  if (trimmed.length === 0) {
    throw new ConfigurationError(`${TASK_NAME}: at least one ${what} is required`);
  }
  if (trimmed.some((name) => name.length === 0) || new Set(trimmed).size !== trimmed.length) {
    throw new ConfigurationError(`${TASK_NAME}: ${what}s must be unique and not blank`);
  }
  return trimmed;
}

function resolveSettings(options: RelationExtractionOptions): RelationExtractionSettings {
  const relations = uniqueNames(options.relations, 'relation');
  const relationDescriptions = options.relationDescriptions ?? {};
  const unknown = Object.keys(relationDescriptions).filter((r) => !relations.includes(r));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `${TASK_NAME}: descriptions given for unknown relations: ${unknown.join(', ')}`
    );
  }
  const entityTypes = options.entityTypes ? uniqueNames(options.entityTypes, 'entity type') : null;
  return { relations, relationDescriptions, entityTypes };
}

export class RelationExtraction extends PredictiveTask<
  RelationExtractionOutput,
  RelationExtractionResult,
  RelationExtractionExample
> {
  readonly relations: readonly string[];
  readonly entityTypes: readonly string[] | null;

  constructor(options: RelationExtractionOptions) {
    const settings = resolveSettings(options);
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      relationExtractionBridges(settings),
      {
        taskId: options.id ?? 'relation_extraction',
        promptInstructions: options.promptInstructions
      },
      options.inferenceMode
    );
    super(
      TASK_NAME,
      options,
      'relation_extraction',
      bridge,
      createExampleSchema(settings.relations, settings.entityTypes)
    );
    this.relations = settings.relations;
    this.entityTypes = settings.entityTypes;
  }
}
