/**
 * Relation Extraction Bridge
 *
 * Triplets from all chunks are deduplicated by head, relation and tail.
 */

import type { z } from 'zod';
import type { LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, MultiEntityConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import {
  createOutputSchema,
  type RelationExtractionOutput,
  type RelationExtractionResult,
  type RelationTriplet
} from './schemas';

export interface RelationExtractionSettings {
  relations: readonly string[];
  relationDescriptions: Readonly<Record<string, string>>;
  /** null leaves entity types open */
  entityTypes: readonly string[] | null;
}

function listRelations(
  names: readonly string[],
  descriptions: Readonly<Record<string, string>>
): string {
  return names
    .map((name) => (descriptions[name] ? `- ${name}: ${descriptions[name]}` : `- ${name}`))
    .join('\n');
}

export class RelationExtractionLLMBridge extends LLMBridge<
  RelationExtractionOutput,
  RelationExtractionResult
> {
  private readonly consolidation = new MultiEntityConsolidation<
    RelationExtractionOutput,
    RelationTriplet
  >((raw) => raw.triplets);

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly settings: RelationExtractionSettings
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    const { relations, relationDescriptions, entityTypes } = this.settings;
    const types = entityTypes
      ? `Head and tail entities must be of one of these types: ${entityTypes.join(', ')}.`
      : 'Give each head and tail entity a short type such as PERSON or ORGANIZATION.';
    return (
      'Extract relations between entities in the text.\n' +
      `Relations to look for:\n${listRelations(relations, relationDescriptions)}\n` +
      `${types}\n` +
      'Return each relation as a triplet of head entity, relation and tail entity, with both ' +
      'entities written exactly as in the text, and a confidence score between 0 and 1.'
    );
  }

  protected override createOutputSchema(): z.ZodType<RelationExtractionOutput> {
    return createOutputSchema(this.settings.relations, this.settings.entityTypes);
  }

  override consolidate(
    results: readonly (RelationExtractionOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): RelationExtractionResult[] {
    return this.consolidation.consolidate(results, offsets).map((triplets) => ({ triplets }));
  }
}

export function relationExtractionBridges(
  settings: RelationExtractionSettings
): BridgeFactories<RelationExtractionOutput, RelationExtractionResult> {
  return {
    llm: (engine, options, mode) => new RelationExtractionLLMBridge(engine, options, mode, settings)
  };
}
