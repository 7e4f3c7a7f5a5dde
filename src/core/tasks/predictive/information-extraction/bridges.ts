/**
 * Information Extraction Bridge
 *
 * Single mode majority-votes one entity across chunks; multi mode collects
 * every distinct entity. Identity is every field except the score.
 */

import type { z } from 'zod';
import type { LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import {
  type ChunkOffset,
  MultiEntityConsolidation,
  SingleEntityConsolidation
} from '../consolidation';
import type { BridgeFactories } from '../registry';
import {
  createOutputSchema,
  type EntityRecord,
  type ExtractedEntity,
  type ExtractionMode,
  type ExtractionRaw,
  type InformationExtractionResult
} from './schemas';

export interface InformationExtractionSettings {
  entitySchema: z.ZodType<EntityRecord>;
  mode: ExtractionMode;
}

function scored(entity: EntityRecord, score: number | null): ExtractedEntity {
  return { ...entity, score };
}

export class InformationExtractionLLMBridge extends LLMBridge<
  ExtractionRaw,
  InformationExtractionResult
> {
  private readonly single = new SingleEntityConsolidation<ExtractionRaw, ExtractedEntity>((raw) => {
    if (!('entity' in raw)) throw new Error('expected a single entity result');
    return raw.entity === null ? null : scored(raw.entity, raw.score);
  });

  private readonly multi = new MultiEntityConsolidation<ExtractionRaw, ExtractedEntity>((raw) => {
    if (!('entities' in raw)) throw new Error('expected a multi entity result');
    return raw.entities.map(({ entity, score }) => scored(entity, score));
  });

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly settings: InformationExtractionSettings
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    if (this.settings.mode === 'multi') {
      return (
        'Find all occurrences of this kind of entity within the text. ' +
        'For each entity found, also provide a confidence score between 0 and 1.'
      );
    }
    return (
      'Find the single most relevant entity within the text. If no such entity exists, return null. ' +
      'Return the entity with all its fields, not just a string, and a confidence score between 0 and 1.'
    );
  }

  protected override createOutputSchema(): z.ZodType<ExtractionRaw> {
    return createOutputSchema(this.settings.entitySchema, this.settings.mode);
  }

  override consolidate(
    results: readonly (ExtractionRaw | null)[],
    offsets: readonly ChunkOffset[]
  ): InformationExtractionResult[] {
    if (this.settings.mode === 'multi') {
      return this.multi.consolidate(results, offsets).map((entities) => ({ entities }));
    }
    return this.single.consolidate(results, offsets).map((entity) => ({ entity }));
  }
}

export function informationExtractionBridges(
  settings: InformationExtractionSettings
): BridgeFactories<ExtractionRaw, InformationExtractionResult> {
  return {
    llm: (engine, options, mode) =>
      new InformationExtractionLLMBridge(engine, options, mode, settings)
  };
}
