/**
 * NER Bridge
 *
 * Entities are deduplicated across chunks by surface form and type, then
 * located in the full document text on integration.
 */

import type { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { InputRecord, LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, MultiEntityConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import { findSpan } from '../utils';
import { createOutputSchema, type NEROutput, type NERResult, type RecognizedEntity } from './schemas';

export interface NERSettings {
  entityTypes: readonly string[];
}

/** Consolidated entities before they are located in the document */
export interface NERCandidates {
  entities: RecognizedEntity[];
}

export class NERLLMBridge extends LLMBridge<NEROutput, NERCandidates> {
  private readonly consolidation = new MultiEntityConsolidation<NEROutput, RecognizedEntity>(
    (raw) => raw.entities
  );

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly settings: NERSettings
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    return (
      'Find all named entities in the text that belong to one of these types: {{entityTypes}}.\n' +
      'Return each entity exactly as it is written in the text, with its type and a confidence ' +
      'score between 0 and 1. Report an entity once even if it occurs several times.'
    );
  }

  protected override extraVariables(_doc: Doc): InputRecord {
    return { entityTypes: this.settings.entityTypes.join(', ') };
  }

  protected override createOutputSchema(): z.ZodType<NEROutput> {
    return createOutputSchema(this.settings.entityTypes);
  }

  override consolidate(
    results: readonly (NEROutput | null)[],
    offsets: readonly ChunkOffset[]
  ): NERCandidates[] {
    return this.consolidation.consolidate(results, offsets).map((entities) => ({ entities }));
  }

  override integrate(results: readonly NERCandidates[], docs: readonly Doc[]): void {
    docs.forEach((doc, i) => {
      const result: NERResult = {
        entities: (results[i]?.entities ?? []).map((entity) => ({
          ...entity,
          ...findSpan(doc.text, entity.text)
        }))
      };
      doc.results[this.taskId] = result;
    });
  }
}

export function nerBridges(settings: NERSettings): BridgeFactories<NEROutput, NERCandidates> {
  return {
    llm: (engine, options, mode) => new NERLLMBridge(engine, options, mode, settings)
  };
}
