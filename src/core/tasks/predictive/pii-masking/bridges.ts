/**
 * PII Masking Bridge
 *
 * Masked chunk texts are joined with a space; detected entities are
 * deduplicated across chunks. With `overwrite` the masked text replaces the
 * document text and its chunks.
 */

import type { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { InputRecord, LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import {
  type ChunkOffset,
  MultiEntityConsolidation,
  type ScoredEntity,
  TextConsolidation
} from '../consolidation';
import type { BridgeFactories } from '../registry';
import {
  createOutputSchema,
  type PIIEntity,
  type PIIMaskingOutput,
  type PIIMaskingResult
} from './schemas';

export interface PIIMaskingSettings {
  /** null masks every common kind of PII */
  piiTypes: readonly string[] | null;
  maskPlaceholder: string;
}

export class PIIMaskingLLMBridge extends LLMBridge<PIIMaskingOutput, PIIMaskingResult> {
  private readonly texts = new TextConsolidation<PIIMaskingOutput>(
    (raw) => ({ text: raw.maskedText, score: raw.score }),
    ' '
  );
  // Entities carry no confidence of their own
  private readonly entities = new MultiEntityConsolidation<
    PIIMaskingOutput,
    PIIEntity & ScoredEntity
  >((raw) => raw.piiEntities.map((entity) => ({ ...entity, score: null })));

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly settings: PIIMaskingSettings
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    return (
      'Find all personally identifiable information (PII) in the text. ' +
      'PII types to mask: {{piiTypes}}.\n' +
      'Return the text with every PII occurrence replaced by {{maskPlaceholder}} and nothing ' +
      'else changed, the list of PII you masked with its type, and a confidence score ' +
      'between 0 and 1.'
    );
  }

  protected override extraVariables(_doc: Doc): InputRecord {
    return {
      piiTypes:
        this.settings.piiTypes?.join(', ') ??
        'names, email addresses, phone numbers, postal addresses, ID numbers, ' +
          'payment card numbers, dates of birth',
      maskPlaceholder: this.settings.maskPlaceholder
    };
  }

  protected override createOutputSchema(): z.ZodType<PIIMaskingOutput> {
    return createOutputSchema(this.settings.piiTypes);
  }

  override consolidate(
    results: readonly (PIIMaskingOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): PIIMaskingResult[] {
    const texts = this.texts.consolidate(results, offsets);
    const entities = this.entities.consolidate(results, offsets);
    return texts.map((masked, i) => ({
      maskedText: masked.text,
      piiEntities: (entities[i] ?? []).map(({ entityType, text }) => ({ entityType, text })),
      score: masked.score
    }));
  }

  override integrate(results: readonly PIIMaskingResult[], docs: readonly Doc[]): void {
    super.integrate(results, docs);
    if (!this.options.overwrite) return;
    docs.forEach((doc, i) => {
      const result = results[i];
      if (result) doc.replaceText(result.maskedText);
    });
  }
}

export function piiMaskingBridges(
  settings: PIIMaskingSettings
): BridgeFactories<PIIMaskingOutput, PIIMaskingResult> {
  return {
    llm: (engine, options, mode) => new PIIMaskingLLMBridge(engine, options, mode, settings)
  };
}
