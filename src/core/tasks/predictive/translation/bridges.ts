/**
 * Translation Bridge
 */

import type { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { InputRecord, LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, TextConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import { outputSchema, type TranslationOutput, type TranslationResult } from './schemas';

export class TranslationLLMBridge extends LLMBridge<TranslationOutput, TranslationResult> {
  private readonly consolidation = new TextConsolidation<TranslationOutput>((raw) => ({
    text: raw.translation,
    score: raw.score
  }));

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly targetLanguage: string
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    return (
      'Translate the text into {{targetLanguage}}. Keep its meaning and tone.\n' +
      'Also provide a confidence score between 0 and 1 for the translation.'
    );
  }

  protected override get promptConclusion(): string {
    return (
      '========\n<text>{{text}}</text>\n' +
      '<target_language>{{targetLanguage}}</target_language>\n<output>'
    );
  }

  protected override extraVariables(_doc: Doc): InputRecord {
    return { targetLanguage: this.targetLanguage };
  }

  protected override createOutputSchema(): z.ZodType<TranslationOutput> {
    return outputSchema;
  }

  override consolidate(
    results: readonly (TranslationOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): TranslationResult[] {
    return this.consolidation
      .consolidate(results, offsets)
      .map(({ text, score }) => ({ translation: text, score }));
  }

  override integrate(results: readonly TranslationResult[], docs: readonly Doc[]): void {
    super.integrate(results, docs);
    if (!this.options.overwrite) return;
    docs.forEach((doc, i) => {
      const result = results[i];
      if (result) doc.replaceText(result.translation);
    });
  }
}

export function translationBridges(
  targetLanguage: string
): BridgeFactories<TranslationOutput, TranslationResult> {
  return {
    llm: (engine, options, mode) => new TranslationLLMBridge(engine, options, mode, targetLanguage)
  };
}
