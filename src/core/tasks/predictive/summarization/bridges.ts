/**
 * Summarization Bridge
 *
 * Chunk summaries are joined in chunk order. With `overwrite`, the summary
 * replaces the document text and its chunks.
 */

import type { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { InputRecord, LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, TextConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import { outputSchema, type SummarizationOutput, type SummarizationResult } from './schemas';

export class SummarizationLLMBridge extends LLMBridge<SummarizationOutput, SummarizationResult> {
  private readonly consolidation = new TextConsolidation<SummarizationOutput>((raw) => ({
    text: raw.summary,
    score: raw.score
  }));

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly maxWords: number
  ) {
    super(engine, options, mode);
  }

  protected override get defaultPromptInstructions(): string {
    return (
      'Summarize the text. The summary should be around {{maxWords}} words.\n' +
      'Also provide a confidence score between 0 and 1 for the summary.'
    );
  }

  protected override extraVariables(_doc: Doc): InputRecord {
    return { maxWords: this.maxWords };
  }

  protected override createOutputSchema(): z.ZodType<SummarizationOutput> {
    return outputSchema;
  }

  override consolidate(
    results: readonly (SummarizationOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): SummarizationResult[] {
    return this.consolidation
      .consolidate(results, offsets)
      .map(({ text, score }) => ({ summary: text, score }));
  }

  override integrate(results: readonly SummarizationResult[], docs: readonly Doc[]): void {
    super.integrate(results, docs);
    if (!this.options.overwrite) return;
    docs.forEach((doc, i) => {
      const result = results[i];
      if (result) doc.replaceText(result.summary);
    });
  }
}

export function summarizationBridges(
  maxWords: number
): BridgeFactories<SummarizationOutput, SummarizationResult> {
  return {
    llm: (engine, options, mode) => new SummarizationLLMBridge(engine, options, mode, maxWords)
  };
}
