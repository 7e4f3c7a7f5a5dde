/**
 * Question Answering Bridge
 */

import type { z } from 'zod';
import type { Doc } from '@/data/doc';
import type { InputRecord, LLMEngine, LLMInferenceMode } from '@/engines/types';
import { type BridgeOptions, LLMBridge } from '../bridge';
import { type ChunkOffset, QAConsolidation } from '../consolidation';
import type { BridgeFactories } from '../registry';
import { createOutputSchema, type QAOutput, type QuestionAnsweringResult } from './schemas';

export class QuestionAnsweringLLMBridge extends LLMBridge<QAOutput, QuestionAnsweringResult> {
  private readonly consolidation: QAConsolidation<QAOutput>;

  constructor(
    engine: LLMEngine,
    options: BridgeOptions,
    mode: LLMInferenceMode | undefined,
    private readonly questions: readonly string[]
  ) {
    super(engine, options, mode);
    this.consolidation = new QAConsolidation(questions, (raw) => raw.qaPairs);
  }

  protected override get defaultPromptInstructions(): string {
    return (
      'Use the text to answer the following questions. Answer each question exactly once, ' +
      'copying the question verbatim. If the text does not answer a question, give an empty answer.\n' +
      'Also provide a confidence score between 0 and 1 for each answer.'
    );
  }

  protected override get promptConclusion(): string {
    return '========\n<text>{{text}}</text>\n<questions>\n{{questions}}\n</questions>\n<output>';
  }

  protected override extraVariables(_doc: Doc): InputRecord {
    return { questions: this.questions.map((q, i) => `${i + 1}. ${q}`) };
  }

  protected override createOutputSchema(): z.ZodType<QAOutput> {
    return createOutputSchema(this.questions);
  }

  override consolidate(
    results: readonly (QAOutput | null)[],
    offsets: readonly ChunkOffset[]
  ): QuestionAnsweringResult[] {
    return this.consolidation.consolidate(results, offsets).map((qaPairs) => ({ qaPairs }));
  }
}

export function questionAnsweringBridges(
  questions: readonly string[]
): BridgeFactories<QAOutput, QuestionAnsweringResult> {
  return {
    llm: (engine, options, mode) => new QuestionAnsweringLLMBridge(engine, options, mode, questions)
  };
}
