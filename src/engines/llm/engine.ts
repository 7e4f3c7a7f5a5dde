/**
 * LLM Engine
 *
 * Runs every chunk record through an LLMClient: the bridge's prompt template
 * is rendered with the record's variables plus the few-shot block, and the
 * reply is validated against the bridge's zod schema.
 *
 * Inference mode 'auto' lets the provider's strategy chain pick the
 * structured-output strategy; any other mode forces that one strategy.
 */

import { ConfigurationError, InferenceError, toError } from '@/core/errors';
import type { CompletionOptions, LLMClient, Message } from '@/providers/llm/types';
import { logChunkFailure } from '@/utils/logger';
import { mapInBatches } from '../batch';
import type {
  EngineOptions,
  Executable,
  ExecutableSpec,
  InputRecord,
  LLMEngine,
  LLMInferenceMode,
  SchemaShape
} from '../types';
import { formatExamples, renderTemplate, templateVariables } from './template';

const DEFAULT_BATCH_SIZE = 8;

export interface LLMEngineOptions extends EngineOptions {
  /** Passed through to every completion */
  completion?: CompletionOptions;
  /** Retries per structured-output strategy */
  maxRetriesPerStrategy?: number;
  verbose?: boolean;
}

export class VercelLLMEngine implements LLMEngine {
  readonly backend = 'llm' as const;
  readonly supportsFewShot = true;
  readonly strictMode: boolean;
  private readonly batchSize: number;

  constructor(
    private readonly client: LLMClient,
    private readonly options: LLMEngineOptions = {}
  ) {
    this.strictMode = options.strictMode ?? false;
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  get modelId(): string {
    return this.client.modelId;
  }

  buildExecutable<R>(spec: ExecutableSpec<LLMInferenceMode, SchemaShape<R>>): Executable<R> {
    const { promptTemplate, outputShape, mode } = spec;
    if (!promptTemplate) {
      throw new ConfigurationError('LLM engine requires a prompt template');
    }
    if (!templateVariables(promptTemplate).includes('text')) {
      throw new ConfigurationError('LLM prompt template must contain a {{text}} placeholder');
    }
    const examples = formatExamples(spec.fewshotExamples);

    return (records) =>
      mapInBatches(records, this.batchSize, (record, index) =>
        this.infer(record, index, promptTemplate, examples, outputShape, mode)
      );
  }

  private async infer<R>(
    record: InputRecord,
    index: number,
    promptTemplate: string,
    examples: string,
    outputShape: SchemaShape<R>,
    mode: LLMInferenceMode
  ): Promise<R | null> {
    const messages: Message[] = [
      { role: 'user', content: renderTemplate(promptTemplate, { ...record, examples }) }
    ];

    try {
      return await this.client.completeJSON(messages, outputShape.schema, {
        ...this.options.completion,
        strategyOptions: {
          maxRetriesPerStrategy: this.options.maxRetriesPerStrategy,
          verbose: this.options.verbose,
          forceStrategy: mode === 'auto' ? undefined : mode
        }
      });
    } catch (error) {
      const cause = toError(error);
      if (this.strictMode) {
        throw new InferenceError(`LLM inference failed for chunk ${index}: ${cause.message}`, cause);
      }
      logChunkFailure(this.backend, index, cause);
      return null;
    }
  }
}
