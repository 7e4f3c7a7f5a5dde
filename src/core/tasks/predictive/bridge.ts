/**
 * Bridges
 *
 * A bridge connects one task type to one inference backend. It owns the
 * prompt, the output shape and the inference mode, turns documents into
 * engine input records, and merges chunk results back into one result per
 * document. It never holds documents between calls.
 *
 * Hierarchy:
 *   Bridge<Raw, Result>            prompt composition, extract, integrate
 *   ├─ LLMBridge<Raw, Result>      zod schema shape, strategy-based modes
 *   └─ ZeroShotBridge<Result>      closed label set, single/multi-label modes
 */

import type { z } from 'zod';
import { MissingTextError } from '@/core/errors';
import type { Doc } from '@/data/doc';
import type {
  ChoiceShape,
  Executable,
  FewshotExample,
  InferenceMode,
  InputRecord,
  LLMEngine,
  LLMInferenceMode,
  SchemaShape,
  ZeroShotEngine,
  ZeroShotInferenceMode,
  ZeroShotResult
} from '@/engines/types';
import type { ChunkOffset } from './consolidation';

export interface BridgeOptions {
  taskId: string;
  /** Replaces the default instructions at the top of the prompt */
  promptInstructions?: string | null;
  /** Text-producing tasks write their output back into `doc.text` */
  overwrite?: boolean;
}

// ═══════════════════════════════════════════════════════════════════════════════
// Base Bridge
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class Bridge<Raw, Result> {
  abstract readonly backend: InferenceMode['backend'];

  constructor(protected readonly options: BridgeOptions) {}

  get taskId(): string {
    return this.options.taskId;
  }

  protected abstract get defaultPromptInstructions(): string;

  /** Closing section of the prompt, carrying `{{text}}` and task variables */
  protected get promptConclusion(): string {
    return '========\n<text>{{text}}</text>\n<output>';
  }

  /**
   * Instructions, then the few-shot block, then the conclusion.
   */
  get promptTemplate(): string | null {
    const instructions = this.options.promptInstructions ?? this.defaultPromptInstructions;
    return `${instructions.trim()}\n{{examples}}\n${this.promptConclusion}`;
  }

  abstract get inferenceMode(): InferenceMode;

  abstract get supportsFewShot(): boolean;

  abstract buildExecutable(fewshotExamples: readonly FewshotExample[]): Executable<Raw>;

  /**
   * One base input record per document. Chunk expansion replaces `text`.
   */
  extract(docs: readonly Doc[]): InputRecord[] {
    return docs.map((doc, index) => {
      if (doc.text === null) {
        throw new MissingTextError(this.taskId, index);
      }
      return { text: doc.text, ...this.extraVariables(doc) };
    });
  }

  /** Task variables shared by all chunks of a document */
  protected extraVariables(_doc: Doc): InputRecord {
    return {};
  }

  abstract consolidate(results: readonly (Raw | null)[], offsets: readonly ChunkOffset[]): Result[];

  integrate(results: readonly Result[], docs: readonly Doc[]): void {
    docs.forEach((doc, i) => {
      doc.results[this.taskId] = results[i];
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// LLM Bridge
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class LLMBridge<Raw, Result> extends Bridge<Raw, Result> {
  override readonly backend = 'llm' as const;
  private shape: SchemaShape<Raw> | null = null;

  constructor(
    protected readonly engine: LLMEngine,
    options: BridgeOptions,
    private readonly mode: LLMInferenceMode = 'auto'
  ) {
    super(options);
  }

  /** Schema of one chunk's model output */
  protected abstract createOutputSchema(): z.ZodType<Raw>;

  get outputShape(): SchemaShape<Raw> {
    this.shape ??= { kind: 'schema', schema: this.createOutputSchema() };
    return this.shape;
  }

  override get inferenceMode(): InferenceMode {
    return { backend: 'llm', mode: this.mode };
  }

  override get supportsFewShot(): boolean {
    return this.engine.supportsFewShot;
  }

  override buildExecutable(fewshotExamples: readonly FewshotExample[]): Executable<Raw> {
    return this.engine.buildExecutable({
      mode: this.mode,
      promptTemplate: this.promptTemplate,
      outputShape: this.outputShape,
      fewshotExamples
    });
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// Zero-shot Bridge
// ═══════════════════════════════════════════════════════════════════════════════

export abstract class ZeroShotBridge<Result> extends Bridge<ZeroShotResult, Result> {
  override readonly backend = 'zero-shot' as const;
  readonly outputShape: ChoiceShape;

  constructor(
    protected readonly engine: ZeroShotEngine,
    options: BridgeOptions,
    labels: readonly string[],
    private readonly mode: ZeroShotInferenceMode
  ) {
    super(options);
    this.outputShape = { kind: 'choice', labels };
  }

  protected override get defaultPromptInstructions(): string {
    return '';
  }

  /**
   * Hypothesis template with a `{{label}}` placeholder, or null for the engine default.
   */
  override get promptTemplate(): string | null {
    return this.options.promptInstructions ?? null;
  }

  override get inferenceMode(): InferenceMode {
    return { backend: 'zero-shot', mode: this.mode };
  }

  override get supportsFewShot(): boolean {
    return this.engine.supportsFewShot;
  }

  override buildExecutable(fewshotExamples: readonly FewshotExample[]): Executable<ZeroShotResult> {
    return this.engine.buildExecutable({
      mode: this.mode,
      promptTemplate: this.promptTemplate,
      outputShape: this.outputShape,
      fewshotExamples
    });
  }
}
