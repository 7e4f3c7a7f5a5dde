/**
 * Engine Types
 *
 * An engine is an inference backend. Tasks never call a model directly: a
 * bridge hands the engine an inference mode, a prompt template, an output
 * shape and few-shot examples, and receives an executable that maps a
 * flattened list of chunk records to one raw result (or null) per record.
 */

import type { z } from 'zod';
import type { StrategyName } from '@/providers/llm/structured-output';

// ═══════════════════════════════════════════════════════════════════════════════
// Backends and Modes
// ═══════════════════════════════════════════════════════════════════════════════

export const backendTypes = ['llm', 'zero-shot'] as const;
export type BackendType = (typeof backendTypes)[number];

/** 'auto' lets the provider's strategy chain decide */
export type LLMInferenceMode = 'auto' | StrategyName;

export type ZeroShotInferenceMode = 'single-label' | 'multi-label';

export type InferenceMode =
  | { backend: 'llm'; mode: LLMInferenceMode }
  | { backend: 'zero-shot'; mode: ZeroShotInferenceMode };

// ═══════════════════════════════════════════════════════════════════════════════
// Executable Contract
// ═══════════════════════════════════════════════════════════════════════════════

/** One chunk's input: `text` plus task variables (targetLanguage, questions, ...) */
export type InputRecord = Record<string, unknown>;

/** A labelled input/output pair shown to the model */
export type FewshotExample = Record<string, unknown>;

/**
 * Same length and order as `records`. A null entry is a chunk that failed
 * inference while the engine runs leniently.
 */
export type Executable<R> = (records: InputRecord[]) => Promise<(R | null)[]>;

/** Structured output validated by a zod schema */
export interface SchemaShape<R> {
  kind: 'schema';
  schema: z.ZodType<R>;
}

/** Scores over a closed label set */
export interface ChoiceShape {
  kind: 'choice';
  labels: readonly string[];
}

export interface ExecutableSpec<M, S> {
  mode: M;
  promptTemplate: string | null;
  outputShape: S;
  fewshotExamples: readonly FewshotExample[];
}

// ═══════════════════════════════════════════════════════════════════════════════
// Engines
// ═══════════════════════════════════════════════════════════════════════════════

interface EngineBase {
  readonly supportsFewShot: boolean;
  /** Throw on the first failed chunk instead of yielding null */
  readonly strictMode: boolean;
}

export interface LLMEngine extends EngineBase {
  readonly backend: 'llm';
  buildExecutable<R>(spec: ExecutableSpec<LLMInferenceMode, SchemaShape<R>>): Executable<R>;
}

/** Labels sorted by descending score, scores aligned with labels */
export interface ZeroShotResult {
  labels: string[];
  scores: number[];
}

export interface ZeroShotEngine extends EngineBase {
  readonly backend: 'zero-shot';
  buildExecutable(
    spec: ExecutableSpec<ZeroShotInferenceMode, ChoiceShape>
  ): Executable<ZeroShotResult>;
}

export type Engine = LLMEngine | ZeroShotEngine;

export type EngineFor<B extends BackendType> = Extract<Engine, { backend: B }>;

export interface EngineOptions {
  strictMode?: boolean;
  /** Chunks processed concurrently */
  batchSize?: number;
}
