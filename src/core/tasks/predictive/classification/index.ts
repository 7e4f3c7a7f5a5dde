/**
 * Classification
 *
 * Assigns one label (single-label) or a score per label (multi-label) from a
 * closed label set. Runs on the LLM and zero-shot backends.
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { type ClassificationSettings, classificationBridges } from './bridges';
import {
  type ClassificationExample,
  type ClassificationRaw,
  type ClassificationResult,
  createExampleSchema
} from './schemas';

export type {
  ClassificationExample,
  ClassificationResult,
  MultiLabelResult,
  SingleLabelResult
} from './schemas';

export interface ClassificationOptions extends PredictiveTaskOptions<ClassificationExample> {
  labels: readonly string[];
  /** Optional description per label, added to the LLM prompt */
  labelDescriptions?: Readonly<Record<string, string>>;
  multiLabel?: boolean;
}

const TASK_NAME = 'Classification';

function resolveSettings(options: ClassificationOptions): ClassificationSettings {
  const labels = options.labels.map((label) => label.trim());
  if (labels.length === 0) {
    throw new ConfigurationError(`${TASK_NAME}: at least one label is required`);
  }
  if (labels.some((label) => label.length === 0)) {
    throw new ConfigurationError(`${TASK_NAME}: labels must not be blank`);
  }
  if (new Set(labels).size !== labels.length) {
    throw new ConfigurationError(`${TASK_NAME}: labels must be unique`);
  }

  const labelDescriptions = options.labelDescriptions ?? {};
  const unknown = Object.keys(labelDescriptions).filter((label) => !labels.includes(label));
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `${TASK_NAME}: descriptions given for unknown labels: ${unknown.join(', ')}`
    );
  }

  return { labels, labelDescriptions, multiLabel: options.multiLabel ?? false };
}

export class Classification extends PredictiveTask<
  ClassificationRaw,
  ClassificationResult,
  ClassificationExample
> {
  readonly labels: readonly string[];
  readonly multiLabel: boolean;

  constructor(options: ClassificationOptions) {
    const settings = resolveSettings(options);
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      classificationBridges(settings),
      { taskId: options.id ?? 'classification', promptInstructions: options.promptInstructions },
      options.inferenceMode
    );
    super(
      TASK_NAME,
      options,
      'classification',
      bridge,
      createExampleSchema(settings.labels, settings.multiLabel)
    );
    this.labels = settings.labels;
    this.multiLabel = settings.multiLabel;
  }
}
