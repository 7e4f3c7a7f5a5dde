/**
 * PII Masking
 *
 * Replaces personally identifiable information with a placeholder and
 * reports what was masked. Overwrites the document text by default.
 */

import { ConfigurationError } from '@/core/errors';
import { resolveBridge } from '../registry';
import { PredictiveTask, type PredictiveTaskOptions } from '../task';
import { type PIIMaskingSettings, piiMaskingBridges } from './bridges';
import {
  createExampleSchema,
  type PIIMaskingExample,
  type PIIMaskingOutput,
  type PIIMaskingResult
} from './schemas';

export type { PIIEntity, PIIMaskingExample, PIIMaskingResult } from './schemas';

export interface PIIMaskingOptions extends PredictiveTaskOptions<PIIMaskingExample> {
  /** Kinds of PII to mask, e.g. NAME, EMAIL, PHONE; all common kinds when omitted */
  piiTypes?: readonly string[];
  maskPlaceholder?: string;
  /** Replace the document text with the masked text (default true) */
  overwrite?: boolean;
}

const TASK_NAME = 'PIIMasking';

export const DEFAULT_MASK_PLACEHOLDER = '[MASKED]';

function resolveSettings(options: PIIMaskingOptions): PIIMaskingSettings {
  let piiTypes: string[] | null = null;
  if (options.piiTypes) {
    piiTypes = options.piiTypes.map((type) => type.trim());
    if (piiTypes.length === 0 || piiTypes.some((type) => type.length === 0)) {
      throw new ConfigurationError(`${TASK_NAME}: piiTypes must be non-empty names`);
    }
    if (new Set(piiTypes).size !== piiTypes.length) {
      throw new ConfigurationError(`${TASK_NAME}: piiTypes must be unique`);
    }
  }
  const maskPlaceholder = options.maskPlaceholder ?? DEFAULT_MASK_PLACEHOLDER;
  if (maskPlaceholder.length === 0) {
    throw new ConfigurationError(`${TASK_NAME}: maskPlaceholder must not be empty`);
  }
  return { piiTypes, maskPlaceholder };
}

export class PIIMasking extends PredictiveTask<
  PIIMaskingOutput,
  PIIMaskingResult,
  PIIMaskingExample
> {
  readonly piiTypes: readonly string[] | null;
  readonly maskPlaceholder: string;
  readonly overwrite: boolean;

  constructor(options: PIIMaskingOptions) {
    const settings = resolveSettings(options);
    const overwrite = options.overwrite ?? true;
    const bridge = resolveBridge(
      TASK_NAME,
      options.engine,
      piiMaskingBridges(settings),
      {
        taskId: options.id ?? 'pii_masking',
        promptInstructions: options.promptInstructions,
        overwrite
      },
      options.inferenceMode
    );
    super(TASK_NAME, options, 'pii_masking', bridge, createExampleSchema(settings.piiTypes));
    this.piiTypes = settings.piiTypes;
    this.maskPlaceholder = settings.maskPlaceholder;
    this.overwrite = overwrite;
  }
}
