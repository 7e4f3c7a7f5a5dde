/**
 * Tier 4: Prompt-based Strategy
 *
 * Universal fallback that works with any model: the JSON Schema goes into
 * the prompt, the reply is plain text, and JSON is pulled out of it
 * (fenced block, first balanced object or array, or the whole reply).
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import {
  appendToLastMessage,
  describeSchema,
  type ProviderCapabilities,
  type StructuredOutputStrategy,
  toProviderOptions
} from './types';

/**
 * Find the end index (exclusive) of the balanced JSON value opening at `start`.
 * Brackets inside string literals are ignored. Returns -1 when unbalanced.
 */
function findBalancedEnd(text: string, start: number): number {
  const open = text[start];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (ch === '\\') i++;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return i + 1;
    }
  }
  return -1;
}

/**
 * Extract JSON from model text that may be wrapped in markdown or prose.
 */
export function extractJSON(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/);
  if (fenced?.[1]) {
    return fenced[1].trim();
  }

  const start = text.search(/[{[]/);
  if (start >= 0) {
    const end = findBalancedEnd(text, start);
    if (end > 0) {
      return text.slice(start, end);
    }
  }

  return text.trim();
}

/**
 * Parse model text as JSON, returning undefined when it is not JSON.
 */
export function parseJSONLoose(text: string): unknown {
  try {
    return JSON.parse(extractJSON(text));
  } catch {
    return undefined;
  }
}

export const promptBasedStrategy: StructuredOutputStrategy = {
  name: 'prompt-based',

  isSupported(): boolean {
    return true;
  },

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    capabilities: ProviderCapabilities,
    options?: CompletionOptions
  ): Promise<T> {
    const { text } = await generateText({
      model,
      messages: appendToLastMessage(
        messages,
        `Respond ONLY with JSON conforming to this JSON Schema:\n${describeSchema(schema)}\n\n` +
          'No markdown, no explanation, only the raw JSON.'
      ),
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      providerOptions: toProviderOptions(capabilities, options)
    });

    const parsed = parseJSONLoose(text);
    if (parsed === undefined) {
      throw new Error(
        `Prompt-based strategy: failed to parse JSON. Raw text (last 500 chars): ${text.slice(-500)}`
      );
    }
    return schema.parse(parsed);
  }
};
