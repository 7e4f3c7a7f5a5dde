/**
 * Tier 2: Tool Calling Strategy
 *
 * The schema becomes the input schema of a single "respond" tool and the
 * model is forced to call it. The tool has no execute function; only the
 * call arguments are read.
 *
 * Supported by Anthropic, OpenAI, Google and most modern models.
 */

import type { LanguageModelV3 } from '@ai-sdk/provider';
import { generateText, tool } from 'ai';
import type { z } from 'zod';
import type { CompletionOptions, Message } from '../types';
import {
  type ProviderCapabilities,
  type StructuredOutputStrategy,
  toProviderOptions
} from './types';

const TOOL_NAME = 'respond';

export const toolCallingStrategy: StructuredOutputStrategy = {
  name: 'tool-calling',

  isSupported(capabilities: ProviderCapabilities): boolean {
    return capabilities.supportsToolCalling;
  },

  async execute<T>(
    model: LanguageModelV3,
    messages: Message[],
    schema: z.ZodType<T>,
    capabilities: ProviderCapabilities,
    options?: CompletionOptions
  ): Promise<T> {
    const respondTool = tool({
      description: 'Return the answer for the current input as structured data',
      inputSchema: schema
    });

    const { toolCalls } = await generateText({
      model,
      messages: [
        ...messages,
        {
          role: 'system' as const,
          content: `Answer only by calling the "${TOOL_NAME}" tool. Never reply with plain text.`
        }
      ],
      tools: { [TOOL_NAME]: respondTool },
      toolChoice: { type: 'tool', toolName: TOOL_NAME },
      maxOutputTokens: options?.maxTokens,
      temperature: options?.temperature,
      providerOptions: toProviderOptions(capabilities, options)
    });

    const call = toolCalls.find((c) => c.toolName === TOOL_NAME);
    if (!call) {
      throw new Error('Tool calling strategy: model did not call the respond tool');
    }

    return schema.parse(call.input);
  }
};
