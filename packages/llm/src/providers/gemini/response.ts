import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import type { ContentPart, FinishReason, LLMResponse } from '../../types/index.js';
import { ContentFilterError, ProviderError } from '../../types/index.js';

const GeminiPartSchema = z
  .object({
    text: z.string().optional(),
    thought: z.boolean().optional(),
    functionCall: z
      .object({
        name: z.string(),
        args: z.record(z.unknown()).optional(),
      })
      .optional(),
  })
  .passthrough();

const GeminiResponseSchema = z
  .object({
    responseId: z.string().optional(),
    modelVersion: z.string().optional(),
    candidates: z
      .array(
        z
          .object({
            content: z
              .object({
                parts: z.array(GeminiPartSchema).optional(),
              })
              .passthrough()
              .optional(),
            finishReason: z.string().optional(),
          })
          .passthrough(),
      )
      .optional(),
    promptFeedback: z
      .object({
        blockReason: z.string().optional(),
      })
      .passthrough()
      .optional(),
    usageMetadata: z
      .object({
        promptTokenCount: z.number().optional(),
        candidatesTokenCount: z.number().optional(),
        totalTokenCount: z.number().optional(),
      })
      .passthrough()
      .optional(),
  })
  .passthrough();

const BLOCKED_FINISH_REASONS = new Set(['SAFETY', 'RECITATION', 'BLOCKLIST', 'PROHIBITED_CONTENT', 'SPII']);

function mapFinishReason(raw: string | undefined, hasToolCalls: boolean): FinishReason {
  if (hasToolCalls) {
    return 'tool_calls';
  }
  if (raw === undefined || raw === 'STOP') {
    return 'stop';
  }
  if (raw === 'MAX_TOKENS') {
    return 'length';
  }
  if (BLOCKED_FINISH_REASONS.has(raw)) {
    return 'content_filter';
  }
  return 'error';
}

export function translateResponse(raw: unknown, requestedModel: string): LLMResponse {
  const parsed = GeminiResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError(`Unexpected response shape: ${parsed.error.message}`, {
      statusCode: 200,
      provider: 'gemini',
      raw,
    });
  }

  const data = parsed.data;
  const firstCandidate = data.candidates?.[0];

  if (!firstCandidate && data.promptFeedback?.blockReason) {
    throw new ContentFilterError(`Prompt blocked: ${data.promptFeedback.blockReason}`, {
      statusCode: 200,
      provider: 'gemini',
      errorCode: data.promptFeedback.blockReason,
      raw,
    });
  }

  const content: Array<ContentPart> = [];

  for (const part of firstCandidate?.content?.parts ?? []) {
    if (part.functionCall) {
      content.push({
        kind: 'TOOL_CALL',
        toolCallId: `call_${randomUUID()}`,
        toolName: part.functionCall.name,
        args: part.functionCall.args ?? {},
      });
    } else if (part.text && !part.thought) {
      content.push({
        kind: 'TEXT',
        text: part.text,
      });
    }
  }

  const usage = data.usageMetadata;
  const inputTokens = usage?.promptTokenCount ?? 0;
  const outputTokens = usage?.candidatesTokenCount ?? 0;

  return {
    id: data.responseId ?? randomUUID(),
    model: data.modelVersion ?? requestedModel,
    content,
    finishReason: mapFinishReason(
      firstCandidate?.finishReason,
      content.some((part) => part.kind === 'TOOL_CALL'),
    ),
    usage: {
      inputTokens,
      outputTokens,
      totalTokens: usage?.totalTokenCount ?? inputTokens + outputTokens,
    },
  };
}
