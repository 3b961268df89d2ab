import Groq from 'groq-sdk';
import { PipelineSettings, requireSetting } from '../config/pipeline-settings';

export const CHAT_COMPLETION = Symbol('CHAT_COMPLETION');

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export interface ChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature?: number;
  maxTokens?: number;
  /** Ask for a JSON object response. */
  json?: boolean;
}

/** Returns the first choice's content, or null when the model produced none. */
export type ChatCompletion = (request: ChatRequest) => Promise<string | null>;

/**
 * Chat completion backed by groq-sdk. The client is created on first call so the
 * application boots without GROQ_API_KEY for stages that do not generate text.
 */
export function createGroqChatCompletion(settings: PipelineSettings): ChatCompletion {
  let groq: Groq | null = null;

  return async (request) => {
    if (!groq) {
      groq = new Groq({
        apiKey: requireSetting(settings, 'GROQ_API_KEY'),
        timeout: settings.httpTimeoutMs,
        maxRetries: 1,
      });
    }
    const completion = await groq.chat.completions.create({
      model: request.model,
      messages: request.messages,
      temperature: request.temperature ?? 0.3,
      max_tokens: request.maxTokens ?? 1024,
      ...(request.json ? { response_format: { type: 'json_object' as const } } : {}),
    });
    return completion.choices[0]?.message?.content ?? null;
  };
}
