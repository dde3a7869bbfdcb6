import OpenAI from "openai";

import { OracleError, errorMessage } from "./errors.js";
import { Config, Message } from "./types.js";

export interface ApiSettings {
  provider: string;
  endpoint: string;
  model: string;
  apiKey?: string;
  maxTokens: number;
  temperature: number;
}

export const apis = {
  DEEPSEEK: {
    provider: "DeepSeek",
    endpoint: "https://api.deepseek.com",
    model: "deepseek-chat",
    apiKey: process.env.DEEPSEEK_API_KEY,
    maxTokens: 512,
    temperature: 0.1,
  },
} as const;

type StreamDelta = { content?: string | null; reasoning_content?: string };

/**
 * Sends one conversation to the provider and resolves with the reply text.
 * With onToken set the reply is streamed and every chunk is passed on.
 */
export async function requestCompletion({
  api,
  config,
  messages,
  onToken,
  log,
}: {
  api: ApiSettings;
  config: Pick<Config, "timeout" | "debug">;
  messages: Message[];
  onToken?: (text: string) => void;
  log?: (text: string) => void;
}): Promise<string> {
  if (!api.apiKey) {
    throw new OracleError(`API key for ${api.provider} is not set`);
  }

  const client = new OpenAI({
    apiKey: api.apiKey,
    baseURL: api.endpoint,
  });

  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), config.timeout);

  try {
    if (config.debug) {
      log?.(`Sending messages to ${api.provider}...`);
    }

    if (onToken) {
      const stream = await client.chat.completions.create(
        {
          model: api.model,
          messages,
          temperature: api.temperature,
          max_tokens: api.maxTokens,
          stream: true,
        },
        { signal: controller.signal }
      );

      let fullContent = "";
      for await (const chunk of stream) {
        const delta: StreamDelta = chunk.choices[0]?.delta ?? {};
        const contentChunk = delta.content ?? "";
        fullContent += contentChunk;
        onToken(delta.reasoning_content || contentChunk);
      }
      return fullContent;
    }

    const response = await client.chat.completions.create(
      {
        model: api.model,
        messages,
        temperature: api.temperature,
        max_tokens: api.maxTokens,
      },
      { signal: controller.signal }
    );

    return response.choices[0]?.message.content ?? "";
  } catch (error: unknown) {
    if (controller.signal.aborted) {
      throw new OracleError(
        `API request timed out after ${config.timeout / 1000} seconds`,
        error
      );
    }

    if (config.debug) {
      log?.(`[${api.provider}] API Error: ${errorMessage(error)}`);
    }

    throw new OracleError(
      `${api.provider} request failed: ${errorMessage(error)}`,
      error
    );
  } finally {
    clearTimeout(timeoutId);
  }
}
