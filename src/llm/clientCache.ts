import { createHash } from "node:crypto";
import OpenAI from "openai";
import type { ChatCompletionCreateParamsNonStreaming } from "openai/resources/chat/completions.js";

export interface ChatCompletionLike {
  choices: Array<{ message: { content: string | null } }>;
}

/** The slice of the OpenAI client the assistant uses */
export interface ChatClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): PromiseLike<ChatCompletionLike>;
    };
  };
}

export type ClientFactory = (apiKey: string) => ChatClient;

export function openAIClientFactory(timeoutMs: number): ClientFactory {
  // Failures surface to the user immediately; nothing is retried
  return (apiKey) => new OpenAI({ apiKey, maxRetries: 0, timeout: timeoutMs });
}

/**
 * Reuses one client per (api key, model) pair for the life of the process.
 * Keys are hashed before being used as map keys.
 */
export class ClientCache {
  private readonly clients = new Map<string, ChatClient>();

  constructor(private readonly factory: ClientFactory) {}

  get(apiKey: string, model: string): ChatClient {
    const cacheKey = `${createHash("sha256").update(apiKey).digest("hex").slice(0, 16)}:${model}`;
    let client = this.clients.get(cacheKey);
    if (!client) {
      client = this.factory(apiKey);
      this.clients.set(cacheKey, client);
    }
    return client;
  }

  get size(): number {
    return this.clients.size;
  }

  clear(): void {
    this.clients.clear();
  }
}
