import type { ChatCompletionMessageParam } from "openai/resources/chat/completions.js";
import { z } from "zod";
import { GenerationError, errorMessage } from "../errors.js";
import type { CommandRecord, ExecutionContext, GeneratedCommand } from "../types.js";
import type { ClientCache } from "./clientCache.js";
import { buildAskSystemPrompt, buildRunSystemPrompt } from "./prompts.js";

export interface CommandGenerator {
  generate(
    intent: string,
    context: ExecutionContext,
    previous: CommandRecord | null,
    history: CommandRecord[]
  ): Promise<GeneratedCommand>;
}

export interface QuestionAnswerer {
  answer(
    question: string,
    context: ExecutionContext,
    previous: CommandRecord | null,
    history: CommandRecord[]
  ): Promise<string>;
}

/**
 * Validates OpenAI API key format
 * OpenAI keys must start with "sk-"
 */
export function validateOpenAIKey(key: string | undefined): { valid: boolean; error: string | null } {
  if (!key) {
    return { valid: false, error: "OPENAI_API_KEY is not set" };
  }

  if (!key.startsWith("sk-")) {
    return {
      valid: false,
      error: "OPENAI_API_KEY must start with 'sk-'. Check your API key format.",
    };
  }

  return { valid: true, error: null };
}

const CommandResponseSchema = z.object({
  command: z.string(),
  explanation: z.string().optional(),
});

const FENCED = /^```[A-Za-z0-9_-]*\s*\n?([\s\S]*?)\n?```$/;

function stripFences(text: string): string {
  const trimmed = text.trim();
  const match = FENCED.exec(trimmed);
  return match ? match[1].trim() : trimmed;
}

/** Strips markdown fences and a leading prompt marker from a model-written command */
export function normalizeCommand(raw: string): string {
  let command = stripFences(raw);
  if (command.startsWith("$ ")) {
    command = command.slice(2).trim();
  }
  return command;
}

export function parseGeneratedCommand(content: string | null | undefined): GeneratedCommand {
  if (!content || content.trim() === "") {
    throw new GenerationError("The model returned an empty response.");
  }

  let json: unknown;
  try {
    json = JSON.parse(stripFences(content));
  } catch (err) {
    throw new GenerationError("The model response was not valid JSON.", { cause: err });
  }

  const parsed = CommandResponseSchema.safeParse(json);
  if (!parsed.success) {
    throw new GenerationError("The model response did not contain a command.", { cause: parsed.error });
  }

  const command = normalizeCommand(parsed.data.command);
  if (!command) {
    throw new GenerationError("The model returned an empty command.");
  }

  const explanation = parsed.data.explanation?.trim();
  return explanation ? { command, explanation } : { command };
}

export interface AssistantOptions {
  clients: ClientCache;
  apiKey: string;
  model: string;
  maxTokens: number;
}

/**
 * Command generation and question answering over the chat completions API.
 */
export class OpenAIAssistant implements CommandGenerator, QuestionAnswerer {
  constructor(private readonly options: AssistantOptions) {}

  async generate(
    intent: string,
    context: ExecutionContext,
    previous: CommandRecord | null,
    history: CommandRecord[]
  ): Promise<GeneratedCommand> {
    const content = await this.complete(
      [
        { role: "system", content: buildRunSystemPrompt(context, previous, history) },
        { role: "user", content: intent },
      ],
      true
    );
    return parseGeneratedCommand(content);
  }

  async answer(
    question: string,
    context: ExecutionContext,
    previous: CommandRecord | null,
    history: CommandRecord[]
  ): Promise<string> {
    const content = await this.complete(
      [
        { role: "system", content: buildAskSystemPrompt(context, previous, history) },
        { role: "user", content: question },
      ],
      false
    );
    const answer = content?.trim();
    if (!answer) {
      throw new GenerationError("The model returned an empty answer.");
    }
    return answer;
  }

  private async complete(messages: ChatCompletionMessageParam[], json: boolean): Promise<string | null> {
    const client = this.options.clients.get(this.options.apiKey, this.options.model);
    try {
      const response = await client.chat.completions.create({
        model: this.options.model,
        max_tokens: this.options.maxTokens,
        ...(json ? { response_format: { type: "json_object" as const } } : {}),
        messages,
      });
      return response.choices[0]?.message.content ?? null;
    } catch (err) {
      throw new GenerationError(`LLM request failed: ${errorMessage(err)}`, { cause: err });
    }
  }
}
