import type OpenAI from "openai";
import { getOpenAIClient } from "../../clients/openai.js";
import { recordOpenAIUsage } from "../../observability/metrics.js";

export type ChatRole = "system" | "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export const DEFAULT_TEMPERATURE = 1;
export const DEFAULT_TOP_P = 1;
export const DEFAULT_MAX_TOKENS = 500;

export type GenerationRequest = {
  model: string;
  temperature?: number;
  topP?: number;
  maxTokens?: number;
  signal?: AbortSignal;
} & ({ prompt: string; role?: ChatRole } | { messages: ChatMessage[] });

export interface GenerationResult {
  content: string;
  totalTokens: number;
}

export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}

export type CompletionBody = {
  model: string;
  messages: OpenAI.Chat.ChatCompletionMessageParam[];
  temperature: number;
  top_p: number;
  max_tokens: number;
};

export type CompletionResponse = {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { total_tokens: number } | null;
};

export type CreateCompletion = (body: CompletionBody, signal?: AbortSignal) => Promise<CompletionResponse>;

export class GenerationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationError";
  }
}

const createCompletionWithOpenAI: CreateCompletion = async (body, signal) => {
  const { client } = await getOpenAIClient();
  return client.chat.completions.create(body, { signal });
};

const toOpenAIMessage = (message: ChatMessage): OpenAI.Chat.ChatCompletionMessageParam => {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "assistant":
      return { role: "assistant", content: message.content };
    case "user":
      return { role: "user", content: message.content };
  }
};

export const toChatMessages = (request: GenerationRequest): ChatMessage[] =>
  "messages" in request ? request.messages : [{ role: request.role ?? "user", content: request.prompt }];

export interface OpenAITextGeneratorDependencies {
  createCompletion?: CreateCompletion;
  recordOpenAIUsage?: typeof recordOpenAIUsage;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly createCompletion: CreateCompletion;
  private readonly recordUsage: typeof recordOpenAIUsage;

  constructor(dependencies?: OpenAITextGeneratorDependencies) {
    this.createCompletion = dependencies?.createCompletion ?? createCompletionWithOpenAI;
    this.recordUsage = dependencies?.recordOpenAIUsage ?? recordOpenAIUsage;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    let response: CompletionResponse;
    try {
      response = await this.createCompletion(
        {
          model: request.model,
          messages: toChatMessages(request).map(toOpenAIMessage),
          temperature: request.temperature ?? DEFAULT_TEMPERATURE,
          top_p: request.topP ?? DEFAULT_TOP_P,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS
        },
        request.signal
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : "unknown error";
      throw new GenerationError(`Failed to get correct output from LLM call. Error: ${message}`, { cause: error });
    }

    const content = response.choices[0]?.message.content;
    if (typeof content !== "string") {
      throw new GenerationError("LLM response is missing message content.");
    }

    const totalTokens = response.usage?.total_tokens ?? 0;
    this.recordUsage(totalTokens);
    return { content, totalTokens };
  }
}
