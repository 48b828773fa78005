import { z } from "zod";
import { getOpenAIClient } from "../../clients/openai.js";
import { logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordOpenAIUsage } from "../../observability/metrics.js";
import { CROSS_ENCODER_SYSTEM_PROMPT, buildCrossEncoderUserPrompt } from "../../prompts/index.js";

export type RelevancePair = {
  query: string;
  document: string;
};

export interface CrossEncoder {
  score(pairs: RelevancePair[], signal?: AbortSignal): Promise<number[]>;
}

export class CrossEncoderError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CrossEncoderError";
  }
}

const scoresResponseSchema = z.object({
  scores: z.array(z.number())
});

export interface OpenAICrossEncoderOptions {
  model: string;
  getOpenAIClient?: typeof getOpenAIClient;
  recordOpenAIUsage?: typeof recordOpenAIUsage;
}

export const createOpenAICrossEncoder = (options: OpenAICrossEncoderOptions): CrossEncoder => {
  const getClient = options.getOpenAIClient ?? getOpenAIClient;
  const recordUsage = options.recordOpenAIUsage ?? recordOpenAIUsage;

  return {
    async score(pairs, signal) {
      if (pairs.length === 0) {
        return [];
      }

      const { client } = await getClient();
      const response = await client.chat.completions.create(
        {
          model: options.model,
          temperature: 0,
          response_format: { type: "json_object" },
          messages: [
            { role: "system", content: CROSS_ENCODER_SYSTEM_PROMPT },
            { role: "user", content: buildCrossEncoderUserPrompt(pairs) }
          ]
        },
        { signal }
      );
      recordUsage(response.usage?.total_tokens ?? 0);

      const content = response.choices[0]?.message.content;
      if (!content || content.trim().length === 0) {
        throw new CrossEncoderError("Cross-encoder returned empty content.");
      }

      let parsedJson: unknown;
      try {
        parsedJson = JSON.parse(content);
      } catch (error) {
        const message = error instanceof Error ? error.message : "invalid json";
        throw new CrossEncoderError(`Cross-encoder returned invalid JSON: ${message}`, { cause: error });
      }

      const parsed = scoresResponseSchema.safeParse(parsedJson);
      if (!parsed.success) {
        throw new CrossEncoderError("Cross-encoder JSON schema validation failed.");
      }
      return parsed.data.scores;
    }
  };
};

export type CrossEncoderState = "idle" | "ready" | "unavailable";

export interface CrossEncoderCapabilityOptions {
  enabled: boolean;
  load: () => Promise<CrossEncoder>;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
}

/**
 * Loads the scorer on first use. A failed load leaves the capability
 * unavailable for the life of the process.
 */
export class CrossEncoderCapability {
  private currentState: CrossEncoderState;
  private encoder: CrossEncoder | null = null;
  private loading: Promise<CrossEncoder | null> | null = null;
  private readonly load: () => Promise<CrossEncoder>;
  private readonly logInfo: typeof logInfo;
  private readonly logWarn: typeof logWarn;

  constructor(options: CrossEncoderCapabilityOptions) {
    this.currentState = options.enabled ? "idle" : "unavailable";
    this.load = options.load;
    this.logInfo = options.logInfo ?? logInfo;
    this.logWarn = options.logWarn ?? logWarn;
  }

  get state(): CrossEncoderState {
    return this.currentState;
  }

  async acquire(): Promise<CrossEncoder | null> {
    if (this.currentState === "ready") {
      return this.encoder;
    }
    if (this.currentState === "unavailable") {
      return null;
    }

    this.loading ??= this.load().then(
      (encoder) => {
        this.encoder = encoder;
        this.currentState = "ready";
        this.logInfo("rag.cross_encoder.ready", {});
        return encoder;
      },
      (error: unknown) => {
        this.currentState = "unavailable";
        this.logWarn("rag.cross_encoder.unavailable", {}, serializeError(error));
        return null;
      }
    );
    return this.loading;
  }
}
