import OpenAI from "openai";
import { config } from "../config/index.js";

type HealthStatus = "ok" | "error";

export interface OpenAISingleton {
  client: OpenAI;
  healthCheck: () => Promise<{ status: HealthStatus; details?: string }>;
}

const REQUEST_TIMEOUT_MS = 15000;
const HEALTH_CHECK_TIMEOUT_MS = 7000;

let singleton: OpenAISingleton | null = null;

async function withTimeout<T>(operation: (signal: AbortSignal) => Promise<T>, timeoutMs: number): Promise<T> {
  const controller = new AbortController();
  const timeoutHandle = setTimeout(() => controller.abort(), timeoutMs);

  try {
    return await operation(controller.signal);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

function initialize(): OpenAISingleton {
  // Retries stay off: a failed call degrades the request instead of being replayed.
  const client = new OpenAI({
    apiKey: config.OPENAI_API_KEY,
    maxRetries: 0,
    timeout: REQUEST_TIMEOUT_MS
  });

  console.info("[clients/openai] initialized singleton");

  return {
    client,
    async healthCheck() {
      try {
        await withTimeout(async (signal) => {
          await client.models.retrieve(config.OPENAI_MODEL, { signal });
        }, HEALTH_CHECK_TIMEOUT_MS);
        return { status: "ok" };
      } catch (error) {
        const details = error instanceof Error ? error.message : "unknown error";
        return { status: "error", details };
      }
    }
  };
}

export async function getOpenAIClient(): Promise<OpenAISingleton> {
  if (!singleton) {
    singleton = initialize();
  }

  return singleton;
}

export async function shutdownOpenAIClient(): Promise<void> {
  if (!singleton) {
    return;
  }

  singleton = null;
  console.info("[clients/openai] shutdown complete");
}

export function resetOpenAIClientForTests(): void {
  singleton = null;
}
