import { afterEach, beforeEach, vi } from "vitest";

process.env.APP_MODE = "local";
process.env.OPENAI_API_KEY ??= "test-key";
process.env.LOG_LEVEL ??= "error";
delete process.env.QDRANT_URL;

const ENV_SNAPSHOT = { ...process.env };

beforeEach(() => {
  vi.restoreAllMocks();
  vi.unstubAllEnvs();
});

afterEach(async () => {
  for (const key of Object.keys(process.env)) {
    if (!(key in ENV_SNAPSHOT)) {
      delete process.env[key];
    }
  }

  for (const [key, value] of Object.entries(ENV_SNAPSHOT)) {
    process.env[key] = value;
  }

  const { resetOpenAIClientForTests } = await import("../../src/clients/openai.js");
  const { resetQdrantClientForTests } = await import("../../src/clients/qdrant.js");
  resetOpenAIClientForTests();
  resetQdrantClientForTests();
});
