import { parseArgs } from "node:util";
import { shutdownClients } from "../clients/lifecycle.js";
import { OpenAITextGenerator } from "../modules/llm/text-generator.js";
import { createPipeline } from "../modules/pipeline/create-pipeline.js";
import { toGenerationRequest } from "../modules/pipeline/pipeline-orchestrator.js";
import type { RetrieverType } from "../modules/rag/types.js";

const isRetrieverType = (value: string): value is RetrieverType =>
  value === "bm25" || value === "semantic" || value === "hybrid";

const { values, positionals } = parseArgs({
  allowPositionals: true,
  options: {
    generate: { type: "boolean", default: false },
    "no-rag": { type: "boolean", default: false },
    retriever: { type: "string", default: "semantic" },
    simplified: { type: "boolean", default: false },
    "top-k": { type: "string", default: "20" },
    alpha: { type: "string", default: "0.5" },
    k: { type: "string", default: "60" },
    rerank: { type: "boolean", default: false },
    "rerank-query": { type: "string" },
    "deadline-ms": { type: "string" }
  }
});

const query = positionals.join(" ").trim();
if (!query) {
  console.error('usage: npm run ask -- [--generate] [--retriever bm25|semantic|hybrid] "<query>"');
  process.exit(1);
}

const retrieverType = values.retriever ?? "semantic";
if (!isRetrieverType(retrieverType)) {
  console.error(`ask: unknown retriever "${retrieverType}"`);
  process.exit(1);
}

try {
  const pipeline = await createPipeline();
  const result = await pipeline.answerQuery({
    query,
    useRag: values["no-rag"] !== true,
    retrieverType,
    simplified: values.simplified ?? false,
    topK: Number(values["top-k"] ?? "20"),
    alpha: Number(values.alpha ?? "0.5"),
    k: Number(values.k ?? "60"),
    useReranker: values.rerank ?? false,
    rerankQuery: values["rerank-query"],
    deadlineMs: values["deadline-ms"] === undefined ? undefined : Number(values["deadline-ms"])
  });

  console.info(`ask: route=${result.route} model=${result.model} total_tokens=${result.totalTokens}`);
  console.info(result.promptText);

  if (values.generate === true) {
    const answer = await new OpenAITextGenerator().generate(toGenerationRequest(result));
    console.info(`ask: generation_tokens=${answer.totalTokens}`);
    console.info(answer.content);
  }
} finally {
  await shutdownClients();
}
