import { z } from "zod";
import { DEFAULT_FUSION_ALPHA, DEFAULT_FUSION_K } from "../rag/rank-fusion.js";
import type { RetrievalConfig } from "../rag/types.js";

export class RetrievalConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "RetrievalConfigError";
  }
}

export const DEFAULT_TOP_K = 20;

const optionalText = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

export const answerQueryRequestSchema = z.object({
  query: z.string(),
  model: z.string().trim().min(1).optional(),
  useRag: z.boolean().default(true),
  deadlineMs: z.number().int().positive().optional(),
  requestId: z.string().min(1).optional()
});

// Only validated on the RAG path; a no-RAG request ignores these fields.
export const retrievalOptionsSchema = z.object({
  retrieverType: z.enum(["bm25", "semantic", "hybrid"]).default("semantic"),
  simplified: z.boolean().default(false),
  topK: z.number().int().positive().default(DEFAULT_TOP_K),
  alpha: z.number().min(0).max(1).default(DEFAULT_FUSION_ALPHA),
  k: z.number().min(0).default(DEFAULT_FUSION_K),
  useReranker: z.boolean().default(false),
  rerankQuery: optionalText
});

export type AnswerQueryInput = z.input<typeof answerQueryRequestSchema> & z.input<typeof retrievalOptionsSchema>;

type AnswerQueryRequest = {
  query: string;
  model?: string;
  deadlineMs?: number;
  requestId?: string;
};

export type RagQueryOptions = AnswerQueryRequest & { useRag: true; retrieval: RetrievalConfig };

export type AnswerQueryOptions = (AnswerQueryRequest & { useRag: false }) | RagQueryOptions;

const parseWith = <T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> => {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("\n");
    throw new RetrievalConfigError(`Invalid answerQuery options:\n${details}`);
  }
  return parsed.data;
};

export const parseAnswerQueryOptions = (input: unknown): AnswerQueryOptions => {
  const { query, model, useRag, deadlineMs, requestId } = parseWith(answerQueryRequestSchema, input);
  const request = { query, model, deadlineMs, requestId };
  if (!useRag) {
    return { ...request, useRag: false };
  }

  const { rerankQuery, ...retrieval } = parseWith(retrievalOptionsSchema, input);
  return {
    ...request,
    useRag: true,
    retrieval: Object.freeze({
      ...retrieval,
      ...(rerankQuery === undefined ? {} : { rerankQuery })
    })
  };
};
