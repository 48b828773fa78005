import { logError, logInfo, logWarn, serializeError } from "../../observability/logger.js";
import { recordErrorRate, recordPipelineLatency, recordRoute } from "../../observability/metrics.js";
import {
  buildFullFaqPrompt,
  buildGeneralKnowledgePrompt,
  buildNoRagPrompt,
  buildProductPrompt,
  buildRelevantFaqPrompt,
  buildRephraseRequestPrompt,
  formatKnowledgeBaseLayout,
  formatProductLayout
} from "../../prompts/index.js";
import type { KnowledgeBaseRecord } from "../catalog/types.js";
import { type MetadataFilterExtractor, toFilterPredicates } from "../filters/metadata-filter.js";
import { type ChatRole, DEFAULT_MAX_TOKENS, type GenerationRequest } from "../llm/text-generator.js";
import type { Reranker } from "../rag/reranker.js";
import { SemanticRetriever, createRetriever, type RetrieverDependencies } from "../rag/retriever.js";
import type { FilterPredicate, RetrievalConfig, SearchBackend } from "../rag/types.js";
import type { QueryLabel, QueryRouter } from "../routing/query-router.js";
import { type AnswerQueryInput, type RagQueryOptions, parseAnswerQueryOptions } from "./retrieval-config.js";

export type PipelineRoute = "no_rag" | "faq" | "product" | "undefined";

export interface GenerationParameters {
  role: ChatRole;
  temperature?: number;
  topP?: number;
  maxTokens: number;
}

export interface PipelineResult {
  promptText: string;
  model: string;
  totalTokens: number;
  route: PipelineRoute;
  generation: GenerationParameters;
}

type RouteDecision =
  | { kind: "faq" }
  | { kind: "product" }
  | { kind: "undefined"; reason: "ambiguous" | "router_failed" };

type BranchOutcome = {
  route: PipelineRoute;
  promptText: string;
};

class TokenLedger {
  private spent = 0;

  add(tokens: number): void {
    this.spent += Number.isFinite(tokens) ? Math.max(0, tokens) : 0;
  }

  get total(): number {
    return this.spent;
  }
}

type Deadline = {
  signal: AbortSignal;
  elapsed: Promise<void>;
  dispose: () => void;
};

const startDeadline = (timeoutMs: number): Deadline => {
  const controller = new AbortController();
  let timeoutHandle: NodeJS.Timeout | undefined;
  const elapsed = new Promise<void>((resolve) => {
    timeoutHandle = setTimeout(() => {
      controller.abort(new Error(`Request deadline of ${timeoutMs}ms elapsed.`));
      resolve();
    }, timeoutMs);
  });
  return {
    signal: controller.signal,
    elapsed,
    dispose: () => clearTimeout(timeoutHandle)
  };
};

const assertNever = (value: never): never => {
  throw new Error(`Unhandled route decision: ${JSON.stringify(value)}`);
};

const toDecision = (label: QueryLabel): RouteDecision => {
  switch (label) {
    case "FAQ":
      return { kind: "faq" };
    case "Product":
      return { kind: "product" };
    case "Undefined":
      return { kind: "undefined", reason: "ambiguous" };
  }
};

const readText = (properties: Record<string, unknown>, key: string): string => {
  const value = properties[key];
  return typeof value === "string" ? value : "";
};

const toKnowledgeBaseRecord = (properties: Record<string, unknown>): KnowledgeBaseRecord => ({
  question: readText(properties, "question"),
  answer: readText(properties, "answer"),
  category: readText(properties, "category") || readText(properties, "type")
});

export const toGenerationRequest = (result: PipelineResult): GenerationRequest => ({
  model: result.model,
  prompt: result.promptText,
  role: result.generation.role,
  temperature: result.generation.temperature,
  topP: result.generation.topP,
  maxTokens: result.generation.maxTokens
});

export interface RagPipelineOptions {
  router: Pick<QueryRouter, "classify">;
  filterExtractor: Pick<MetadataFilterExtractor, "extract">;
  reranker: Pick<Reranker, "rerank">;
  productBackend: SearchBackend;
  faqBackend: SearchBackend;
  knowledgeBase: readonly KnowledgeBaseRecord[];
  defaultModel: string;
}

export interface RagPipelineDependencies {
  now?: () => number;
  logInfo?: typeof logInfo;
  logWarn?: typeof logWarn;
  logError?: typeof logError;
  recordRoute?: typeof recordRoute;
  recordPipelineLatency?: typeof recordPipelineLatency;
  recordErrorRate?: typeof recordErrorRate;
  retriever?: RetrieverDependencies;
}

const resolveDependencies = (dependencies?: RagPipelineDependencies) => ({
  now: dependencies?.now ?? Date.now,
  logInfo: dependencies?.logInfo ?? logInfo,
  logWarn: dependencies?.logWarn ?? logWarn,
  logError: dependencies?.logError ?? logError,
  recordRoute: dependencies?.recordRoute ?? recordRoute,
  recordPipelineLatency: dependencies?.recordPipelineLatency ?? recordPipelineLatency,
  recordErrorRate: dependencies?.recordErrorRate ?? recordErrorRate,
  retriever: dependencies?.retriever
});

/**
 * Turns a user query into a prompt for the downstream generator. The pipeline
 * never calls the final generation itself and, past option validation, always
 * resolves with a usable prompt.
 */
export class RagPipeline {
  private readonly options: RagPipelineOptions;
  private readonly dependencies: ReturnType<typeof resolveDependencies>;

  constructor(options: RagPipelineOptions, dependencies?: RagPipelineDependencies) {
    this.options = options;
    this.dependencies = resolveDependencies(dependencies);
  }

  async answerQuery(input: AnswerQueryInput): Promise<PipelineResult> {
    const options = parseAnswerQueryOptions(input);
    const model = options.model ?? this.options.defaultModel;
    const startedAt = this.dependencies.now();
    const ledger = new TokenLedger();

    if (!options.useRag) {
      return this.complete(
        options.requestId,
        null,
        model,
        { route: "no_rag", promptText: buildNoRagPrompt(options.query) },
        0,
        startedAt,
        false
      );
    }

    const deadline = options.deadlineMs === undefined ? null : startDeadline(options.deadlineMs);
    try {
      const work = this.runRoutes(options, ledger, deadline?.signal);
      const outcome = deadline ? await Promise.race([work, deadline.elapsed.then(() => null)]) : await work;

      if (outcome === null || deadline?.signal.aborted) {
        this.dependencies.logWarn(
          "pipeline.deadline.exceeded",
          { requestId: options.requestId ?? null },
          { deadline_ms: options.deadlineMs, total_tokens: ledger.total }
        );
        return this.complete(
          options.requestId,
          options.retrieval,
          model,
          { route: "undefined", promptText: buildGeneralKnowledgePrompt(options.query) },
          ledger.total,
          startedAt,
          true
        );
      }

      return this.complete(options.requestId, options.retrieval, model, outcome, ledger.total, startedAt, false);
    } finally {
      deadline?.dispose();
    }
  }

  private complete(
    requestId: string | undefined,
    retrieval: RetrievalConfig | null,
    model: string,
    outcome: BranchOutcome,
    totalTokens: number,
    startedAt: number,
    deadlineExceeded: boolean
  ): PipelineResult {
    const latencyMs = this.dependencies.now() - startedAt;
    this.dependencies.recordRoute(outcome.route);
    this.dependencies.recordPipelineLatency(latencyMs);
    this.dependencies.logInfo(
      "pipeline.answer.complete",
      { requestId: requestId ?? null, route: outcome.route },
      {
        model,
        total_tokens: totalTokens,
        latency_ms: latencyMs,
        retriever_type: retrieval?.retrieverType ?? null,
        simplified: retrieval?.simplified ?? null,
        deadline_exceeded: deadlineExceeded
      }
    );

    return {
      promptText: outcome.promptText,
      model,
      totalTokens,
      route: outcome.route,
      generation: { role: "user", maxTokens: DEFAULT_MAX_TOKENS }
    };
  }

  private async runRoutes(
    options: RagQueryOptions,
    ledger: TokenLedger,
    signal: AbortSignal | undefined
  ): Promise<BranchOutcome> {
    try {
      const decision = await this.decideRoute(options, ledger, signal);
      switch (decision.kind) {
        case "faq":
          return { route: "faq", promptText: await this.answerFromKnowledgeBase(options, signal) };
        case "product":
          return { route: "product", promptText: await this.answerFromCatalog(options, ledger, signal) };
        case "undefined":
          return { route: "undefined", promptText: buildGeneralKnowledgePrompt(options.query) };
        default:
          return assertNever(decision);
      }
    } catch (error) {
      this.dependencies.recordErrorRate("pipeline.unexpected");
      this.dependencies.logError(
        "pipeline.answer.failed",
        { requestId: options.requestId ?? null },
        serializeError(error)
      );
      return { route: "undefined", promptText: buildGeneralKnowledgePrompt(options.query) };
    }
  }

  private async decideRoute(
    options: RagQueryOptions,
    ledger: TokenLedger,
    signal: AbortSignal | undefined
  ): Promise<RouteDecision> {
    try {
      const { label, totalTokens } = await this.options.router.classify(
        options.query,
        options.retrieval.simplified,
        signal
      );
      ledger.add(totalTokens);
      return toDecision(label);
    } catch (error) {
      this.dependencies.recordErrorRate("pipeline.route");
      this.dependencies.logWarn(
        "pipeline.route.failed",
        { requestId: options.requestId ?? null },
        serializeError(error)
      );
      return { kind: "undefined", reason: "router_failed" };
    }
  }

  private async answerFromKnowledgeBase(options: RagQueryOptions, signal: AbortSignal | undefined): Promise<string> {
    const { query, retrieval } = options;
    if (!retrieval.simplified) {
      return buildFullFaqPrompt(query, formatKnowledgeBaseLayout(this.options.knowledgeBase));
    }

    const retriever = new SemanticRetriever(this.options.faqBackend, this.dependencies.retriever);
    const results = await retriever.retrieve(query, retrieval.topK, {
      route: "faq",
      simplified: true,
      requestId: options.requestId,
      signal
    });
    // Most relevant entry ends up closest to the question.
    const records = results.map((result) => toKnowledgeBaseRecord(result.properties)).reverse();
    return buildRelevantFaqPrompt(query, formatKnowledgeBaseLayout(records));
  }

  private async answerFromCatalog(
    options: RagQueryOptions,
    ledger: TokenLedger,
    signal: AbortSignal | undefined
  ): Promise<string> {
    const { query, retrieval, requestId } = options;
    try {
      let filters: FilterPredicate[] | null = null;
      if (retrieval.retrieverType !== "bm25" && !retrieval.simplified) {
        const { filterSpec, totalTokens } = await this.options.filterExtractor.extract(query, { signal, requestId });
        ledger.add(totalTokens);
        filters = filterSpec ? toFilterPredicates(filterSpec) : null;
      }

      const retriever = createRetriever(retrieval.retrieverType, this.options.productBackend, this.dependencies.retriever);
      let results = await retriever.retrieve(query, retrieval.topK, {
        route: "product",
        simplified: retrieval.simplified,
        filters,
        alpha: retrieval.alpha,
        k: retrieval.k,
        requestId,
        signal
      });

      if (retrieval.useReranker && results.length > 0) {
        results = await this.options.reranker.rerank(query, results, retrieval.topK, {
          rerankQuery: retrieval.rerankQuery,
          requestId,
          signal
        });
      }

      return buildProductPrompt(query, formatProductLayout(results.map((result) => result.properties)));
    } catch (error) {
      this.dependencies.recordErrorRate("pipeline.product");
      this.dependencies.logError(
        "pipeline.product.failed",
        { requestId: requestId ?? null, route: "product" },
        serializeError(error)
      );
      return buildRephraseRequestPrompt(query);
    }
  }
}
