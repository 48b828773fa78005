import { getOpenAIClient } from "../../clients/openai.js";
import { config, resolveDataPath } from "../../config/index.js";
import {
  KNOWLEDGE_BASE_FILE_NAME,
  PRODUCTS_FILE_NAME,
  type DatasetDependencies,
  loadKnowledgeBase,
  loadProducts
} from "../catalog/datasets.js";
import { buildFilterCatalog, describeFilterCatalog } from "../catalog/filter-catalog.js";
import { MetadataFilterExtractor } from "../filters/metadata-filter.js";
import { OpenAITextGenerator, type TextGenerator } from "../llm/text-generator.js";
import { type CrossEncoder, CrossEncoderCapability, createOpenAICrossEncoder } from "../rag/cross-encoder.js";
import { Reranker } from "../rag/reranker.js";
import { createOpenAIEmbedder, createVectorStoreSearchBackend } from "../rag/search-backend.js";
import type { SearchBackend } from "../rag/types.js";
import { QueryRouter } from "../routing/query-router.js";
import { RagPipeline, type RagPipelineDependencies } from "./pipeline-orchestrator.js";

export const PRODUCT_TEXT_FIELDS = [
  "productDisplayName",
  "gender",
  "masterCategory",
  "subCategory",
  "articleType",
  "baseColour",
  "season",
  "usage"
] as const;

export const KNOWLEDGE_BASE_TEXT_FIELDS = ["question", "answer", "category"] as const;

export interface CreatePipelineOptions {
  dataDir?: string;
  datasets?: DatasetDependencies;
  generator?: TextGenerator;
  productBackend?: SearchBackend;
  faqBackend?: SearchBackend;
  loadCrossEncoder?: () => Promise<CrossEncoder>;
  rerankerEnabled?: boolean;
  defaultModel?: string;
  dependencies?: RagPipelineDependencies;
}

const loadDefaultCrossEncoder = async (): Promise<CrossEncoder> => {
  await getOpenAIClient();
  return createOpenAICrossEncoder({ model: config.OPENAI_RERANK_MODEL });
};

export const createPipeline = async (options: CreatePipelineOptions = {}): Promise<RagPipeline> => {
  const dataDir = options.dataDir ?? config.DATA_DIR;
  const [products, knowledgeBase] = await Promise.all([
    loadProducts(resolveDataPath(PRODUCTS_FILE_NAME, dataDir), options.datasets),
    loadKnowledgeBase(resolveDataPath(KNOWLEDGE_BASE_FILE_NAME, dataDir), options.datasets)
  ]);
  const catalog = buildFilterCatalog(products);

  const model = options.defaultModel ?? config.OPENAI_MODEL;
  const generator = options.generator ?? new OpenAITextGenerator();
  const embed = createOpenAIEmbedder(config.OPENAI_EMBEDDING_MODEL);

  const productBackend =
    options.productBackend ??
    createVectorStoreSearchBackend({
      collection: config.QDRANT_PRODUCTS_COLLECTION,
      textFields: PRODUCT_TEXT_FIELDS,
      embed
    });
  const faqBackend =
    options.faqBackend ??
    createVectorStoreSearchBackend({
      collection: config.QDRANT_FAQ_COLLECTION,
      textFields: KNOWLEDGE_BASE_TEXT_FIELDS,
      embed
    });

  const crossEncoder = new CrossEncoderCapability({
    enabled: options.rerankerEnabled ?? config.RERANKER_ENABLED,
    load: options.loadCrossEncoder ?? loadDefaultCrossEncoder
  });

  return new RagPipeline(
    {
      router: new QueryRouter({ generator, model }),
      filterExtractor: new MetadataFilterExtractor({
        generator,
        model,
        catalogDescription: describeFilterCatalog(catalog)
      }),
      reranker: new Reranker(crossEncoder),
      productBackend,
      faqBackend,
      knowledgeBase,
      defaultModel: model
    },
    options.dependencies
  );
};
