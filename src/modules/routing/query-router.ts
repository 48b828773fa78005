import { buildQueryRouterPrompt } from "../../prompts/index.js";
import type { TextGenerator } from "../llm/text-generator.js";

export type QueryLabel = "FAQ" | "Product" | "Undefined";

export interface Classification {
  label: QueryLabel;
  totalTokens: number;
}

export interface QueryRouterOptions {
  generator: TextGenerator;
  model: string;
}

const ROUTER_MAX_TOKENS = 10;

/**
 * Maps free-form model output to a label. Output mentioning both labels, or
 * neither, is ambiguous.
 */
export const normalizeRouterLabel = (raw: string): QueryLabel => {
  const normalized = raw.toLowerCase();
  const mentionsFaq = normalized.includes("faq");
  const mentionsProduct = normalized.includes("product");

  if (mentionsFaq && !mentionsProduct) {
    return "FAQ";
  }
  if (mentionsProduct && !mentionsFaq) {
    return "Product";
  }
  return "Undefined";
};

export class QueryRouter {
  private readonly generator: TextGenerator;
  private readonly model: string;

  constructor(options: QueryRouterOptions) {
    this.generator = options.generator;
    this.model = options.model;
  }

  async classify(query: string, simplified: boolean, signal?: AbortSignal): Promise<Classification> {
    const { content, totalTokens } = await this.generator.generate({
      model: this.model,
      prompt: buildQueryRouterPrompt(query, simplified),
      temperature: 0,
      maxTokens: ROUTER_MAX_TOKENS,
      signal
    });

    return { label: normalizeRouterLabel(content), totalTokens };
  }
}
