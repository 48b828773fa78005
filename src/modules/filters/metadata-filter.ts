import { z } from "zod";
import { logWarn } from "../../observability/logger.js";
import { buildMetadataFilterPrompt } from "../../prompts/index.js";
import type { TextGenerator } from "../llm/text-generator.js";
import {
  FILTERABLE_TEXT_FIELDS,
  type FilterPredicate,
  type FilterSpec,
  type PriceRange
} from "../rag/types.js";

const EXTRACTOR_MAX_TOKENS = 1500;

// Open bounds come back as 0 / "inf"; numeric strings are accepted too.
const priceBoundSchema = z.union([
  z.number(),
  z
    .string()
    .trim()
    .transform((value) => (/^\+?inf(inity)?$/i.test(value) ? Number.POSITIVE_INFINITY : Number(value)))
]);

const priceRangeSchema = z.object({
  min: priceBoundSchema,
  max: priceBoundSchema
});

const textValuesSchema = z.union([z.string(), z.array(z.unknown())]).transform((value) =>
  (Array.isArray(value) ? value : [value]).filter(
    (item): item is string => typeof item === "string" && item.trim().length > 0
  )
);

export const sanitizeFilterOutput = (raw: string): string =>
  raw.replace(/\n/g, "").replace(/'/g, "").replace(/}}/g, "}").replace(/{{/g, "{");

export const parseFilterOutput = (raw: string): unknown => {
  try {
    const parsed: unknown = JSON.parse(sanitizeFilterOutput(raw));
    return parsed;
  } catch {
    return null;
  }
};

const normalizePriceRange = (value: unknown): PriceRange | undefined => {
  const parsed = priceRangeSchema.safeParse(value);
  if (!parsed.success) {
    return undefined;
  }
  const { min, max } = parsed.data;
  // A zero minimum is the "no lower bound" marker and drops the whole range.
  if (!(min > 0) || !Number.isFinite(max)) {
    return undefined;
  }
  return { min, max };
};

/**
 * Keeps the whitelisted fields of decoded extractor output. Returns null when
 * the value is not a JSON object.
 */
export const normalizeFilterSpec = (value: unknown): FilterSpec | null => {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return null;
  }

  const source = new Map<string, unknown>(Object.entries(value));
  const spec: FilterSpec = {};

  for (const field of FILTERABLE_TEXT_FIELDS) {
    const parsed = textValuesSchema.safeParse(source.get(field));
    if (parsed.success && parsed.data.length > 0) {
      spec[field] = parsed.data;
    }
  }

  const price = normalizePriceRange(source.get("price"));
  if (price) {
    spec.price = price;
  }

  return spec;
};

export const toFilterPredicates = (spec: FilterSpec): FilterPredicate[] => {
  const predicates: FilterPredicate[] = [];

  for (const field of FILTERABLE_TEXT_FIELDS) {
    const values = spec[field];
    if (values && values.length > 0) {
      predicates.push({ kind: "any_of", field, values: [...values] });
    }
  }

  if (spec.price) {
    predicates.push({ kind: "greater_than", field: "price", value: spec.price.min });
    predicates.push({ kind: "less_than", field: "price", value: spec.price.max });
  }

  return predicates;
};

export interface FilterExtraction {
  filterSpec: FilterSpec | null;
  totalTokens: number;
}

export interface ExtractOptions {
  signal?: AbortSignal;
  requestId?: string;
}

export interface MetadataFilterExtractorOptions {
  generator: TextGenerator;
  model: string;
  catalogDescription: string;
  logWarn?: typeof logWarn;
}

export class MetadataFilterExtractor {
  private readonly generator: TextGenerator;
  private readonly model: string;
  private readonly catalogDescription: string;
  private readonly logWarn: typeof logWarn;

  constructor(options: MetadataFilterExtractorOptions) {
    this.generator = options.generator;
    this.model = options.model;
    this.catalogDescription = options.catalogDescription;
    this.logWarn = options.logWarn ?? logWarn;
  }

  async extract(query: string, options?: ExtractOptions): Promise<FilterExtraction> {
    const { content, totalTokens } = await this.generator.generate({
      model: this.model,
      prompt: buildMetadataFilterPrompt(query, this.catalogDescription),
      temperature: 0,
      maxTokens: EXTRACTOR_MAX_TOKENS,
      signal: options?.signal
    });

    const filterSpec = normalizeFilterSpec(parseFilterOutput(content));
    if (!filterSpec) {
      this.logWarn(
        "filters.extract.parse_failed",
        { requestId: options?.requestId ?? null, route: "product" },
        { raw_output: content.slice(0, 500), total_tokens: totalTokens }
      );
    }

    return { filterSpec, totalTokens };
  }
}
