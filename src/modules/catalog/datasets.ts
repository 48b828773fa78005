import fs from "node:fs/promises";
import { z } from "zod";
import type { KnowledgeBaseRecord, ProductRecord } from "./types.js";

export const PRODUCTS_FILE_NAME = "products.json";
export const KNOWLEDGE_BASE_FILE_NAME = "faq.json";

export class DatasetLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "DatasetLoadError";
  }
}

const textField = z
  .string()
  .nullable()
  .transform((value) => value ?? "");

export const productRecordSchema = z.object({
  product_id: z.coerce.number().int(),
  productDisplayName: z.string().min(1),
  gender: textField,
  masterCategory: textField,
  subCategory: textField,
  articleType: textField,
  baseColour: textField,
  season: textField,
  // Missing years are stored as 0 in the search backend.
  year: z
    .number()
    .nullable()
    .transform((value) => (value === null || Number.isNaN(value) ? 0 : value)),
  usage: textField,
  price: z.number().nonnegative()
});

export const knowledgeBaseRecordSchema = z
  .object({
    question: z.string().min(1),
    answer: z.string().min(1),
    category: z.string().optional(),
    type: z.string().optional()
  })
  .transform(({ question, answer, category, type }): KnowledgeBaseRecord => ({
    question,
    answer,
    category: category ?? type ?? "general information"
  }));

type ReadTextFile = (filePath: string, encoding: "utf8") => Promise<string>;

const readJsonArray = async (filePath: string, readFile: ReadTextFile): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    throw new DatasetLoadError(`Dataset file could not be read: ${filePath}`, { cause: error });
  }

  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new DatasetLoadError(`Dataset file is not valid JSON: ${filePath}`, { cause: error });
  }
};

const parseRecords = <T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown, filePath: string): T[] => {
  const parsed = z.array(schema).safeParse(value);
  if (!parsed.success) {
    const details = parsed.error.issues
      .slice(0, 5)
      .map((issue) => `- ${issue.path.join(".") || "root"}: ${issue.message}`)
      .join("\n");
    throw new DatasetLoadError(`Dataset file has invalid records: ${filePath}\n${details}`);
  }
  return parsed.data;
};

export interface DatasetDependencies {
  readFile?: ReadTextFile;
}

export const loadProducts = async (
  filePath: string,
  dependencies?: DatasetDependencies
): Promise<readonly ProductRecord[]> => {
  const value = await readJsonArray(filePath, dependencies?.readFile ?? fs.readFile);
  return Object.freeze(parseRecords(productRecordSchema, value, filePath));
};

export const loadKnowledgeBase = async (
  filePath: string,
  dependencies?: DatasetDependencies
): Promise<readonly KnowledgeBaseRecord[]> => {
  const value = await readJsonArray(filePath, dependencies?.readFile ?? fs.readFile);
  return Object.freeze(parseRecords(knowledgeBaseRecordSchema, value, filePath).map((record) => Object.freeze(record)));
};
