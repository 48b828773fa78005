import type { KnowledgeBaseRecord } from "../modules/catalog/types.js";

export const QUERY_ROUTER_PROMPT_HEADER = [
  "Label the following instruction as an FAQ related answer or a product related answer for a clothing store.",
  "Product related answers are answers specific about product information or that needs to use the products to give an answer.",
  "Examples:",
  "Is there a refund for incorrectly bought clothes? Label: FAQ",
  "Where are your stores located?: Label: FAQ",
  "Tell me about the cheapest T-shirts that you have. Label: Product",
  "Do you have blue T-shirts under 100 dollars? Label: Product",
  "What are the available sizes for the t-shirts? Label: FAQ",
  "How can I contact you via phone? Label: FAQ",
  "How can I find the promotions? Label: FAQ",
  "Give me ideas for a sunny look. Label: Product",
  "Return only one of the two labels: FAQ or Product, nothing more."
].join("\n");

export const COMPACT_QUERY_ROUTER_PROMPT_HEADER = [
  "Label the query as FAQ or Product for a clothing store.",
  "",
  "FAQ: store info, policies (refund/return), contact/support, promotions/newsletter, account, sizes.",
  "Product: asks for items or recommendations using catalog (color/type/price/availability) or outfit/look ideas.",
  "",
  "Examples: refund→FAQ; store location→FAQ; sizes→FAQ; contact/support→FAQ; promotions→FAQ;",
  "cheapest T-shirts→Product; blue T-shirts under $100→Product; sunny look ideas→Product.",
  "",
  "Return only: FAQ or Product."
].join("\n");

export const buildQueryRouterPrompt = (query: string, simplified: boolean): string =>
  simplified
    ? `${COMPACT_QUERY_ROUTER_PROMPT_HEADER}\nQuery: ${query}\n`
    : `${QUERY_ROUTER_PROMPT_HEADER}\nQuery to classify: ${query}\n`;

const METADATA_EXAMPLE_JSON = [
  "{",
  '"gender": ["Women"],',
  '"masterCategory": ["Apparel"],',
  '"articleType": ["Dresses"],',
  '"baseColour": ["Blue"],',
  '"price": {"min": 0, "max": "inf"},',
  '"usage": ["Formal"],',
  '"season": ["All seasons"]',
  "}"
].join("\n");

/**
 * Prompt for the filter extractor. `catalogValues` is the serialized
 * FilterCatalog, which bounds the values the model may pick from.
 */
export const buildMetadataFilterPrompt = (query: string, catalogValues: string): string =>
  [
    "One query will be provided. For the given query, there will be a call on vector database to query relevant cloth items.",
    `Generate a JSON with useful metadata to filter the products in the query. Possible values for each feature is in the following json: ${catalogValues}`,
    "",
    "Provide a JSON with the features that best fit in the query (can be more than one, write in a list). Also, if present, add a price key, saying if there is a price range (between values, greater than or smaller than some value).",
    'Only return the JSON, nothing more. price key must be a json with "min" and "max" values (0 if no lower bound and inf if no upper bound).',
    "Always include gender, masterCategory, articleType, baseColour, price, usage and season as keys. All values must be within lists.",
    "If there is no price set, add min = 0 and max = inf.",
    "Only include values that are given in the json above.",
    "",
    "Example of expected JSON:",
    "",
    METADATA_EXAMPLE_JSON,
    "",
    `Query: ${query}`
  ].join("\n");

export const formatKnowledgeBaseLayout = (records: readonly KnowledgeBaseRecord[]): string =>
  records
    .map((record) => `Question: ${record.question} Answer: ${record.answer} Type: ${record.category}\n`)
    .join("");

export const buildFullFaqPrompt = (query: string, layout: string): string =>
  [
    "You will be provided with an FAQ for a clothing store.",
    "Answer the instruction based on it. You might use more than one question and answer to make your answer. Only answer the question and do not mention that you have access to a FAQ.",
    "<FAQ_ITEMS>",
    `PROVIDED FAQ: ${layout}`,
    "</FAQ_ITEMS>",
    `Question: ${query}`,
    ""
  ].join("\n");

export const buildRelevantFaqPrompt = (query: string, layout: string): string =>
  [
    [
      "You will be provided with a query for a clothing store regarding FAQ. It will be provided relevant FAQ from the clothing store.",
      "Answer the query based on the relevant FAQ provided. They are ordered in decreasing relevance, so the first is the most relevant FAQ and the last is the least relevant.",
      "Answer the instruction based on them. You might use more than one question and answer to make your answer. Only answer the question and do not mention that you have access to a FAQ."
    ].join(" "),
    "<FAQ>",
    "RELEVANT FAQ ITEMS:",
    layout,
    "</FAQ>",
    `Query: ${query}`
  ].join("\n");

const readProperty = (properties: Record<string, unknown>, key: string): string => {
  const value = properties[key];
  if (typeof value === "string" || typeof value === "number") {
    return String(value);
  }
  return "";
};

export const formatProductLayout = (products: ReadonlyArray<Record<string, unknown>>): string =>
  products
    .map(
      (properties, index) =>
        `${index + 1}. Product ID: ${readProperty(properties, "product_id")}. ` +
        `Product name: ${readProperty(properties, "productDisplayName")}. ` +
        `Product Color: ${readProperty(properties, "baseColour")}. ` +
        `Product Season: ${readProperty(properties, "season")}. ` +
        `Product Year: ${readProperty(properties, "year")}.\n`
    )
    .join("");

export const buildProductPrompt = (query: string, layout: string): string =>
  [
    "You are a helpful fashion assistant. You will be provided with a list of products from our catalog.",
    "Based on these products, answer the user's query. Provide specific product recommendations with their IDs and names.",
    "",
    "<PRODUCTS>",
    layout,
    "</PRODUCTS>",
    "",
    `User Query: ${query}`,
    "",
    "Provide helpful recommendations based on the available products above."
  ].join("\n");

export const buildNoRagPrompt = (query: string): string =>
  [
    "Answer the following question based on your general knowledge. Do not make up specific company policies or information.",
    "",
    `Question: ${query}`
  ].join("\n");

export const buildGeneralKnowledgePrompt = (query: string): string =>
  `Answer based on your general knowledge. Query: ${query}`;

export const buildRephraseRequestPrompt = (query: string): string =>
  `Error processing query. Please try rephrasing. Query: ${query}`;

export const CROSS_ENCODER_SYSTEM_PROMPT = [
  "You are a retrieval relevance scorer for a clothing store search engine.",
  "For each numbered document, rate how relevant it is to the paired query on a scale from 0 to 1.",
  "Return only valid JSON with a `scores` array holding one number per document, in the order given.",
  "Do not include any explanation or extra keys."
].join(" ");

export type CrossEncoderPromptPair = {
  query: string;
  document: string;
};

export const buildCrossEncoderUserPrompt = (pairs: readonly CrossEncoderPromptPair[]): string =>
  [
    `Documents to score: ${pairs.length}`,
    "",
    ...pairs.map(
      ({ query, document }, index) =>
        `[${index + 1}]\nquery: ${query}\ndocument: ${document.replace(/\s+/g, " ").trim()}`
    )
  ].join("\n\n");
