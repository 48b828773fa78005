export type ProductRecord = {
  product_id: number;
  productDisplayName: string;
  gender: string;
  masterCategory: string;
  subCategory: string;
  articleType: string;
  baseColour: string;
  season: string;
  year: number;
  usage: string;
  price: number;
};

export type KnowledgeBaseRecord = {
  question: string;
  answer: string;
  category: string;
};

export type FilterCatalog = Readonly<Record<string, readonly string[]>>;
