import { describe, expect, it, vi } from "vitest";
import type { TextGenerator } from "../../src/modules/llm/text-generator.js";
import { QueryRouter, normalizeRouterLabel } from "../../src/modules/routing/query-router.js";

const makeGenerator = (content: string, totalTokens = 57) => {
  const generate = vi.fn().mockResolvedValue({ content, totalTokens });
  const generator: TextGenerator = { generate };
  return { generator, generate };
};

describe("modules/routing/query-router", () => {
  it("labels knowledge base questions as FAQ", async () => {
    const { generator } = makeGenerator("FAQ");
    const router = new QueryRouter({ generator, model: "gpt-4o-mini" });

    await expect(router.classify("What is your return policy?", false)).resolves.toEqual({
      label: "FAQ",
      totalTokens: 57
    });
  });

  it("labels catalog searches as Product", async () => {
    const { generator } = makeGenerator("Label: Product");
    const router = new QueryRouter({ generator, model: "gpt-4o-mini" });

    await expect(router.classify("blue shirts under $50", false)).resolves.toEqual({
      label: "Product",
      totalTokens: 57
    });
  });

  it("reports Undefined with the call's token cost for unrecognized output", async () => {
    const { generator } = makeGenerator("I am not sure", 31);
    const router = new QueryRouter({ generator, model: "gpt-4o-mini" });

    await expect(router.classify("hello there", true)).resolves.toEqual({ label: "Undefined", totalTokens: 31 });
  });

  it("normalizes labels case-insensitively and treats both labels as ambiguous", () => {
    expect(normalizeRouterLabel("faq")).toBe("FAQ");
    expect(normalizeRouterLabel("PRODUCT.")).toBe("Product");
    expect(normalizeRouterLabel("FAQ or Product")).toBe("Undefined");
    expect(normalizeRouterLabel("")).toBe("Undefined");
  });

  it("makes one deterministic short call with the prompt matching the mode", async () => {
    const { generator, generate } = makeGenerator("FAQ");
    const router = new QueryRouter({ generator, model: "gpt-4o-mini" });

    await router.classify("Where are your stores located?", false);
    await router.classify("Where are your stores located?", true);

    expect(generate).toHaveBeenCalledTimes(2);
    const [full, compact] = generate.mock.calls.map(([request]) => request);
    expect(full).toMatchObject({ model: "gpt-4o-mini", temperature: 0, maxTokens: 10 });
    expect(full.prompt).toContain("Query to classify: Where are your stores located?");
    expect(compact.prompt).toContain("Return only: FAQ or Product.\nQuery: Where are your stores located?");
    expect(compact.prompt.length).toBeLessThan(full.prompt.length);
  });

  it("propagates generation failures", async () => {
    const generator: TextGenerator = { generate: vi.fn().mockRejectedValue(new Error("quota exceeded")) };
    const router = new QueryRouter({ generator, model: "gpt-4o-mini" });

    await expect(router.classify("anything", false)).rejects.toThrowError("quota exceeded");
  });
});
