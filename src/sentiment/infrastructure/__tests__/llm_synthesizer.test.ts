import { LlmOutlookSynthesizer } from "@src/sentiment/infrastructure/llm_synthesizer";
import { createFakeAiClient } from "@src/sentiment/__tests__/helpers";

describe("LlmOutlookSynthesizer", () => {
  it("summarizes the classified articles", async () => {
    const ai = createFakeAiClient({
      respond: () => ({
        overall_summary: "Demand is strong but supply is tight.",
        final_sentiment: "Bullish",
        recommendation: "BUY",
        major_risks: ["Supply constraints", "Regulatory scrutiny"],
      }),
    });
    const synthesizer = new LlmOutlookSynthesizer(ai);

    const outlook = await synthesizer.synthesize({
      ticker: "NVDA",
      articles: [
        {
          headline: "Chip demand soars",
          score: 9,
          category: "POSITIVE",
          reason: "Orders doubled",
        },
        {
          headline: "Export rules tighten",
          score: 3,
          category: "NEGATIVE",
          reason: "Sales limits",
        },
      ],
    });

    expect(outlook).toEqual({
      summary: "Demand is strong but supply is tight.",
      finalSentiment: "Bullish",
      recommendation: "BUY",
      majorRisks: ["Supply constraints", "Regulatory scrutiny"],
    });
    const prompt = ai.prompts[0];
    expect(prompt).toContain(
      "Synthesize the following sentiment results for the stock NVDA."
    );
    expect(prompt).toContain(
      "- Score 9/10 (POSITIVE): Orders doubled (Source: Chip demand soars)"
    );
    expect(prompt).toContain(
      "- Score 3/10 (NEGATIVE): Sales limits (Source: Export rules tighten)"
    );
  });

  it("defaults missing risks to an empty list", async () => {
    const ai = createFakeAiClient({
      respond: () => ({
        overall_summary: "Quiet week.",
        final_sentiment: "Neutral",
        recommendation: "HOLD",
      }),
    });
    const synthesizer = new LlmOutlookSynthesizer(ai);

    const outlook = await synthesizer.synthesize({
      ticker: "AAPL",
      articles: [],
    });

    expect(outlook.majorRisks).toEqual([]);
  });
});
