// Customer Insights: consumer behaviour read of the market research
import { requireOutput } from "../outputs.js";
import type { PhaseOutputs } from "../schemas.js";

export function system(): string {
  return `
You are a consumer behavior expert.
Based on the market research, identify:

- Target customer segments
- User pain points
- Motivations
- Purchase triggers
- Unmet needs

Limit to 150 words.
`.trim();
}

export function user(outputs: PhaseOutputs): string {
  const research = requireOutput(outputs, "market_research");
  return `Here is the market research:\n${research}\n\nAnalyze customers.`;
}
