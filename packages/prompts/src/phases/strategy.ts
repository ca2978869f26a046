// Marketing Strategy: positioning, messaging and channel plan for the product
import { requireOutput } from "../outputs.js";
import type { PhaseOutputs } from "../schemas.js";

export function system(productName: string): string {
  return `
You are a marketing strategist.
Create a marketing strategy for: ${productName}

Include:
- Positioning statement
- Value proposition
- Key messaging pillars
- Channels to target
- Pricing strategy
- Brand voice direction

Limit to 200 words.
`.trim();
}

export function user(outputs: PhaseOutputs): string {
  return [
    "Market Research:",
    requireOutput(outputs, "market_research"),
    "",
    "Customer Insights:",
    requireOutput(outputs, "customer_analysis"),
  ].join("\n");
}
