// Campaign Design: three executions built off the strategy alone
import { requireOutput } from "../outputs.js";
import type { PhaseOutputs } from "../schemas.js";

export function system(): string {
  return `
You are a creative campaign director.
Design 3 marketing campaigns:

1. Digital campaign
2. Influencer campaign
3. Content/SEO campaign

Include:
- Goal
- Target channels
- Creative concept
- KPIs
Keep each campaign short and crisp.
`.trim();
}

export function user(outputs: PhaseOutputs): string {
  const strategy = requireOutput(outputs, "strategy");
  return `Based on the marketing strategy:\n\n${strategy}\n\nGenerate the 3 campaigns.`;
}
