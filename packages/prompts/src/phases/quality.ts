// Quality Review: editor pass that folds every section into one executive summary
import { requireOutput } from "../outputs.js";
import type { PhaseOutputs } from "../schemas.js";

export function system(): string {
  return `
You are a quality editor. Improve clarity, flow, and formatting.
Combine all sections into a polished executive summary.
Max 250 words.
`.trim();
}

const SECTIONS = [
  ["Market Research", "market_research"],
  ["Customer Insights", "customer_analysis"],
  ["Marketing Strategy", "strategy"],
  ["Campaigns", "campaigns"],
] as const;

export function user(outputs: PhaseOutputs): string {
  return SECTIONS.map(([label, key]) => `${label}:\n${requireOutput(outputs, key)}`).join("\n\n");
}
