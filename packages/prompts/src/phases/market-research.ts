// Market Research: senior analyst scanning the competitive set
// Exports: `system(productName)` and `user()`
export function system(productName: string): string {
  return `
You are a senior market research analyst.
Analyze the wearable technology market for the product: ${productName}.

Provide:
- Top 3 competitors
- Their positioning
- Pricing
- Key features
- Market trends
Limit to 150–200 words.
`.trim();
}

/** Opening phase: nothing upstream to quote. */
export function user(): string {
  return "Provide competitor analysis.";
}
