import { z } from "zod";

/** Shared enums */
export const PhaseKeyEnum = z.enum([
  "market_research",
  "customer_analysis",
  "strategy",
  "campaigns",
  "quality",
]);
export type PhaseKey = z.infer<typeof PhaseKeyEnum>;

export type ChatRole = "system" | "user" | "assistant";

export type ChatMessage = {
  role: ChatRole;
  content: string;
};

/** Sampling knobs a phase sends with its single request */
export const GenerationSettingsSchema = z.object({
  temperature: z.number().min(0).max(2),
  maxTokens: z.number().int().positive(),
});
export type GenerationSettings = Readonly<z.infer<typeof GenerationSettingsSchema>>;

/**
 * Accumulated phase text, in the order phases completed.
 * Each phase hands the next one a fresh map; nothing writes into an existing one.
 */
export type PhaseOutputs = ReadonlyMap<PhaseKey, string>;
