// ESM + NodeNext: include .js on local imports
export {
  PhaseKeyEnum,
  GenerationSettingsSchema,
} from "./schemas.js";

export type {
  PhaseKey,
  ChatRole,
  ChatMessage,
  GenerationSettings,
  PhaseOutputs,
} from "./schemas.js";

export { requireOutput, appendOutput, MissingPhaseOutputError } from "./outputs.js";

export * as marketResearch from "./phases/market-research.js";
export * as customerAnalysis from "./phases/customer-analysis.js";
export * as strategy from "./phases/strategy.js";
export * as campaigns from "./phases/campaigns.js";
export * as quality from "./phases/quality.js";
