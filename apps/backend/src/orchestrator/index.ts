// apps/backend/src/orchestrator/index.ts
// Central export barrel.

export { PipelineRunner, type PipelineRunnerOptions } from './pipeline.js';
export { PHASES, phaseTitle, type PhaseDescriptor } from './phases.js';
export {
  renderMarkdown,
  toEntries,
  toRecord,
  type PhaseEntry,
  type PipelineResult,
  type Print,
} from './report.js';

export { loadConfig, validateConfig, assertConfig, type AppConfig } from '../lib/config.js';
export { ConfigurationError, GenerationServiceError, PhaseOrderError } from '../lib/errors.js';
export type { GenerationRequest, GenerationService } from '../lib/generation.js';
export { createGenerationService } from '../lib/services.js';
