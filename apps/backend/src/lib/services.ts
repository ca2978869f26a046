// apps/backend/src/lib/services.ts
import { AiSdkGenerationService } from './ai.js'
import type { AppConfig } from './config.js'
import type { GenerationService, Logger } from './generation.js'
import { OpenAIGenerationService } from './openai.js'
import { StubGenerationService } from './stub.js'

export function createGenerationService(config: AppConfig, logger: Logger = console): GenerationService {
  if (config.fakeRuns) {
    if (config.trace) logger.log('[chat] FAKE RUN ENABLED — using stub service.')
    return new StubGenerationService(logger)
  }
  if (config.provider === 'ai-sdk') return AiSdkGenerationService.fromConfig(config, logger)
  return OpenAIGenerationService.fromConfig(config, logger)
}
