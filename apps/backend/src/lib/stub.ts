// apps/backend/src/lib/stub.ts
import type { GenerationRequest, GenerationService, Logger } from './generation.js'

/**
 * Offline stand-in selected by STRATEGY_FAKE_RUNS=true. Output depends only on the
 * request, so repeated runs produce the same document.
 */
export class StubGenerationService implements GenerationService {
  constructor(private readonly logger: Logger = console) {}

  async generate(request: GenerationRequest): Promise<string> {
    const scope = String(request.meta?.scope ?? 'chat')
    const systemLine =
      request.messages.find((m) => m.role === 'system')?.content.split('\n')[0]?.trim() ?? ''
    this.logger.info(JSON.stringify({ type: 'llm.stub', scope, model: request.model }))
    return `[stub:${scope}] ${systemLine}`.trim()
  }
}
