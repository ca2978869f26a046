// /apps/backend/src/lib/ai.ts
import { createOpenAI } from '@ai-sdk/openai'
import { APICallError, generateText, type LanguageModel } from 'ai'
import type { AppConfig } from './config.js'
import { GenerationServiceError, describeError, kindFromStatus } from './errors.js'
import type { GenerationRequest, GenerationService, Logger } from './generation.js'

export type ModelFactory = (modelId: string) => LanguageModel

/**
 * OpenAI-compatible provider for the Vercel AI SDK, pointed at the configured base URL.
 */
export function createModelFactory(config: AppConfig): ModelFactory {
  const provider = createOpenAI({
    apiKey: config.apiKey,
    baseURL: config.apiBase,
  })
  return (modelId) => provider(modelId)
}

/**
 * Same contract as the chat-completions service, routed through `generateText`.
 * The SDK retries twice by default; that is overridden with the configured count.
 */
export class AiSdkGenerationService implements GenerationService {
  private readonly model: ModelFactory
  private readonly timeoutMs: number
  private readonly maxRetries: number
  private readonly logger: Logger

  constructor(opts: { model: ModelFactory; timeoutMs: number; maxRetries?: number; logger?: Logger }) {
    this.model = opts.model
    this.timeoutMs = opts.timeoutMs
    this.maxRetries = opts.maxRetries ?? 0
    this.logger = opts.logger ?? console
  }

  static fromConfig(config: AppConfig, logger: Logger = console): AiSdkGenerationService {
    return new AiSdkGenerationService({
      model: createModelFactory(config),
      timeoutMs: config.timeoutMs,
      maxRetries: config.maxRetries,
      logger,
    })
  }

  async generate(request: GenerationRequest): Promise<string> {
    const { model, temperature, maxTokens, messages, meta = {} } = request
    const start = Date.now()
    this.logger.info(JSON.stringify({
      type: 'llm.request',
      provider: 'ai-sdk',
      model,
      temperature,
      max_output_tokens: maxTokens,
      meta,
    }))

    try {
      const result = await generateText({
        model: this.model(model),
        messages,
        temperature,
        maxTokens,
        maxRetries: this.maxRetries,
        abortSignal: AbortSignal.timeout(this.timeoutMs),
      })
      this.logger.info(JSON.stringify({
        type: 'llm.response',
        provider: 'ai-sdk',
        model,
        duration_ms: Date.now() - start,
        meta,
        usage: result.usage,
        finish_reason: result.finishReason,
      }))
      return result.text.trim()
    } catch (err) {
      const status = APICallError.isInstance(err) ? err.statusCode : undefined
      const timedOut = err instanceof Error && (err.name === 'TimeoutError' || err.name === 'AbortError')
      this.logger.error(JSON.stringify({
        type: 'llm.error',
        provider: 'ai-sdk',
        model,
        duration_ms: Date.now() - start,
        meta,
        status: status ?? null,
        error: describeError(err),
      }))
      throw new GenerationServiceError(`Generation request failed: ${describeError(err)}`, {
        kind: timedOut ? 'timeout' : kindFromStatus(status),
        status,
        cause: err,
      })
    }
  }
}
