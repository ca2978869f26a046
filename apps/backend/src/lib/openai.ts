// apps/backend/src/lib/openai.ts
import OpenAI from 'openai'
import type { ChatMessage } from '@strategy-chain/prompts'
import type { AppConfig } from './config.js'
import { GenerationServiceError, describeError, kindFromStatus } from './errors.js'
import type { GenerationRequest, GenerationService, Logger } from './generation.js'
import { isReasoningModel } from './models.js'

type CompletionBody = {
  model: string
  temperature: number
  messages: ChatMessage[]
  max_tokens?: number
  max_completion_tokens?: number
}

type CompletionContentPart = { text?: unknown; content?: unknown } | string | null

type CompletionLike = {
  choices?: Array<{ message?: { content?: string | CompletionContentPart[] | null } | null }>
  usage?: unknown
}

/** The slice of `openai.chat.completions` the service calls. */
export interface ChatCompletionsApi {
  create(body: CompletionBody): PromiseLike<CompletionLike>
}

export function createOpenAIClient(config: AppConfig): OpenAI {
  return new OpenAI({
    apiKey: config.apiKey,
    baseURL: config.apiBase,
    timeout: config.timeoutMs,
    maxRetries: config.maxRetries,
  })
}

function textFromPart(chunk: CompletionContentPart): string {
  if (!chunk) return ''
  if (typeof chunk === 'string') return chunk
  if (typeof chunk.text === 'string') return chunk.text
  if (Array.isArray(chunk.text)) return chunk.text.join('')
  if (typeof chunk.content === 'string') return chunk.content
  if (Array.isArray(chunk.content)) return chunk.content.join('')
  return ''
}

/** `null` when the completion carries no choice or no content at all; empty text is still text. */
export function extractContent(completion: CompletionLike): string | null {
  const rawContent = completion.choices?.[0]?.message?.content
  if (typeof rawContent === 'string') return rawContent.trim()
  if (Array.isArray(rawContent)) return rawContent.map(textFromPart).join('').trim()
  return null
}

function statusOf(err: unknown): number | undefined {
  if (err instanceof OpenAI.APIError) return err.status
  return undefined
}

export class OpenAIGenerationService implements GenerationService {
  private readonly completions: ChatCompletionsApi
  private readonly trace: boolean
  private readonly logger: Logger

  constructor(opts: { completions: ChatCompletionsApi; trace?: boolean; logger?: Logger }) {
    this.completions = opts.completions
    this.trace = opts.trace ?? false
    this.logger = opts.logger ?? console
  }

  static fromConfig(config: AppConfig, logger: Logger = console): OpenAIGenerationService {
    const client = createOpenAIClient(config)
    return new OpenAIGenerationService({ completions: client.chat.completions, trace: config.trace, logger })
  }

  async generate(request: GenerationRequest): Promise<string> {
    const { model, temperature, maxTokens, messages, meta = {} } = request

    const body: CompletionBody = { model, temperature, messages }
    if (isReasoningModel(model)) body.max_completion_tokens = maxTokens
    else body.max_tokens = maxTokens

    if (this.trace) {
      this.logger.log('[chat] model=%s temp=%s max=%s messages=%d', model, temperature, maxTokens, messages.length)
    }

    const start = Date.now()
    this.logger.info(JSON.stringify({
      type: 'llm.request',
      model,
      temperature,
      max_output_tokens: maxTokens,
      meta,
    }))

    let completion: CompletionLike
    try {
      completion = await this.completions.create(body)
    } catch (err) {
      const status = statusOf(err)
      const kind = err instanceof OpenAI.APIConnectionTimeoutError ? 'timeout' : kindFromStatus(status)
      this.logger.error(JSON.stringify({
        type: 'llm.error',
        model,
        duration_ms: Date.now() - start,
        meta,
        status: status ?? null,
        error: describeError(err),
      }))
      throw new GenerationServiceError(`Generation request failed: ${describeError(err)}`, {
        kind,
        status,
        cause: err,
      })
    }

    const out = extractContent(completion)
    if (this.trace) {
      this.logger.log('[chat] received %d chars', out?.length ?? 0)
    }
    this.logger.info(JSON.stringify({
      type: 'llm.response',
      model,
      duration_ms: Date.now() - start,
      meta,
      usage: completion.usage ?? null,
      choices: completion.choices?.length ?? 0,
    }))

    if (out === null) {
      throw new GenerationServiceError('Generation response contained no message content', { kind: 'malformed' })
    }
    return out
  }
}
