import { describe, it, expect, vi } from 'vitest'
import { APICallError } from 'ai'
import { MockLanguageModelV1 } from 'ai/test'
import { AiSdkGenerationService } from '../ai.js'
import { GenerationServiceError } from '../errors.js'
import type { GenerationRequest } from '../generation.js'

const request: GenerationRequest = {
  model: 'gpt-4o-mini',
  temperature: 0.7,
  maxTokens: 400,
  messages: [
    { role: 'system', content: 'You are a consumer behavior expert.' },
    { role: 'user', content: 'Here is the market research:\nR1\n\nAnalyze customers.' },
  ],
  meta: { scope: 'marketing.customer_analysis' },
}

const silentLogger = () => ({ log: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() })

describe('AiSdkGenerationService', () => {
  it('forwards sampling settings and returns trimmed text', async () => {
    const seen: Array<{ maxTokens?: number; temperature?: number }> = []
    const modelIds: string[] = []
    const model = new MockLanguageModelV1({
      doGenerate: async (options) => {
        seen.push(options)
        return {
          rawCall: { rawPrompt: null, rawSettings: {} },
          finishReason: 'stop',
          usage: { promptTokens: 12, completionTokens: 34 },
          text: '  Segments: busy parents.  ',
        }
      },
    })
    const service = new AiSdkGenerationService({
      model: (id) => {
        modelIds.push(id)
        return model
      },
      timeoutMs: 5_000,
      logger: silentLogger(),
    })

    await expect(service.generate(request)).resolves.toBe('Segments: busy parents.')
    expect(modelIds).toEqual(['gpt-4o-mini'])
    expect(seen).toHaveLength(1)
    expect(seen[0].maxTokens).toBe(400)
    expect(seen[0].temperature).toBe(0.7)
  })

  it('returns an empty generation as an empty string', async () => {
    const model = new MockLanguageModelV1({
      doGenerate: async () => ({
        rawCall: { rawPrompt: null, rawSettings: {} },
        finishReason: 'stop',
        usage: { promptTokens: 1, completionTokens: 0 },
        text: '',
      }),
    })
    const service = new AiSdkGenerationService({ model: () => model, timeoutMs: 5_000, logger: silentLogger() })

    await expect(service.generate(request)).resolves.toBe('')
  })

  it('maps provider failures without retrying', async () => {
    let calls = 0
    const model = new MockLanguageModelV1({
      doGenerate: async () => {
        calls++
        throw new APICallError({
          message: 'Unauthorized',
          url: 'https://api.example.test/v1/chat/completions',
          requestBodyValues: {},
          statusCode: 401,
          isRetryable: false,
        })
      },
    })
    const logger = silentLogger()
    const service = new AiSdkGenerationService({ model: () => model, timeoutMs: 5_000, logger })

    const err = await service.generate(request).catch((e: unknown) => e)
    if (!(err instanceof GenerationServiceError)) throw new Error('expected GenerationServiceError')
    expect(err.kind).toBe('auth')
    expect(err.status).toBe(401)
    expect(calls).toBe(1)
    expect(JSON.parse(String(logger.error.mock.calls[0][0])).type).toBe('llm.error')
  })
})
