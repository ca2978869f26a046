// apps/backend/src/lib/generation.ts
// The one capability the pipeline needs from a model provider.

import type { ChatMessage } from '@strategy-chain/prompts'

export type GenerationRequest = {
  model: string
  temperature: number
  maxTokens: number
  messages: ChatMessage[]
  meta?: Record<string, string | number | boolean | undefined>
}

export interface GenerationService {
  /** Resolves with the generated text, or rejects with a GenerationServiceError. */
  generate(request: GenerationRequest): Promise<string>
}

export type Logger = Pick<Console, 'log' | 'info' | 'warn' | 'error'>
