// apps/backend/src/lib/models.ts
// Centralised model resolution so the CLI, the services and the tests share defaults.

export const FALLBACK_MODEL = 'gpt-4o-mini'

export function resolveModel(...candidates: Array<string | undefined | null>): string {
  for (const candidate of candidates) {
    if (candidate && candidate.trim().length) {
      return candidate.trim()
    }
  }
  return FALLBACK_MODEL
}

// Reasoning families reject `max_tokens` and want `max_completion_tokens`.
const REASONING_PREFIXES = ['gpt-5', 'o1', 'o3', 'o4']

export function isReasoningModel(model: string): boolean {
  const id = model.toLowerCase().split('/').pop() ?? ''
  return REASONING_PREFIXES.some((prefix) => id === prefix || id.startsWith(`${prefix}-`))
}
