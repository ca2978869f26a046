// apps/backend/src/lib/config.ts
// Environment-driven settings for a strategy run. Loading never throws; validation
// reports every issue at once so the CLI can print them before any phase starts.

import { z } from 'zod'
import { ConfigurationError } from './errors.js'
import { resolveModel } from './models.js'

export const DEFAULT_API_BASE = 'https://api.openai.com/v1'
export const DEFAULT_PRODUCT_NAME = 'SmartHealth Fitness Band'

const flag = (value: string | undefined) => ['true', '1', 'yes'].includes(String(value ?? '').trim().toLowerCase())

export const ProviderEnum = z.enum(['openai', 'ai-sdk'])
export type Provider = z.infer<typeof ProviderEnum>

export const ReportFormatEnum = z.enum(['console', 'markdown'])
export type ReportFormat = z.infer<typeof ReportFormatEnum>

const ConfigSchema = z.object({
  apiKey: z.string(),
  apiBase: z.string().url({ message: 'API base must be an absolute URL' }),
  model: z.string().min(1, { message: 'Model identifier is required' }),
  timeoutMs: z.number().int().positive({ message: 'Timeout must be a positive number of milliseconds' }),
  maxRetries: z.number().int().min(0, { message: 'Max retries cannot be negative' }),
  provider: ProviderEnum,
  reportFormat: ReportFormatEnum,
  fakeRuns: z.boolean(),
  trace: z.boolean(),
})
export type AppConfig = z.infer<typeof ConfigSchema>

export type ConfigCheck = { ok: boolean; issues: string[] }

export type Env = Record<string, string | undefined>

const toInt = (value: string | undefined, fallback: number) => {
  if (value === undefined || !value.trim()) return fallback
  const num = Number(value)
  return Number.isFinite(num) ? num : Number.NaN
}

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = ProviderEnum.safeParse((env.STRATEGY_PROVIDER || 'openai').trim().toLowerCase())
  const reportFormat = ReportFormatEnum.safeParse((env.STRATEGY_REPORT_FORMAT || 'console').trim().toLowerCase())
  return {
    apiKey: (env.OPENAI_API_KEY ?? '').trim(),
    apiBase: (env.OPENAI_API_BASE || env.OPENAI_BASE_URL || DEFAULT_API_BASE).trim(),
    model: resolveModel(env.MODEL_MARKETING, env.MODEL_DEFAULT),
    timeoutMs: toInt(env.STRATEGY_LLM_TIMEOUT_MS, 60_000),
    maxRetries: toInt(env.STRATEGY_LLM_MAX_RETRIES, 0),
    provider: provider.success ? provider.data : 'openai',
    reportFormat: reportFormat.success ? reportFormat.data : 'console',
    fakeRuns: flag(env.STRATEGY_FAKE_RUNS),
    trace: flag(env.STRATEGY_TRACE),
  }
}

export function validateConfig(config: AppConfig): ConfigCheck {
  const issues: string[] = []
  const parsed = ConfigSchema.safeParse(config)
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      issues.push(`${issue.path.join('.') || 'config'}: ${issue.message}`)
    }
  }
  // Stub runs are the only ones allowed without a key.
  if (!config.fakeRuns && !config.apiKey) {
    issues.push('apiKey: OPENAI_API_KEY is not set')
  }
  return { ok: issues.length === 0, issues }
}

export function assertConfig(config: AppConfig): void {
  const check = validateConfig(config)
  if (!check.ok) throw new ConfigurationError(check.issues)
}
