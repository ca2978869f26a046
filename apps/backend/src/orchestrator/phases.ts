// apps/backend/src/orchestrator/phases.ts
// The five-step chain as data. Reordering or adding a phase is an edit to PHASES only.

import {
  GenerationSettingsSchema,
  PhaseKeyEnum,
  campaigns,
  customerAnalysis,
  marketResearch,
  quality,
  strategy,
  type GenerationSettings,
  type PhaseKey,
  type PhaseOutputs,
} from '@strategy-chain/prompts'

export type PhaseDescriptor = {
  readonly key: PhaseKey
  readonly title: string
  /** Phases whose text this one reads. Must all precede it. */
  readonly dependsOn: readonly PhaseKey[]
  readonly system: (productName: string) => string
  readonly user: (outputs: PhaseOutputs) => string
  readonly settings: GenerationSettings
}

/** Validates a descriptor's key and sampling settings, then freezes it all the way down. */
export function definePhase(descriptor: PhaseDescriptor): PhaseDescriptor {
  const key = PhaseKeyEnum.parse(descriptor.key)
  const settings = GenerationSettingsSchema.parse(descriptor.settings)
  return Object.freeze({
    ...descriptor,
    key,
    dependsOn: Object.freeze(descriptor.dependsOn.map((dep) => PhaseKeyEnum.parse(dep))),
    settings: Object.freeze(settings),
  })
}

export const PHASES: readonly PhaseDescriptor[] = Object.freeze([
  definePhase({
    key: 'market_research',
    title: 'MARKET RESEARCH',
    dependsOn: [],
    system: marketResearch.system,
    user: marketResearch.user,
    settings: { temperature: 0.7, maxTokens: 500 },
  }),
  definePhase({
    key: 'customer_analysis',
    title: 'CUSTOMER INSIGHTS',
    dependsOn: ['market_research'],
    system: customerAnalysis.system,
    user: customerAnalysis.user,
    settings: { temperature: 0.7, maxTokens: 400 },
  }),
  definePhase({
    key: 'strategy',
    title: 'MARKETING STRATEGY',
    dependsOn: ['market_research', 'customer_analysis'],
    system: strategy.system,
    user: strategy.user,
    settings: { temperature: 0.7, maxTokens: 500 },
  }),
  definePhase({
    key: 'campaigns',
    title: 'CAMPAIGN DESIGN',
    dependsOn: ['strategy'],
    system: campaigns.system,
    user: campaigns.user,
    settings: { temperature: 0.7, maxTokens: 500 },
  }),
  definePhase({
    key: 'quality',
    title: 'QUALITY REVIEW',
    dependsOn: ['market_research', 'customer_analysis', 'strategy', 'campaigns'],
    system: quality.system,
    user: quality.user,
    settings: { temperature: 0.5, maxTokens: 500 },
  }),
])

export function phaseTitle(key: PhaseKey): string {
  return PHASES.find((p) => p.key === key)?.title ?? key.toUpperCase()
}
