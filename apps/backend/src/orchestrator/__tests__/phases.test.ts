import { describe, it, expect } from 'vitest'
import { PhaseKeyEnum } from '@strategy-chain/prompts'
import { PHASES, definePhase, phaseTitle, type PhaseDescriptor } from '../phases.js'

const base: PhaseDescriptor = {
  key: 'strategy',
  title: 'MARKETING STRATEGY',
  dependsOn: ['market_research'],
  system: () => 'system',
  user: () => 'user',
  settings: { temperature: 0.7, maxTokens: 500 },
}

describe('PHASES', () => {
  it('lists every phase key once, in run order', () => {
    expect(PHASES.map((p) => p.key)).toEqual(PhaseKeyEnum.options)
  })

  it('is frozen all the way down', () => {
    expect(Object.isFrozen(PHASES)).toBe(true)
    for (const phase of PHASES) {
      expect(Object.isFrozen(phase)).toBe(true)
      expect(Object.isFrozen(phase.settings)).toBe(true)
      expect(Object.isFrozen(phase.dependsOn)).toBe(true)
    }
  })

  it('refuses writes to settings', () => {
    const settings: { temperature: number } = PHASES[0].settings
    expect(() => {
      settings.temperature = 1.5
    }).toThrow(TypeError)
    expect(PHASES[0].settings.temperature).toBe(0.7)
    expect(PHASES[1].dependsOn).toEqual(['market_research'])
  })

  it('maps keys to their banner titles', () => {
    expect(phaseTitle('quality')).toBe('QUALITY REVIEW')
  })
})

describe('definePhase', () => {
  it('copies the descriptor so later edits to the input do not leak in', () => {
    const settings = { temperature: 0.2, maxTokens: 100 }
    const dependsOn: PhaseDescriptor['dependsOn'] = ['market_research']
    const phase = definePhase({ ...base, settings, dependsOn })

    settings.temperature = 1.9
    expect(phase.settings).toEqual({ temperature: 0.2, maxTokens: 100 })
    expect(phase.dependsOn).not.toBe(dependsOn)
  })

  it('rejects a temperature above 2', () => {
    expect(() => definePhase({ ...base, settings: { temperature: 3, maxTokens: 500 } })).toThrow()
  })

  it('rejects a non-positive token limit', () => {
    expect(() => definePhase({ ...base, settings: { temperature: 0.7, maxTokens: 0 } })).toThrow()
  })
})
