import { describe, it, expect } from 'vitest'
import type { PhaseKey } from '@strategy-chain/prompts'
import { BAR, printSummary, renderMarkdown, toEntries, toRecord, type PipelineResult } from '../report.js'

const outputs = new Map<PhaseKey, string>([
  ['market_research', 'R1'],
  ['customer_analysis', 'R2\n'],
])

describe('toEntries', () => {
  it('keeps completion order and attaches titles', () => {
    expect(toEntries(outputs)).toEqual([
      { phase: 'market_research', title: 'MARKET RESEARCH', text: 'R1' },
      { phase: 'customer_analysis', title: 'CUSTOMER INSIGHTS', text: 'R2\n' },
    ])
  })

  it('flattens to a plain record', () => {
    expect(toRecord(outputs)).toEqual({ market_research: 'R1', customer_analysis: 'R2\n' })
  })
})

describe('printSummary', () => {
  it('prints one labelled block per phase', () => {
    const lines: string[] = []
    printSummary((line) => lines.push(line), outputs)
    expect(lines).toEqual([
      '',
      BAR,
      'FINAL SUMMARY — MARKETING STRATEGY',
      BAR,
      '',
      '--- MARKET_RESEARCH ---',
      '',
      'R1',
      '',
      '--- CUSTOMER_ANALYSIS ---',
      '',
      'R2\n',
    ])
  })
})

describe('renderMarkdown', () => {
  it('renders a section per phase under a title block', () => {
    const result: PipelineResult = {
      productName: 'Widget X',
      model: 'gpt-4o-mini',
      startedAt: new Date('2026-01-01T00:00:00.000Z'),
      finishedAt: new Date('2026-01-01T00:05:00.000Z'),
      outputs,
      entries: toEntries(outputs),
    }

    expect(renderMarkdown(result)).toBe(
      [
        '# Marketing Strategy: Widget X',
        '',
        '- Model: gpt-4o-mini',
        '- Started: 2026-01-01T00:00:00.000Z',
        '- Finished: 2026-01-01T00:05:00.000Z',
        '',
        '## Market Research',
        '',
        'R1',
        '',
        '## Customer Insights',
        '',
        'R2',
        '',
      ].join('\n')
    )
  })
})
