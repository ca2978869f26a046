// apps/backend/src/orchestrator/report.ts
// Console and markdown renderings of a run. Both walk outputs in completion order.

import type { PhaseKey, PhaseOutputs } from '@strategy-chain/prompts'
import { phaseTitle } from './phases.js'

export type Print = (line: string) => void

export type PhaseEntry = {
  phase: PhaseKey
  title: string
  text: string
}

export type PipelineResult = {
  productName: string
  model: string
  startedAt: Date
  finishedAt: Date
  outputs: PhaseOutputs
  entries: PhaseEntry[]
}

export const BAR = '='.repeat(80)

export function toEntries(outputs: PhaseOutputs): PhaseEntry[] {
  return Array.from(outputs, ([phase, text]) => ({ phase, title: phaseTitle(phase), text }))
}

export function toRecord(outputs: PhaseOutputs): Partial<Record<PhaseKey, string>> {
  return Object.fromEntries(outputs)
}

function banner(print: Print, heading: string) {
  print('')
  print(BAR)
  print(heading)
  print(BAR)
}

export function printRunHeader(print: Print, run: { productName: string; model: string; startedAt: Date }) {
  banner(print, 'MARKETING STRATEGY WORKFLOW')
  print(`Product: ${run.productName}`)
  print(`Model: ${run.model}`)
  print(`Start Time: ${run.startedAt.toISOString()}`)
}

export function printPhaseHeader(print: Print, index: number, title: string) {
  banner(print, `PHASE ${index + 1}: ${title}`)
}

export function printSummary(print: Print, outputs: PhaseOutputs) {
  banner(print, 'FINAL SUMMARY — MARKETING STRATEGY')
  for (const [key, value] of outputs) {
    print('')
    print(`--- ${key.toUpperCase()} ---`)
    print('')
    print(value)
  }
}

const titleCase = (value: string) =>
  value
    .toLowerCase()
    .split(/\s+/)
    .filter(Boolean)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ')

export function renderMarkdown(result: PipelineResult): string {
  const lines: string[] = [
    `# Marketing Strategy: ${result.productName}`,
    '',
    `- Model: ${result.model}`,
    `- Started: ${result.startedAt.toISOString()}`,
    `- Finished: ${result.finishedAt.toISOString()}`,
  ]
  for (const entry of result.entries) {
    lines.push('', `## ${titleCase(entry.title)}`, '', entry.text.trim())
  }
  return lines.join('\n') + '\n'
}
