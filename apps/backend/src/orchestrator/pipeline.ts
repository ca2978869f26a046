// apps/backend/src/orchestrator/pipeline.ts
// Runs the phase list strictly in order, threading each phase's text into the next.
// The only state is the outputs map, and it lives in `run`'s scope, never on the instance.

import { appendOutput, MissingPhaseOutputError, type PhaseOutputs } from '@strategy-chain/prompts'
import { assertConfig, DEFAULT_PRODUCT_NAME, type AppConfig } from '../lib/config.js'
import { GenerationServiceError, PhaseOrderError, describeError } from '../lib/errors.js'
import type { GenerationService, Logger } from '../lib/generation.js'
import { PHASES, type PhaseDescriptor } from './phases.js'
import {
  printPhaseHeader,
  printRunHeader,
  printSummary,
  toEntries,
  type PhaseEntry,
  type PipelineResult,
  type Print,
} from './report.js'

export type PipelineRunnerOptions = {
  service: GenerationService
  config: AppConfig
  productName?: string
  phases?: readonly PhaseDescriptor[]
  print?: Print
  logger?: Logger
  /** Skip the closing summary block (the CLI does this when it renders markdown instead). */
  summary?: boolean
  onPhaseComplete?: (entry: PhaseEntry, index: number) => void
}

export class PipelineRunner {
  private readonly service: GenerationService
  private readonly config: AppConfig
  private readonly productName: string
  private readonly phases: readonly PhaseDescriptor[]
  private readonly print: Print
  private readonly logger: Logger
  private readonly summary: boolean
  private readonly onPhaseComplete?: (entry: PhaseEntry, index: number) => void

  constructor(opts: PipelineRunnerOptions) {
    this.service = opts.service
    this.config = opts.config
    this.productName = opts.productName?.trim() || DEFAULT_PRODUCT_NAME
    this.phases = opts.phases ?? PHASES
    this.print = opts.print ?? ((line) => console.log(line))
    this.logger = opts.logger ?? console
    this.summary = opts.summary ?? true
    this.onPhaseComplete = opts.onPhaseComplete
  }

  async run(productName?: string): Promise<PipelineResult> {
    // Nothing reaches the service until the settings check passes.
    assertConfig(this.config)

    const product = productName?.trim() || this.productName
    const startedAt = new Date()
    printRunHeader(this.print, { productName: product, model: this.config.model, startedAt })

    let outputs: PhaseOutputs = new Map()
    for (const [index, descriptor] of this.phases.entries()) {
      printPhaseHeader(this.print, index, descriptor.title)
      const phaseStart = Date.now()
      let text: string
      try {
        text = await this.executePhase(descriptor, outputs, product)
      } catch (err) {
        this.logger.error(JSON.stringify({
          type: 'pipeline.phase',
          phase: descriptor.key,
          status: 'FAILED',
          duration_ms: Date.now() - phaseStart,
          error: describeError(err),
        }))
        if (err instanceof GenerationServiceError) throw err.withPhase(descriptor.key, outputs)
        if (err instanceof PhaseOrderError) throw err
        if (err instanceof MissingPhaseOutputError) throw new PhaseOrderError(descriptor.key, [err.phase])
        throw new GenerationServiceError(`Generation request failed: ${describeError(err)}`, {
          phase: descriptor.key,
          completed: outputs,
          cause: err,
        })
      }

      outputs = appendOutput(outputs, descriptor.key, text)
      this.logger.info(JSON.stringify({
        type: 'pipeline.phase',
        phase: descriptor.key,
        status: 'COMPLETE',
        duration_ms: Date.now() - phaseStart,
        chars: text.length,
      }))
      this.print(text)
      this.onPhaseComplete?.({ phase: descriptor.key, title: descriptor.title, text }, index)
    }

    if (this.summary) printSummary(this.print, outputs)

    return {
      productName: product,
      model: this.config.model,
      startedAt,
      finishedAt: new Date(),
      outputs,
      entries: toEntries(outputs),
    }
  }

  /** One request for one phase. Reads `outputs`, never writes it. */
  async executePhase(
    descriptor: PhaseDescriptor,
    outputs: PhaseOutputs,
    productName: string = this.productName
  ): Promise<string> {
    const missing = descriptor.dependsOn.filter((key) => !outputs.has(key))
    if (missing.length) throw new PhaseOrderError(descriptor.key, missing)

    return this.service.generate({
      model: this.config.model,
      temperature: descriptor.settings.temperature,
      maxTokens: descriptor.settings.maxTokens,
      messages: [
        { role: 'system', content: descriptor.system(productName) },
        { role: 'user', content: descriptor.user(outputs) },
      ],
      meta: { scope: `marketing.${descriptor.key}` },
    })
  }
}
