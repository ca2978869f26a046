// apps/backend/src/cli.ts
// Entry point behind scripts/run-marketing.ts. Returns an exit code instead of exiting.

import { assertConfig, loadConfig, type AppConfig, type Env } from './lib/config.js'
import { ConfigurationError, GenerationServiceError, describeError } from './lib/errors.js'
import type { GenerationService, Logger } from './lib/generation.js'
import { createGenerationService } from './lib/services.js'
import { PipelineRunner } from './orchestrator/pipeline.js'
import { renderMarkdown, type Print } from './orchestrator/report.js'

export type CliDeps = {
  createService?: (config: AppConfig, logger: Logger) => GenerationService
  print?: Print
  printError?: Print
  logger?: Logger
}

export async function main(argv: readonly string[], env: Env, deps: CliDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.log(line))
  const printError = deps.printError ?? ((line: string) => console.error(line))
  const logger = deps.logger ?? console
  const createService = deps.createService ?? createGenerationService

  try {
    const productName = argv.join(' ').trim() || undefined
    const config = loadConfig(env)
    // Client constructors reject some bad settings themselves, so check before building one.
    assertConfig(config)
    const markdown = config.reportFormat === 'markdown'

    const runner = new PipelineRunner({
      service: createService(config, logger),
      config,
      productName,
      print,
      logger,
      summary: !markdown,
    })

    const result = await runner.run()
    if (markdown) {
      print('')
      print(renderMarkdown(result))
    }
    return 0
  } catch (err) {
    if (err instanceof ConfigurationError) {
      printError('ERROR: Configuration validation failed!')
      for (const issue of err.issues) printError(`  - ${issue}`)
    } else if (err instanceof GenerationServiceError && err.phase) {
      printError(`ERROR: phase ${err.phase} failed after ${err.completed.size} completed phase(s): ${err.message}`)
    } else {
      printError(`ERROR: ${describeError(err)}`)
    }
    return 1
  }
}
