import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import { loadSettings } from '../../config/settings.js'
import type { Settings } from '../../config/settings.js'
import { ConfigError, errorMessageOf } from '../../pipeline/errors.js'
import { defaultServiceFactories } from './services.js'
import type { ServiceFactories } from './services.js'

export interface CheckCommandDeps extends Partial<ServiceFactories> {
  env?: NodeJS.ProcessEnv
  print?: (line: string) => void
  logger?: ILogger
}

/**
 * Verify the configured keys reach the fetcher and the extraction service.
 */
export async function runCheckCommand(deps: CheckCommandDeps = {}): Promise<number> {
  const log = deps.logger ?? loggers.cli
  const print = deps.print ?? ((line: string) => console.log(line))
  const factories: ServiceFactories = {
    createFetcher: deps.createFetcher ?? defaultServiceFactories.createFetcher,
    createExtractionService: deps.createExtractionService ?? defaultServiceFactories.createExtractionService,
  }

  let settings: Settings
  try {
    settings = loadSettings(deps.env)
  } catch (error) {
    if (error instanceof ConfigError) {
      print(`Configuration error: ${error.message}`)
      return 1
    }
    throw error
  }

  const checks = [
    { name: 'fetcher', run: () => factories.createFetcher(settings).healthCheck() },
    { name: 'extraction service', run: () => factories.createExtractionService(settings).healthCheck() },
  ]

  let failed = 0
  for (const check of checks) {
    const startedAt = Date.now()
    try {
      await check.run()
      print(`ok    ${check.name} (${Date.now() - startedAt}ms)`)
    } catch (error) {
      failed++
      log.warn('HEALTH_CHECK_FAILED', { collaborator: check.name }, error)
      print(`FAIL  ${check.name}: ${errorMessageOf(error)}`)
    }
  }

  return failed === 0 ? 0 : 1
}
