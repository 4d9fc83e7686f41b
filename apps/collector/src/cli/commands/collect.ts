import type { ILogger } from '@shelfwatch/logger'
import { loggers } from '../../config/logger.js'
import { loadCompetitors, selectCompetitors } from '../../config/competitors.js'
import { loadSettings, pipelineOptionsFromSettings } from '../../config/settings.js'
import { ConfigError, PreconditionError } from '../../pipeline/errors.js'
import { CompetitorPipeline } from '../../pipeline/orchestrator.js'
import { CsvRecordStore } from '../../pipeline/process/writer.js'
import type { Competitor, PipelineResult, RecordStore } from '../../pipeline/types.js'
import { defaultServiceFactories } from './services.js'
import type { ServiceFactories } from './services.js'

export interface CollectCommandArgs {
  configPath?: string
  outDir?: string
  competitorId?: string
  timeoutMinutes?: number
  dryRun: boolean
}

export interface CollectCommandDeps extends Partial<ServiceFactories> {
  env?: NodeJS.ProcessEnv
  createStore?: (exportsDir: string) => RecordStore
  print?: (line: string) => void
  logger?: ILogger
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`
}

export function formatSummary(result: PipelineResult, competitors: readonly Competitor[], exportsDir: string | null): string[] {
  const { stats } = result
  const rejected = Object.values(stats.candidatesRejected).reduce((sum, n) => sum + n, 0)
  const lines = [
    `Collected ${plural(result.products.length, 'product')} and ${plural(result.promotions.length, 'promotion')} ` +
      `from ${plural(competitors.length, 'competitor')} in ${(stats.durationMs / 1000).toFixed(1)}s`,
    `  seeds: ${stats.seedUrlsAttempted} attempted, ${stats.fetchFailures} failed`,
    `  pages: ${stats.pagesFetched} fetched, ${stats.duplicatePagesSkipped} duplicate, ${stats.pagesExcluded} excluded, ` +
      `${stats.pageFailures} failed`,
    `  candidates: ${stats.candidatesExtracted} extracted, ${rejected} rejected, ${stats.lowConfidenceCandidates} low confidence`,
    `  duplicates collapsed: ${stats.duplicatesCollapsed.products} products, ${stats.duplicatesCollapsed.promotions} promotions`,
  ]
  if (stats.deadlineExceeded) {
    lines.push(`  deadline exceeded: ${plural(stats.pagesAbandoned, 'page')} abandoned`)
  }
  lines.push(exportsDir === null ? '  dry run: nothing exported' : `  exported to ${exportsDir}`)
  return lines
}

/**
 * Run the collection pipeline and export the result.
 *
 * @returns Process exit code: 0 on success, 1 on a configuration or
 * precondition failure
 */
export async function runCollectCommand(args: CollectCommandArgs, deps: CollectCommandDeps = {}): Promise<number> {
  const log = deps.logger ?? loggers.cli
  const print = deps.print ?? ((line: string) => console.log(line))
  const factories: ServiceFactories = {
    createFetcher: deps.createFetcher ?? defaultServiceFactories.createFetcher,
    createExtractionService: deps.createExtractionService ?? defaultServiceFactories.createExtractionService,
  }

  try {
    const settings = loadSettings(deps.env)
    const configPath = args.configPath ?? settings.competitorsConfigPath
    const competitors = selectCompetitors(await loadCompetitors(configPath), args.competitorId)
    const exportsDir = args.outDir ?? settings.exportsDir

    log.info('COLLECT_STARTED', {
      configPath,
      competitors: competitors.map((c) => c.id),
      dryRun: args.dryRun,
    })

    const pipeline = new CompetitorPipeline(
      {
        fetcher: factories.createFetcher(settings),
        extractionService: factories.createExtractionService(settings),
        logger: deps.logger?.child('pipeline'),
      },
      pipelineOptionsFromSettings(settings, { timeoutMinutes: args.timeoutMinutes })
    )
    const result = await pipeline.run(competitors)

    if (!args.dryRun) {
      const store = deps.createStore?.(exportsDir) ?? new CsvRecordStore({ exportsDir })
      await store.save({ products: result.products, promotions: result.promotions, stats: result.stats })
    }

    for (const line of formatSummary(result, competitors, args.dryRun ? null : exportsDir)) {
      print(line)
    }
    return 0
  } catch (error) {
    if (error instanceof ConfigError) {
      log.error('CONFIG_INVALID', { issues: error.issues }, error)
      print(`Configuration error: ${error.message}`)
      return 1
    }
    if (error instanceof PreconditionError) {
      print(`Cannot start: ${error.message}`)
      return 1
    }
    throw error
  }
}
