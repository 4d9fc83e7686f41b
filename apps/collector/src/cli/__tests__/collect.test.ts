import { existsSync } from 'node:fs'
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { CsvRecordStore } from '../../pipeline/process/writer.js'
import { createEmptyStats } from '../../pipeline/stats.js'
import {
  ScriptedExtractionService,
  StubFetcher,
  makePage,
  silentLogger,
} from '../../pipeline/__tests__/helpers/fixtures.js'
import { formatSummary, runCollectCommand } from '../commands/collect.js'
import type { CollectCommandDeps } from '../commands/collect.js'
import { runCheckCommand } from '../commands/check.js'

const NEW_ARRIVALS = 'https://www.westelm.com/new-arrivals'
const SALE = 'https://www.westelm.com/sale'

const env = {
  ANTHROPIC_API_KEY: 'test-secret',
  FIRECRAWL_API_KEY: 'test-secret',
  EXTRACTION_MIN_SPACING_MS: '0',
}

describe('collect command', () => {
  let dir: string
  let configPath: string
  let outDir: string
  let printed: string[]
  let fetcher: StubFetcher
  let service: ScriptedExtractionService

  function deps(overrides: Partial<CollectCommandDeps> = {}): CollectCommandDeps {
    return {
      env,
      createFetcher: () => fetcher,
      createExtractionService: () => service,
      createStore: (exportsDir) => new CsvRecordStore({ exportsDir, logger: silentLogger() }),
      print: (line) => printed.push(line),
      logger: silentLogger(),
      ...overrides,
    }
  }

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'shelfwatch-cli-'))
    configPath = join(dir, 'competitors.json')
    outDir = join(dir, 'exports')
    printed = []
    await writeFile(
      configPath,
      JSON.stringify({
        competitors: [
          { name: 'West Elm', newProductUrls: [NEW_ARRIVALS], promotionUrls: [SALE] },
          { name: 'Pottery Barn', newProductUrls: ['https://www.potterybarn.com/new'], enabled: false },
        ],
      })
    )

    fetcher = new StubFetcher({
      [NEW_ARRIVALS]: [makePage(NEW_ARRIVALS, { markdown: 'New arrivals: Harmony Sofa $1,899.00' })],
      [SALE]: [makePage(SALE, { markdown: 'Spring Sale 20% off sofas' })],
    })
    service = new ScriptedExtractionService({
      product: [
        {
          products: [
            { product_name: 'Harmony Sofa', price: '$1,899.00', product_url: '/products/harmony-sofa', confidence: 0.9 },
          ],
        },
      ],
      promotion: [{ promotions: [{ promo_title: 'Spring Sale', promo_url: '/sale' }], confidence: 0.9 }],
    })
  })

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true })
  })

  it('runs enabled competitors and exports the records', async () => {
    const exitCode = await runCollectCommand({ configPath, outDir, dryRun: false }, deps())

    expect(exitCode).toBe(0)
    expect(fetcher.calls).toEqual([NEW_ARRIVALS, SALE])

    const [, row] = (await readFile(join(outDir, 'new_products.csv'), 'utf8')).split('\n')
    expect(row.startsWith('West Elm,Harmony Sofa,West Elm,,1899,,,https://www.westelm.com/products/harmony-sofa,')).toBe(
      true
    )
    expect(existsSync(join(outDir, 'current_promotions.csv'))).toBe(true)

    expect(printed[0]).toMatch(/^Collected 1 product and 1 promotion from 1 competitor in \d+\.\ds$/)
    expect(printed[printed.length - 1]).toBe(`  exported to ${outDir}`)
  })

  it('exports nothing on a dry run', async () => {
    const exitCode = await runCollectCommand({ configPath, outDir, dryRun: true }, deps())

    expect(exitCode).toBe(0)
    expect(existsSync(outDir)).toBe(false)
    expect(printed[printed.length - 1]).toBe('  dry run: nothing exported')
  })

  it('exits 1 on an invalid environment without fetching', async () => {
    const exitCode = await runCollectCommand(
      { configPath, outDir, dryRun: false },
      deps({ env: { FIRECRAWL_API_KEY: 'test-secret' } })
    )

    expect(exitCode).toBe(1)
    expect(printed).toEqual(['Configuration error: Invalid environment: ANTHROPIC_API_KEY is required'])
    expect(fetcher.calls).toEqual([])
  })

  it('exits 1 when the requested competitor is not enabled', async () => {
    const exitCode = await runCollectCommand(
      { configPath, outDir, competitorId: 'pottery-barn', dryRun: false },
      deps()
    )

    expect(exitCode).toBe(1)
    expect(printed).toEqual(['Configuration error: No enabled competitor with id "pottery-barn"'])
  })

  it('exits 1 when a collaborator is unreachable', async () => {
    fetcher.healthy = false

    const exitCode = await runCollectCommand({ configPath, outDir, dryRun: false }, deps())

    expect(exitCode).toBe(1)
    expect(printed).toEqual(['Cannot start: Page fetcher unreachable: fetcher unreachable'])
    expect(existsSync(outDir)).toBe(false)
  })
})

describe('formatSummary', () => {
  it('reports abandoned pages when the deadline was hit', () => {
    const stats = {
      ...createEmptyStats(new Date('2025-03-10T12:00:00Z')),
      durationMs: 4_800_000,
      deadlineExceeded: true,
      pagesAbandoned: 3,
    }

    const lines = formatSummary({ runId: 'run-1', products: [], promotions: [], stats }, [], null)

    expect(lines[0]).toBe('Collected 0 products and 0 promotions from 0 competitors in 4800.0s')
    expect(lines).toContain('  deadline exceeded: 3 pages abandoned')
  })
})

describe('check command', () => {
  it('reports each collaborator and fails when one is unreachable', async () => {
    const printed: string[] = []
    const service = new ScriptedExtractionService()
    service.healthy = false

    const exitCode = await runCheckCommand({
      env,
      createFetcher: () => new StubFetcher({}),
      createExtractionService: () => service,
      print: (line) => printed.push(line),
      logger: silentLogger(),
    })

    expect(exitCode).toBe(1)
    expect(printed[0]).toMatch(/^ok {4}fetcher \(\d+ms\)$/)
    expect(printed[1]).toBe('FAIL  extraction service: service unreachable')
  })
})
