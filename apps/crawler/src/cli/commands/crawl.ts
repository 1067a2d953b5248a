import { setLogWriter } from '@carlist/logger'
import { loadCrawlConfig, type CrawlConfig, type CrawlConfigInput, type OutputFormat } from '../../config/settings.js'
import { loggers } from '../../config/logger.js'
import { ConfigError, classifyError, errorLogMeta } from '../../crawler/errors.js'
import { createCrawlerRuntime } from '../../crawler/runner.js'
import type { CrawlRunSummary } from '../../crawler/pipeline.js'
import { buildDealerSummary, type DealerSummaryEntry } from '../../crawler/process/dealer-summary.js'
import type { ProxyHandle } from '../../crawler/fetch/proxy-pool.js'
import type { Transport } from '../../crawler/fetch/transport.js'
import type { DedupRedisClient } from '../../crawler/process/dedup-store.js'
import type { ListingRecord, SkipReason } from '../../crawler/types.js'
import { createSink, fileTarget, stdoutTarget, type OutputSink } from '../../output/sinks.js'

const log = loggers.cli

const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'ndjson', 'csv']

export interface CrawlCommandArgs {
  config?: string
  input?: string
  urls: string[]
  urlFile?: string
  maxRecords?: number
  concurrency?: number
  output?: string
  format?: string
}

/** Seams for tests; production uses the defaults */
export interface CrawlCommandDeps {
  transport?: Transport
  redis?: DedupRedisClient
  env?: NodeJS.ProcessEnv
  print?: (line: string) => void
}

function isOutputFormat(value: string): value is OutputFormat {
  return OUTPUT_FORMATS.some(format => format === value)
}

/**
 * Flags become config overrides; unset flags leave the files' values alone.
 */
export function overridesFromArgs(args: CrawlCommandArgs, format?: OutputFormat): CrawlConfigInput {
  const overrides: CrawlConfigInput = {}
  if (args.urls.length > 0) overrides.startUrls = args.urls
  if (args.maxRecords !== undefined) overrides.maxRecords = args.maxRecords
  if (args.concurrency !== undefined) overrides.concurrency = args.concurrency
  if (args.output !== undefined || format !== undefined) {
    overrides.output = { path: args.output, format }
  }
  return overrides
}

export function formatRunSummary(
  summary: CrawlRunSummary,
  dealers: ReadonlyMap<string, DealerSummaryEntry>,
  proxies: readonly ProxyHandle[] = []
): string[] {
  const lines = [
    `Run ${summary.runId}: ${summary.terminalState}`,
    `  search pages visited: ${summary.discoveryPagesVisited}`,
    `  detail pages fetched: ${summary.detailTasksDispatched}`,
    `  records written:      ${summary.recordsEmitted} (max ${summary.maxRecords})`,
    `  fetch failures:       ${summary.fetchFailures}`,
    `  extraction failures:  ${summary.extractionFailures}`,
    `  duplicates:           ${summary.duplicates}`,
    `  duration:             ${(summary.durationMs / 1000).toFixed(1)}s`,
  ]

  if (proxies.length > 0) {
    const quarantined = proxies.filter(proxy => proxy.quarantinedUntil !== undefined).length
    lines.push(`  proxies:              ${proxies.length} (${quarantined} quarantined)`)
  }

  if (dealers.size > 0) {
    lines.push(`  dealers:              ${dealers.size}`)
    const top = [...dealers.values()].sort((a, b) => b.listingCount - a.listingCount).slice(0, 5)
    for (const dealer of top) {
      lines.push(`    ${dealer.dealerName}: ${dealer.listingCount}`)
    }
  }

  return lines
}

export async function runCrawlCommand(args: CrawlCommandArgs, deps: CrawlCommandDeps = {}): Promise<number> {
  const print = deps.print ?? ((line: string) => console.error(line))

  let format: OutputFormat | undefined
  if (args.format !== undefined) {
    if (!isOutputFormat(args.format)) {
      print(`Unknown --format ${args.format} (expected ${OUTPUT_FORMATS.join(', ')})`)
      return 2
    }
    format = args.format
  }

  let config: CrawlConfig
  try {
    config = loadCrawlConfig({
      file: args.config,
      input: args.input,
      urlFile: args.urlFile,
      overrides: overridesFromArgs(args, format),
      env: deps.env,
    })
  } catch (error) {
    if (error instanceof ConfigError) {
      print(error.message)
      return 2
    }
    throw error
  }

  // Records own stdout when no output file is given
  const restoreLogWriter = config.output.path
    ? undefined
    : setLogWriter((_entry, formatted) => {
        process.stderr.write(`${formatted}\n`)
      })

  let sink: OutputSink
  try {
    sink = createSink(config.output.format, config.output.path ? fileTarget(config.output.path) : stdoutTarget())
  } catch (error) {
    restoreLogWriter?.()
    print(`Cannot open output: ${error instanceof Error ? error.message : String(error)}`)
    return 1
  }
  const collected: ListingRecord[] = []
  const skipped = new Map<SkipReason, number>()

  const runtime = createCrawlerRuntime(config, {
    transport: deps.transport,
    redis: deps.redis,
    sink: {
      emit: async record => {
        collected.push(record)
        await sink.emit(record)
      },
    },
    skipChannel: {
      report: entry => {
        skipped.set(entry.reason, (skipped.get(entry.reason) ?? 0) + 1)
        log.debug('Skipped', { ...entry })
      },
    },
  })

  const onSignal = () => {
    log.warn('Interrupted, finishing in-flight requests')
    runtime.pipeline.stop()
  }
  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  let sinkClosed = false
  try {
    const summary = await runtime.pipeline.run()
    sinkClosed = true
    await sink.close()
    for (const line of formatRunSummary(
      summary,
      buildDealerSummary(collected),
      runtime.proxyPool.isDirect ? [] : runtime.proxyPool.snapshot()
    )) {
      print(line)
    }
    if (skipped.size > 0) {
      print(`  skipped: ${[...skipped].map(([reason, count]) => `${reason}=${count}`).join(', ')}`)
    }
    return 0
  } catch (error) {
    const classified = classifyError(error)
    log.error('Crawl failed', errorLogMeta(classified), error)
    print(`Crawl failed: ${classified.message}`)
    return 1
  } finally {
    process.removeListener('SIGINT', onSignal)
    process.removeListener('SIGTERM', onSignal)
    if (!sinkClosed) {
      await sink.close().catch((error: unknown) => {
        log.warn('Failed to close output', errorLogMeta(classifyError(error)), error)
      })
    }
    await runtime.close()
    restoreLogWriter?.()
  }
}
