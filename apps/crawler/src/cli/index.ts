import '../env.js'
import { runCrawlCommand } from './commands/crawl.js'
import { flagList, flagNumber, flagString, hasFlag, parseFlags } from './parse-flags.js'

function printHelp(): void {
  console.log('Listing crawler CLI')
  console.log('')
  console.log('Commands:')
  console.log('  crawl [--config <settings.json>] [--input <input.json>] [--url <url> ...] [--url-file <path>]')
  console.log('        [--max-records <n>] [--concurrency <n>] [--output <path>] [--format json|ndjson|csv]')
  console.log('')
  console.log('Start URLs may be search pages or listing pages. Relative URLs resolve against baseUrl.')
  console.log('Without --output, records are written to stdout and logs to stderr.')
}

async function main(): Promise<void> {
  const [, , command, ...rest] = process.argv
  if (!command || command === '--help' || command === '-h') {
    printHelp()
    process.exit(0)
  }

  const flags = parseFlags(rest)
  if (hasFlag(flags, 'help')) {
    printHelp()
    process.exit(0)
  }

  let exitCode = 2

  switch (command) {
    case 'crawl':
      exitCode = await runCrawlCommand({
        config: flagString(flags, 'config'),
        input: flagString(flags, 'input'),
        urls: flagList(flags, 'url'),
        urlFile: flagString(flags, 'url-file'),
        maxRecords: flagNumber(flags, 'max-records'),
        concurrency: flagNumber(flags, 'concurrency'),
        output: flagString(flags, 'output'),
        format: flagString(flags, 'format'),
      })
      break
    default:
      console.error(`Unknown command: ${command}`)
      printHelp()
      exitCode = 2
  }

  process.exit(exitCode)
}

main().catch((error: unknown) => {
  console.error(error instanceof Error ? error.message : String(error))
  process.exit(1)
})
