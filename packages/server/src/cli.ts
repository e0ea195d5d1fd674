#!/usr/bin/env -S node --import tsx
import { program } from 'commander'
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js'
import { errorMessage } from './lib/errors.js'
import { createLogger } from './lib/logger.js'
import { version } from './lib/version.js'
import { createBundleServer } from './mcp/bundle-server.js'
import { defaultRegistry } from './registry.js'

const log = createLogger('CLI')

program
  .name('genmedia-mcp')
  .description('Serve generative media capability bundles over MCP')
  .version(version)

// ─── genmedia-mcp serve ───

program
  .command('serve')
  .description('Serve one capability bundle over stdio')
  .requiredOption('-b, --bundle <name>', 'Bundle to serve (see `genmedia-mcp list`)')
  .action(async (opts: { bundle: string }) => {
    try {
      const server = createBundleServer(opts.bundle)
      await server.connect(new StdioServerTransport())
    } catch (err) {
      log.error(`Failed to start: ${errorMessage(err)}`)
      process.exit(1)
    }
  })

// ─── genmedia-mcp list ───

program
  .command('list')
  .description('List bundles and their components')
  .option('--json', 'Print the full export with input and output schemas')
  .action((opts: { json?: boolean }) => {
    if (opts.json) {
      console.log(JSON.stringify(defaultRegistry.toExport(), null, 2))
      return
    }
    for (const bundle of defaultRegistry.entries()) {
      console.log(`${bundle.name}: ${bundle.instructions}`)
      for (const component of bundle.components) {
        console.log(`  - ${component.name}`)
      }
    }
  })

program.parse()
