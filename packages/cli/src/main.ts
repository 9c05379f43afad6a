#!/usr/bin/env tsx
/**
 * mailguard-config CLI - Command line interface for mailguard config files
 *
 * Entry point: parses argv, wires the Node config store and logger level,
 * prints the command output and maps every failure to an exit code.
 */

import { NodeConfigStoreLayer } from "@mailguard/node"
import { Effect, Either, Logger, LogLevel } from "effect"
import { parseArgs } from "./args.js"
import { HELP_TEXT, runCommand, VERSION } from "./cli.js"

/**
 * Print error and exit
 */
function exitWithError(message: string): never {
  console.error(`Error: ${message}`)
  console.error(`Run 'mailguard-config --help' for usage.`)
  process.exit(1)
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  const parsed = parseArgs(process.argv)
  if (Either.isLeft(parsed)) {
    exitWithError(parsed.left.message)
  }
  const args = parsed.right

  // Handle global flags first
  if (args.flags.version) {
    console.log(`mailguard-config v${VERSION}`)
    return
  }

  if (args.flags.help || args.command === undefined) {
    console.log(HELP_TEXT)
    return
  }

  const output = await Effect.runPromise(
    runCommand(args, process.cwd()).pipe(
      Effect.catchAll((error) => Effect.sync(() => exitWithError(error.message))),
      Effect.provide(NodeConfigStoreLayer),
      Logger.withMinimumLogLevel(args.flags.verbose ? LogLevel.Debug : LogLevel.Info),
    ),
  )

  process.stdout.write(output)
}

main().catch((error: unknown) => {
  console.error("Fatal error:", error)
  process.exit(1)
})
