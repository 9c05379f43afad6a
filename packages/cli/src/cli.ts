/**
 * mailguard-config - Command Dispatch
 *
 * Turns parsed arguments into a command run against the ConfigStore and
 * renders the output text. Kept apart from main.ts so it runs in tests
 * without touching the process.
 */

import { Effect } from "effect"
import {
	type AccountOptions,
	DEFAULT_IMAP_PORT,
	DEFAULT_SMTP_PORT,
} from "./accounts/account.js"
import { type ParsedArgs, UsageError } from "./args.js"
import { runAdd } from "./commands/add.js"
import { runCreate } from "./commands/create.js"
import { formatAccountList, runList } from "./commands/list.js"
import { runRemove } from "./commands/remove.js"
import { runShow } from "./commands/show.js"
import { resolveConfigPath } from "./config/default-path.js"

export const VERSION = "0.1.0"

export const HELP_TEXT = `mailguard-config v${VERSION}

Manage the mailguard server configuration file.

USAGE:
  mailguard-config [options] <command> [command options]

COMMANDS:
  create                Create a config skeleton
  add                   Add an account
  remove <id>           Remove an account
  list                  List configured accounts
  show                  Print the config file

GLOBAL OPTIONS:
  -h, --help            Show this help message
  -v, --version         Show version
  -c, --config <path>   Config file path
                        (default: $XDG_CONFIG_HOME/mailguard/config.yaml)
  --verbose             Log debug output
  --json                JSON output for list and show

CREATE OPTIONS:
  --threshold <n>       Global protection threshold (default: 0.5)
  -f, --force           Overwrite an existing config

ADD OPTIONS:
  --email <address>     Email address (required)
  --host <host>         IMAP host (required)
  --smtp-host <host>    SMTP host (required)
  --id <id>             Account ID (derived from the email if omitted)
  --port <n>            IMAP port (default: ${DEFAULT_IMAP_PORT})
  --smtp-port <n>       SMTP port (default: ${DEFAULT_SMTP_PORT})
  --no-ssl              Disable IMAP SSL
  --smtp-ssl            Enable SMTP SSL
  --send                Allow sending emails
  --delete              Allow deleting emails
  --move                Allow moving emails
  --threshold <n>       Per-account protection threshold
  --create-env          Write .env with password placeholders

EXAMPLES:
  mailguard-config create --threshold 0.7
  mailguard-config add --email me@example.com --host imap.example.com --smtp-host smtp.example.com --send
  mailguard-config list --json
  mailguard-config remove me
`

const requireFlag = (
	value: string | undefined,
	option: string,
): Effect.Effect<string, UsageError> =>
	value === undefined
		? Effect.fail(new UsageError({ message: `add requires ${option}` }))
		: Effect.succeed(value)

/**
 * Collects the add command's account options from flags.
 */
export const accountOptionsFrom = (
	flags: ParsedArgs["flags"],
): Effect.Effect<AccountOptions, UsageError> =>
	Effect.gen(function* () {
		const email = yield* requireFlag(flags.email, "--email")
		const host = yield* requireFlag(flags.host, "--host")
		const smtpHost = yield* requireFlag(flags.smtpHost, "--smtp-host")
		return {
			email,
			host,
			smtpHost,
			port: flags.port ?? DEFAULT_IMAP_PORT,
			smtpPort: flags.smtpPort ?? DEFAULT_SMTP_PORT,
			ssl: !flags.noSsl,
			smtpSsl: flags.smtpSsl,
			send: flags.send,
			delete: flags.delete,
			move: flags.move,
			...(flags.id !== undefined ? { id: flags.id } : {}),
			...(flags.threshold !== undefined ? { threshold: flags.threshold } : {}),
		}
	})

/**
 * Runs the command named in `args` and returns the text to print.
 *
 * @param args - Parsed arguments with a command set
 * @param cwd - Directory a relative --config path resolves against
 */
export function runCommand(args: ParsedArgs, cwd: string) {
	return Effect.gen(function* () {
		const configPath = yield* resolveConfigPath(cwd, args.flags.config).pipe(
			Effect.mapError(
				(error) =>
					new UsageError({
						message: `Cannot resolve the config path: ${String(error)}`,
					}),
			),
		)

		switch (args.command) {
			case "create": {
				const result = yield* runCreate({
					configPath,
					force: args.flags.force,
					...(args.flags.threshold !== undefined
						? { threshold: args.flags.threshold }
						: {}),
				})
				return `Config created: ${result.configPath}\n`
			}

			case "add": {
				const account = yield* accountOptionsFrom(args.flags)
				const result = yield* runAdd({
					configPath,
					account,
					createEnv: args.flags.createEnv,
				})
				const lines = [
					`Account '${result.accountId}' added to: ${configPath}`,
					`Set password env var: ${result.passwordVariable}`,
				]
				if (result.envFile !== undefined) {
					lines.push(`Created .env: ${result.envFile}`)
				}
				return `${lines.join("\n")}\n`
			}

			case "remove": {
				const accountId = args.positionalArgs[0]
				if (accountId === undefined) {
					return yield* new UsageError({
						message: "remove command requires an account ID",
					})
				}
				const result = yield* runRemove({ configPath, accountId })
				return `Account '${result.accountId}' removed from config.\n`
			}

			case "list": {
				const result = yield* runList({ configPath })
				return args.flags.json
					? `${JSON.stringify(result.accounts, null, 2)}\n`
					: `${formatAccountList(result)}\n`
			}

			case "show":
				return yield* runShow({ configPath, json: args.flags.json })

			default:
				return yield* new UsageError({
					message: `Unknown command: ${args.command ?? "(none)"}`,
				})
		}
	}).pipe(Effect.withLogSpan("command"))
}
