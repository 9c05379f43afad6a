import * as os from "node:os"
import * as path from "node:path"
import { Config, type ConfigError, Effect, Option } from "effect"

// ============================================================================
// Default Config Location
// ============================================================================

export const APP_DIRECTORY = "mailguard"
export const CONFIG_FILE_NAME = "config.yaml"

const nonEmpty = (name: string) =>
	Config.option(Config.string(name)).pipe(
		Config.map((value) => Option.filter(value, (text) => text.length > 0)),
	)

/**
 * `$XDG_CONFIG_HOME/mailguard/config.yaml`, falling back to
 * `$HOME/.config/mailguard/config.yaml`. Empty variables count as unset.
 */
export const defaultConfigPath: Config.Config<string> = Config.all({
	xdgConfigHome: nonEmpty("XDG_CONFIG_HOME"),
	home: nonEmpty("HOME"),
}).pipe(
	Config.map(({ xdgConfigHome, home }) => {
		const configHome = Option.getOrElse(xdgConfigHome, () =>
			path.join(
				Option.getOrElse(home, () => os.homedir()),
				".config",
			),
		)
		return path.join(configHome, APP_DIRECTORY, CONFIG_FILE_NAME)
	}),
)

/**
 * Resolves the config path once, at the command-line boundary. An explicit
 * `--config` path wins and is made absolute against `cwd`.
 */
export const resolveConfigPath = (
	cwd: string,
	override: string | undefined,
): Effect.Effect<string, ConfigError.ConfigError> =>
	override !== undefined
		? Effect.succeed(path.resolve(cwd, override))
		: defaultConfigPath
