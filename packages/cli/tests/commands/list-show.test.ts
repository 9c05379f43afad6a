import { describe, expect, it } from "vitest"
import { formatAccountList, runList } from "../../src/commands/list.js"
import { runShow } from "../../src/commands/show.js"
import { CONFIG_PATH, failWith, runWith, SKELETON } from "../helpers.js"

const CONFIG = [
	"# managed by mailguard-config",
	"protection:",
	"  threshold: 0.5",
	"accounts:",
	"  - id: me",
	"    host: imap.example.com",
	"    port: 993",
	'    username: "me@example.com"',
	"  - id: work",
	"",
].join("\n")

describe("runList", () => {
	it("summarizes accounts in file order", async () => {
		const result = await runWith(
			runList({ configPath: CONFIG_PATH }),
			new Map([[CONFIG_PATH, CONFIG]]),
		)

		expect(result).toEqual({
			configPath: CONFIG_PATH,
			accounts: [
				{ id: "me", username: "me@example.com", host: "imap.example.com" },
				{ id: "work", username: "?", host: "?" },
			],
		})
	})

	it("treats an empty account list as no accounts", async () => {
		const result = await runWith(
			runList({ configPath: CONFIG_PATH }),
			new Map([[CONFIG_PATH, SKELETON]]),
		)

		expect(result.accounts).toEqual([])
	})

	it("fails on a malformed config", async () => {
		const error = await failWith(
			runList({ configPath: CONFIG_PATH }),
			new Map([[CONFIG_PATH, "accounts:\n  - id: me\n stray\n"]]),
		)

		expect(error._tag).toBe("MalformedDocumentError")
	})
})

describe("formatAccountList", () => {
	it("renders one padded row per account", () => {
		expect(
			formatAccountList({
				configPath: CONFIG_PATH,
				accounts: [
					{ id: "me", username: "me@example.com", host: "imap.example.com" },
					{ id: "work", username: "?", host: "?" },
				],
			}),
		).toBe(
			[
				`Accounts in ${CONFIG_PATH}:`,
				"  me           me@example.com                 imap.example.com",
				"  work         ?                              ?",
			].join("\n"),
		)
	})

	it("says so when there are no accounts", () => {
		expect(formatAccountList({ configPath: CONFIG_PATH, accounts: [] })).toBe(
			"No accounts configured.",
		)
	})
})

describe("runShow", () => {
	it("prints the file as stored", async () => {
		const text = await runWith(
			runShow({ configPath: CONFIG_PATH }),
			new Map([[CONFIG_PATH, CONFIG]]),
		)

		expect(text).toBe(CONFIG)
	})

	it("prints the parsed document as JSON", async () => {
		const text = await runWith(
			runShow({ configPath: CONFIG_PATH, json: true }),
			new Map([[CONFIG_PATH, SKELETON]]),
		)

		expect(text).toBe(
			'{\n  "protection": {\n    "threshold": 0.5\n  },\n  "accounts": null\n}\n',
		)
	})

	it("fails for a missing file", async () => {
		const error = await failWith(runShow({ configPath: CONFIG_PATH }), new Map())

		expect(error._tag).toBe("ConfigNotFoundError")
	})
})
