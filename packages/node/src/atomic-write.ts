/**
 * Atomic file replacement: write a temp file beside the target, then rename
 * it over the target. Readers see either the old file or the new one.
 */

import { randomBytes } from "node:crypto";
import { dirname } from "node:path";
import { ConfigIoError } from "@mailguard/core";
import { Effect, Exit } from "effect";
import { type FileOps, nodeFileOps } from "./file-ops.js";

// ============================================================================
// Configuration
// ============================================================================

export interface AtomicWriteOptions {
	readonly fileMode?: number;
	readonly dirMode?: number;
	readonly fileOps?: FileOps;
}

const defaultOptions: Required<AtomicWriteOptions> = {
	fileMode: 0o600,
	dirMode: 0o755,
	fileOps: nodeFileOps,
};

// ============================================================================
// Helpers
// ============================================================================

export const toIoError = (
	path: string,
	operation: ConfigIoError["operation"],
	error: unknown,
): ConfigIoError =>
	new ConfigIoError({
		path,
		operation,
		message:
			error instanceof Error ? error.message : `Unknown ${operation} error`,
		cause: error,
	});

interface TempFile {
	readonly path: string;
	readonly fd: number;
	closed: boolean;
}

const attempt = (step: string, path: string, run: () => void) =>
	Effect.try({ try: run, catch: (error) => error }).pipe(
		Effect.catchAll((error) =>
			Effect.logWarning(`Failed to ${step} temporary file`).pipe(
				Effect.annotateLogs({
					path,
					error: error instanceof Error ? error.message : String(error),
				}),
			),
		),
	);

/**
 * Closes (if still open) and removes a temp file after a failed write.
 * Cleanup failures are logged and never replace the original error.
 */
const discardTemp = (fileOps: FileOps, temp: TempFile) =>
	Effect.all([
		temp.closed
			? Effect.void
			: attempt("close", temp.path, () => fileOps.close(temp.fd)),
		attempt("remove", temp.path, () => fileOps.unlink(temp.path)),
	]).pipe(Effect.asVoid);

// ============================================================================
// Atomic write
// ============================================================================

/**
 * Replaces `path` with `data` atomically.
 *
 * The parent directory is created when missing. The temp file lives in
 * the same directory so the final rename stays on one filesystem. On any
 * failure the temp file is removed before the error propagates.
 * Failures are not retried.
 */
export const writeFileAtomic = (
	path: string,
	data: string,
	options: AtomicWriteOptions = {},
): Effect.Effect<void, ConfigIoError> => {
	const { fileMode, dirMode, fileOps } = { ...defaultOptions, ...options };
	const directory = dirname(path);
	const tempPath = `${path}.tmp.${randomBytes(8).toString("hex")}`;

	const ensureParentDir = Effect.try({
		try: () => fileOps.mkdir(directory, dirMode),
		catch: (error) => toIoError(directory, "mkdir", error),
	});

	const createTemp = Effect.try({
		try: (): TempFile => ({
			path: tempPath,
			fd: fileOps.openExclusive(tempPath, fileMode),
			closed: false,
		}),
		catch: (error) => toIoError(tempPath, "create-temp", error),
	});

	const writeAndRename = (temp: TempFile) =>
		Effect.try({
			try: () => {
				fileOps.write(temp.fd, data);
				fileOps.fsync(temp.fd);
				temp.closed = true;
				fileOps.close(temp.fd);
			},
			catch: (error) => toIoError(path, "write", error),
		}).pipe(
			Effect.andThen(
				Effect.try({
					try: () => fileOps.rename(temp.path, path),
					catch: (error) => toIoError(path, "rename", error),
				}),
			),
		);

	return ensureParentDir.pipe(
		Effect.andThen(
			Effect.acquireUseRelease(createTemp, writeAndRename, (temp, exit) =>
				Exit.isSuccess(exit) ? Effect.void : discardTemp(fileOps, temp),
			),
		),
		Effect.tap(() =>
			Effect.logDebug("Replaced file atomically").pipe(
				Effect.annotateLogs({ path, bytes: Buffer.byteLength(data, "utf-8") }),
			),
		),
	);
};
