import * as fs from "node:fs";

/**
 * The synchronous filesystem calls the config store makes. Swapped out in
 * tests to simulate failures part-way through a save.
 */
export interface FileOps {
	readonly readFile: (path: string) => string;
	readonly exists: (path: string) => boolean;
	readonly mkdir: (path: string, mode: number) => void;
	/** Creates and opens a new file; fails if it already exists. */
	readonly openExclusive: (path: string, mode: number) => number;
	readonly write: (fd: number, data: string) => void;
	readonly fsync: (fd: number) => void;
	readonly close: (fd: number) => void;
	readonly rename: (from: string, to: string) => void;
	readonly unlink: (path: string) => void;
}

export const nodeFileOps: FileOps = {
	readFile: (path) => fs.readFileSync(path, "utf-8"),
	exists: (path) => fs.existsSync(path),
	mkdir: (path, mode) => {
		fs.mkdirSync(path, { recursive: true, mode });
	},
	openExclusive: (path, mode) => fs.openSync(path, "wx", mode),
	write: (fd, data) => {
		fs.writeFileSync(fd, data, "utf-8");
	},
	fsync: (fd) => fs.fsyncSync(fd),
	close: (fd) => fs.closeSync(fd),
	rename: (from, to) => fs.renameSync(from, to),
	unlink: (path) => fs.unlinkSync(path),
};
