/**
 * Scratch directories for tests that read exports from disk.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

export interface TempDir {
	path: string;
	write(name: string, content: string): string;
	cleanup(): void;
}

export function createTempDir(): TempDir {
	const path = mkdtempSync(join(tmpdir(), "index-tape-"));
	return {
		path,
		write(name, content) {
			const file = join(path, name);
			writeFileSync(file, content, "utf-8");
			return file;
		},
		cleanup() {
			rmSync(path, { recursive: true, force: true });
		},
	};
}
