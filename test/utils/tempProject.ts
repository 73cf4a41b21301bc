// Test helper: isolated temporary directories for loader/reporter/pipeline tests

import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";

/**
 * Result of creating a temporary workspace.
 *
 * Postconditions:
 * - cwd points to an empty directory that exists
 * - cleanup() removes the directory recursively
 */
export interface TempProject {
	readonly cwd: string;
	readonly file: (name: string) => string;
	readonly write: (name: string, content: string) => string;
	readonly read: (name: string) => string;
	readonly exists: (name: string) => boolean;
	readonly cleanup: () => void;
}

/**
 * Create an empty temporary directory.
 *
 * @example
 * const t = createTempProject();
 * const input = t.write("input.txt", "Hello\n");
 * // ... run tests ...
 * t.cleanup();
 */
export function createTempProject(): TempProject {
	const cwd = fs.mkdtempSync(path.join(os.tmpdir(), "text-stats-test-"));
	const file = (name: string): string => path.join(cwd, name);

	return {
		cwd,
		file,
		write: (name, content) => {
			const target = file(name);
			fs.writeFileSync(target, content, { encoding: "utf-8" });
			return target;
		},
		read: (name) => fs.readFileSync(file(name), "utf-8"),
		exists: (name) => fs.existsSync(file(name)),
		cleanup: () => {
			fs.rmSync(cwd, { recursive: true, force: true });
		},
	};
}
