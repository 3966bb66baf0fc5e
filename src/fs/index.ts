/**
 * Async filesystem helpers used by the JSONL metrics store.
 *
 * @module fs
 */

import { randomUUID } from 'node:crypto'
import { appendFile, stat as fsStat, mkdir, readFile, rename, writeFile } from 'node:fs/promises'

/**
 * Check if a path exists (file or directory).
 */
export async function pathExists(filePath: string): Promise<boolean> {
	try {
		await fsStat(filePath)
		return true
	} catch {
		return false
	}
}

/**
 * Read a UTF-8 file.
 *
 * @throws Error if the file doesn't exist
 */
export async function readTextFile(filePath: string): Promise<string> {
	return readFile(filePath, 'utf8')
}

/**
 * Append content to a file, creating it if needed.
 */
export async function appendToFile(filePath: string, content: string): Promise<void> {
	await appendFile(filePath, content, 'utf8')
}

/**
 * Create a directory and any missing parents.
 */
export async function ensureDir(dirPath: string): Promise<void> {
	await mkdir(dirPath, { recursive: true })
}

/**
 * Get file statistics.
 *
 * @returns Object with size and mtimeMs
 */
export async function stat(filePath: string): Promise<{ size: number; mtimeMs: number }> {
	const s = await fsStat(filePath)
	return {
		size: s.size,
		mtimeMs: s.mtimeMs,
	}
}

/**
 * Write text file atomically (write to temp, then rename).
 */
export async function writeTextFileAtomic(filePath: string, content: string): Promise<void> {
	const tempPath = `${filePath}.${randomUUID()}.tmp`
	await writeFile(tempPath, content, 'utf8')
	await rename(tempPath, filePath)
}
