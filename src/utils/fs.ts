import { existsSync } from 'fs';
import { readFile, writeFile, mkdir, readdir, rename, rm, access } from 'fs/promises';
import { dirname, join } from 'path';

/**
 * Ensure a directory exists, creating it recursively if needed
 */
export async function ensureDir(dirPath: string): Promise<void> {
  try {
    await access(dirPath);
  } catch {
    await mkdir(dirPath, { recursive: true });
  }
}

/**
 * Read file content safely, returns null if file doesn't exist
 */
export async function readFileSafe(filePath: string): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf-8');
  } catch {
    return null;
  }
}

/**
 * Read and parse a JSON file. Null when the file is missing; parse errors throw.
 */
export async function readJson(filePath: string): Promise<unknown> {
  const content = await readFileSafe(filePath);
  if (content === null) return null;
  const parsed: unknown = JSON.parse(content);
  return parsed;
}

/**
 * Write a JSON document, creating parent directories. Whole-file overwrite.
 */
export async function writeJson(filePath: string, value: unknown): Promise<void> {
  await ensureDir(dirname(filePath));
  await writeFile(filePath, JSON.stringify(value, null, 2), 'utf-8');
}

/**
 * Names (without extension) of the `.json` files directly inside a directory, sorted.
 */
export async function listJsonNames(dirPath: string): Promise<string[]> {
  let entries;
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch {
    return [];
  }
  return entries
    .filter(e => e.isFile() && e.name.endsWith('.json'))
    .map(e => e.name.slice(0, -'.json'.length))
    .sort();
}

/**
 * Move a file, creating the destination directory.
 */
export async function moveFile(from: string, to: string): Promise<void> {
  await ensureDir(dirname(to));
  await rename(from, to);
}

export async function removeFile(filePath: string): Promise<boolean> {
  if (!existsSync(filePath)) return false;
  await rm(filePath);
  return true;
}

export function pathExists(p: string): boolean {
  return existsSync(p);
}

export function jsonPath(dir: string, name: string): string {
  return join(dir, `${name}.json`);
}

/**
 * Truncate a string to a maximum length with ellipsis
 */
export function truncate(str: string, maxLength: number): string {
  if (str.length <= maxLength) return str;
  return str.substring(0, maxLength - 3) + '...';
}
