/**
 * File system wrappers that validate every path before use.
 *
 * Session ids, catalog paths and sessions directories reach these functions
 * from CLI arguments, MCP tool calls and environment variables. Each path is
 * checked and resolved to an absolute path before any operation runs.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';

/**
 * Error thrown when path validation fails.
 */
export class PathValidationError extends Error {
  /** The invalid path that caused the error. */
  public readonly invalidPath: string;

  /**
   * Creates a new PathValidationError.
   *
   * @param message - Human-readable error message.
   * @param invalidPath - The path that failed validation.
   */
  constructor(message: string, invalidPath: string) {
    super(message);
    this.name = 'PathValidationError';
    this.invalidPath = invalidPath;
  }
}

/**
 * Validates and resolves a file system path.
 *
 * @param filePath - The path to validate.
 * @returns The resolved absolute path.
 * @throws {PathValidationError} If the path is empty or contains null bytes.
 */
export function validatePath(filePath: string): string {
  if (typeof filePath !== 'string') {
    throw new PathValidationError('Path must be a string', String(filePath));
  }

  if (filePath.length === 0) {
    throw new PathValidationError('Path cannot be empty', filePath);
  }

  if (filePath.includes('\0')) {
    throw new PathValidationError('Path cannot contain null bytes', filePath);
  }

  const resolved = path.resolve(filePath);

  if (!path.isAbsolute(resolved)) {
    throw new PathValidationError('Path must resolve to an absolute path', filePath);
  }

  return resolved;
}

/**
 * Resolves `name` inside `baseDir`, rejecting names that would escape it.
 *
 * @param baseDir - The containing directory.
 * @param name - A single file name (no separators).
 * @returns The absolute path of the file.
 * @throws {PathValidationError} If `name` is empty, contains a separator or escapes `baseDir`.
 */
export function resolveWithin(baseDir: string, name: string): string {
  const base = validatePath(baseDir);

  if (name.length === 0 || name === '.' || name === '..' || /[/\\]/.test(name)) {
    throw new PathValidationError('File name must be a single path segment', name);
  }

  const resolved = validatePath(path.join(base, name));
  if (path.dirname(resolved) !== base) {
    throw new PathValidationError('File name escapes its directory', name);
  }
  return resolved;
}

/**
 * Reads a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReadFile(filePath: string): Promise<string> {
  const validatedPath = validatePath(filePath);
  return fs.readFile(validatedPath, 'utf-8');
}

/**
 * Writes a UTF-8 text file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeWriteFile(
  filePath: string,
  data: string,
  options?: { mode?: number; flag?: string }
): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.writeFile(validatedPath, data, { encoding: 'utf-8', ...options });
}

/**
 * Appends UTF-8 text to a file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeAppendFile(filePath: string, data: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.appendFile(validatedPath, data, 'utf-8');
}

/**
 * Creates a directory (recursively) after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeMkdir(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  await fs.mkdir(validatedPath, { recursive: true });
}

/**
 * Lists the entry names of a directory after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeReaddir(filePath: string): Promise<string[]> {
  const validatedPath = validatePath(filePath);
  return fs.readdir(validatedPath);
}

/**
 * Deletes a file after validating the path.
 *
 * @throws {PathValidationError} If the path is invalid.
 */
export async function safeUnlink(filePath: string): Promise<void> {
  const validatedPath = validatePath(filePath);
  return fs.unlink(validatedPath);
}

/**
 * Renames a file after validating both paths.
 *
 * @throws {PathValidationError} If either path is invalid.
 */
export async function safeRename(oldPath: string, newPath: string): Promise<void> {
  const validatedOldPath = validatePath(oldPath);
  const validatedNewPath = validatePath(newPath);
  return fs.rename(validatedOldPath, validatedNewPath);
}

/**
 * Creates a hard link after validating both paths. Fails with `EEXIST` if
 * `newPath` already exists.
 *
 * @throws {PathValidationError} If either path is invalid.
 */
export async function safeLink(existingPath: string, newPath: string): Promise<void> {
  const validatedExistingPath = validatePath(existingPath);
  const validatedNewPath = validatePath(newPath);
  return fs.link(validatedExistingPath, validatedNewPath);
}

/**
 * Checks whether an error is a Node.js system error with the given code.
 *
 * @param error - The caught value.
 * @param code - The errno code, e.g. `ENOENT`.
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof (error as NodeJS.ErrnoException).code === 'string' &&
    (error as NodeJS.ErrnoException).code === code
  );
}
