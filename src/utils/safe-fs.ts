/**
 * File access helpers that validate a path before touching the file system.
 *
 * Validation rejects empty paths and paths with NUL bytes, and resolves the
 * rest to absolute paths. Errors from the file system itself (missing file,
 * permission denied) are passed through unchanged.
 *
 * @packageDocumentation
 */

import * as fsSync from 'node:fs';
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
 * Synchronously reads a UTF-8 text file after validating the path.
 *
 * @param filePath - The path to the file to read.
 * @returns The file contents.
 * @throws {PathValidationError} If the path is invalid.
 * @throws {Error} If the file cannot be read (e.g., file not found, permission denied).
 */
export function safeReadTextFileSync(filePath: string): string {
  const validatedPath = validatePath(filePath);
  return fsSync.readFileSync(validatedPath, 'utf-8');
}

/**
 * Opens a UTF-8 read stream after validating the path.
 *
 * A missing file surfaces as an `error` event on the stream, not as a throw.
 *
 * @param filePath - The path to the file to read.
 * @returns The read stream.
 * @throws {PathValidationError} If the path is invalid.
 */
export function safeCreateReadStream(filePath: string): fsSync.ReadStream {
  const validatedPath = validatePath(filePath);
  return fsSync.createReadStream(validatedPath, { encoding: 'utf-8' });
}
