import { existsSync, statSync } from 'node:fs';
import { resolve, isAbsolute } from 'node:path';

/**
 * Validate that a header path exists and is a regular file.
 * Returns the resolved absolute path on success.
 */
export function validateHeaderPath(
  headerPath: string,
): { valid: true; absolutePath: string } | { valid: false; error: string } {
  const abs = isAbsolute(headerPath) ? headerPath : resolve(headerPath);
  if (!existsSync(abs)) {
    return { valid: false, error: `Header not found: ${abs}` };
  }
  if (!statSync(abs).isFile()) {
    return { valid: false, error: `Path is not a file: ${abs}` };
  }
  return { valid: true, absolutePath: abs };
}

/**
 * Validate that a project root exists and is a directory.
 */
export function validateRootPath(
  rootPath: string,
): { valid: true; absolutePath: string } | { valid: false; error: string } {
  const abs = isAbsolute(rootPath) ? rootPath : resolve(rootPath);
  if (!existsSync(abs)) {
    return { valid: false, error: `Path does not exist: ${abs}` };
  }
  if (!statSync(abs).isDirectory()) {
    return { valid: false, error: `Path is not a directory: ${abs}` };
  }
  return { valid: true, absolutePath: abs };
}

/**
 * Read a required string argument from an untyped tool call payload.
 */
export function requireStringArg(args: unknown, key: string): string {
  if (typeof args === 'object' && args !== null) {
    const value: unknown = Reflect.get(args, key);
    if (typeof value === 'string' && value.length > 0) {
      return value;
    }
  }
  throw new Error(`Missing required string argument: ${key}`);
}
