import { extractHeader } from '../driver.js';
import { discoverHeaders } from '../header/discover.js';
import type { HeaderScanResult, ScannedHeader } from '../types.js';
import { validateRootPath } from './validation.js';

/**
 * Discover every generated header under a project and extract each one.
 *
 * A header that breaks the generator's contract is reported on its own
 * entry; the remaining headers are still processed.
 */
export async function headerScan(rootPath: string): Promise<HeaderScanResult> {
  const pathResult = validateRootPath(rootPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  const headers = await discoverHeaders(pathResult.absolutePath);
  const scanned: ScannedHeader[] = [];

  for (const header of headers) {
    try {
      const output = await extractHeader(header.absolutePath);
      scanned.push({
        path: header.path,
        packageName: header.packageName,
        classCount: output.classes.size,
        warningCount: output.warnings.length,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      scanned.push({
        path: header.path,
        packageName: header.packageName,
        classCount: 0,
        warningCount: 0,
        error: message,
      });
    }
  }

  return { rootPath: pathResult.absolutePath, headers: scanned };
}
