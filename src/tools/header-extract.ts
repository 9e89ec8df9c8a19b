import { extractHeader } from '../driver.js';
import { classesToRecord } from '../extractor/index.js';
import type { ExtractOptions } from '../extractor/index.js';
import type { HeaderExtractResult } from '../types.js';
import { validateHeaderPath } from './validation.js';

/**
 * Extract the binding model of one generated header.
 *
 * @param headerPath - Path to the `<package>-finch_bindgen.h` header.
 * @returns Classes keyed by name plus the warnings raised while decoding.
 */
export async function headerExtract(
  headerPath: string,
  options: ExtractOptions = {},
): Promise<HeaderExtractResult> {
  const pathResult = validateHeaderPath(headerPath);
  if (!pathResult.valid) {
    throw new Error(pathResult.error);
  }

  const output = await extractHeader(pathResult.absolutePath, options);

  return {
    headerPath: pathResult.absolutePath,
    packageNamespace: output.packageNamespace,
    classes: classesToRecord(output.classes),
    warnings: output.warnings,
  };
}
