import { readFile } from "node:fs/promises";
import { extractBindings } from "./extractor/index.js";
import type { ExtractOptions } from "./extractor/index.js";
import { parseHeader } from "./header/parser.js";
import type { ExtractionOutput } from "./types.js";

/** Suffix of the header the generator writes for a package. */
export const HEADER_SUFFIX = "-finch_bindgen.h";

/** `my-lib` -> `my_lib-finch_bindgen.h` */
export function headerNameForPackage(packageName: string): string {
  return `${packageName.replace(/-/g, "_")}${HEADER_SUFFIX}`;
}

/** `FINCH_BINDGEN_QUIET=1` keeps warnings and notices off stderr. */
export function isQuiet(): boolean {
  return process.env.FINCH_BINDGEN_QUIET === "1";
}

/**
 * Extract the binding model from header source text.
 *
 * Throws `ExtractionError` when the header breaks the generator's contract;
 * no partial output is returned in that case.
 */
export function extractSource(
  source: string,
  filePath: string,
  options: ExtractOptions = {},
): ExtractionOutput {
  const parsed = parseHeader(source, filePath);
  if (parsed.hasSyntaxErrors && !isQuiet()) {
    console.error(
      `[finch-bindgen] ${filePath} has syntax errors; declarations inside them are skipped`,
    );
  }
  return extractBindings(parsed.root, options);
}

/** Read a generated header from disk and extract its binding model. */
export async function extractHeader(
  headerPath: string,
  options: ExtractOptions = {},
): Promise<ExtractionOutput> {
  const source = await readFile(headerPath, "utf-8");
  return extractSource(source, headerPath, options);
}
