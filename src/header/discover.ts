import { readFile, stat } from "node:fs/promises";
import { basename, join } from "node:path";
import fg from "fast-glob";
import ignore from "ignore";
import { HEADER_SUFFIX } from "../driver.js";
import type { DiscoveredHeader } from "../types.js";

/** Directories that never hold a header worth reading. */
const DEFAULT_IGNORE_PATTERNS: string[] = ["node_modules", "target", "dist", "build", ".git"];

/** `crates/my_lib/include/my_lib-finch_bindgen.h` -> `my_lib` */
export function packageNameOf(headerPath: string): string {
  const fileName = basename(headerPath);
  return fileName.endsWith(HEADER_SUFFIX)
    ? fileName.slice(0, fileName.length - HEADER_SUFFIX.length)
    : fileName;
}

async function loadIgnoreRules(rootDir: string): Promise<ReturnType<typeof ignore>> {
  const rules = ignore().add(DEFAULT_IGNORE_PATTERNS);
  try {
    rules.add(await readFile(join(rootDir, ".gitignore"), "utf-8"));
  } catch {
    // no .gitignore: defaults only
  }
  return rules;
}

async function describeHeader(rootDir: string, relPath: string): Promise<DiscoveredHeader | null> {
  const absolutePath = join(rootDir, relPath);
  try {
    const { mtimeMs, size } = await stat(absolutePath);
    return { path: relPath, absolutePath, packageName: packageNameOf(relPath), mtime: mtimeMs, size };
  } catch {
    // removed between glob and stat
    return null;
  }
}

/**
 * Find generated binding headers (`<package>-finch_bindgen.h`) under a
 * project directory, honouring .gitignore. Sorted by relative path.
 */
export async function discoverHeaders(rootDir: string): Promise<DiscoveredHeader[]> {
  const rules = await loadIgnoreRules(rootDir);

  const candidates = await fg(`**/*${HEADER_SUFFIX}`, {
    cwd: rootDir,
    dot: false,
    onlyFiles: true,
    followSymbolicLinks: false,
    ignore: DEFAULT_IGNORE_PATTERNS.map((p) => `**/${p}/**`),
  });

  const kept = candidates.filter((relPath) => !rules.ignores(relPath)).sort();
  const headers = await Promise.all(kept.map((relPath) => describeHeader(rootDir, relPath)));

  return headers.filter((h): h is DiscoveredHeader => h !== null);
}
