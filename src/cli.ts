#!/usr/bin/env node
/**
 * finch-bindgen: unified CLI entry point
 *
 * Subcommands:
 *   (none)            Start MCP server on stdio (editor integration)
 *   extract [header]  Print the binding model of a generated header
 *   scan [path]       List generated headers under a project
 *   help              Show usage information
 */

import { resolve, join } from 'node:path';
import { writeFile } from 'node:fs/promises';
import { headerNameForPackage, isQuiet } from './driver.js';
import { headerExtract } from './tools/header-extract.js';
import { headerScan } from './tools/header-scan.js';
import { toCamelCase, toPascalCase } from './naming.js';
import type { ClassDescriptor, Diagnostic, HeaderExtractResult } from './types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printUsage(): void {
  console.log(`
finch-bindgen: binding model extractor for generated finch headers

Usage:
  finch-bindgen                            Start MCP server (stdio) for editor integration
  finch-bindgen extract [header] [opts]    Print the binding model of a generated header
  finch-bindgen scan [path]                List generated headers under a project
  finch-bindgen help                       Show this help message

Options for 'extract':
  --package=<name>                         Read <name>-finch_bindgen.h from the current directory
  --out=<file>                             Write the JSON model to a file instead of stdout
  --summary                                Print a one-line-per-member outline instead of JSON

Environment:
  FINCH_BINDGEN_QUIET=1                    Do not print warnings to stderr

Path defaults to the current working directory if not specified.

Examples:
  finch-bindgen extract my_lib-finch_bindgen.h
  finch-bindgen extract --package=my-lib --summary
  finch-bindgen scan .
`.trim());
}

function warningsEnabled(): boolean {
  return !isQuiet();
}

function printWarning(diagnostic: Diagnostic): void {
  console.error(`[finch-bindgen] warning: ${diagnostic.message}`);
}

function summarizeClass(cls: ClassDescriptor): string[] {
  const lines = [`class ${toPascalCase(cls.name)} (${cls.cName})`];
  if (cls.ctor) {
    lines.push(`  new(${cls.ctor.argNames.map(toCamelCase).join(', ')})`);
  }
  for (const s of cls.statics) {
    lines.push(`  static ${toCamelCase(s.methodName)}(${s.argNames.map(toCamelCase).join(', ')}): ${s.returnType.displayName}`);
  }
  for (const m of cls.methods) {
    const consume = m.consume ? ' [consume]' : '';
    lines.push(`  ${toCamelCase(m.methodName)}(${m.argNames.map(toCamelCase).join(', ')}): ${m.returnType.displayName}${consume}`);
  }
  for (const g of cls.getters) {
    lines.push(`  get ${toCamelCase(g.fieldName)}: ${g.type.displayName}`);
  }
  for (const s of cls.setters) {
    lines.push(`  set ${toCamelCase(s.fieldName)}: ${s.type.displayName}`);
  }
  if (cls.dtor) {
    lines.push(`  drop -> ${cls.dtor.cFnName}`);
  }
  return lines;
}

function summarize(result: HeaderExtractResult): string {
  const lines = [`Package: ${result.packageNamespace ?? '(none)'}`];
  for (const cls of Object.values(result.classes)) {
    lines.push(...summarizeClass(cls));
  }
  if (result.warnings.length > 0) {
    lines.push(`Warnings: ${result.warnings.length}`);
  }
  return lines.join('\n');
}

// ---------------------------------------------------------------------------
// CLI Handlers
// ---------------------------------------------------------------------------

async function handleExtract(args: string[]): Promise<void> {
  // Parse options
  const positional: string[] = [];
  let packageName: string | undefined;
  let outFile: string | undefined;
  let summary = false;

  for (const arg of args) {
    if (arg.startsWith('--package=')) {
      packageName = arg.slice('--package='.length);
    } else if (arg.startsWith('--out=')) {
      outFile = arg.slice('--out='.length);
    } else if (arg === '--summary') {
      summary = true;
    } else if (!arg.startsWith('-')) {
      positional.push(arg);
    } else {
      console.error(`Unknown option: ${arg}`);
      process.exit(1);
    }
  }

  let headerPath: string;
  if (positional[0] !== undefined) {
    headerPath = resolve(positional[0]);
  } else if (packageName) {
    headerPath = join(process.cwd(), headerNameForPackage(packageName));
  } else {
    console.error('extract needs a header path or --package=<name>');
    process.exit(1);
  }

  const result = await headerExtract(headerPath, {
    onWarning: warningsEnabled() ? printWarning : undefined,
  });

  const text = summary ? summarize(result) : JSON.stringify(result, null, 2);

  if (outFile) {
    await writeFile(resolve(outFile), `${text}\n`, 'utf-8');
    console.log(`Wrote ${Object.keys(result.classes).length} classes to ${resolve(outFile)}`);
  } else {
    console.log(text);
  }
}

async function handleScan(args: string[]): Promise<void> {
  const rootPath = resolve(args[0] ?? process.cwd());
  const result = await headerScan(rootPath);

  if (result.headers.length === 0) {
    console.log(`No generated headers found under ${result.rootPath}`);
    return;
  }

  console.log(`Scanned: ${result.rootPath}`);
  for (const header of result.headers) {
    if (header.error !== undefined) {
      console.log(`  ${header.path}  error: ${header.error}`);
    } else {
      console.log(`  ${header.path}  classes: ${header.classCount}  warnings: ${header.warningCount}`);
    }
  }
}

// ---------------------------------------------------------------------------
// Main
// ---------------------------------------------------------------------------

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const subcommand = args[0];

  if (!subcommand) {
    const { startServer } = await import('./server.js');
    await startServer();
    return;
  }

  switch (subcommand) {
    case 'help':
    case '--help':
    case '-h':
      printUsage();
      break;

    case 'extract':
      await handleExtract(args.slice(1));
      break;

    case 'scan':
      await handleScan(args.slice(1));
      break;

    default:
      console.error(`Unknown command: ${subcommand}\n`);
      printUsage();
      process.exit(1);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error instanceof Error ? error.message : error);
  process.exit(1);
});
