import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { headerExtract } from './tools/header-extract.js';
import { headerScan } from './tools/header-scan.js';
import { requireStringArg } from './tools/validation.js';

// ---------------------------------------------------------------------------
// Tool definitions
// ---------------------------------------------------------------------------

const TOOL_DEFINITIONS = [
  {
    name: 'header_extract',
    description:
      'Extract the class binding model (constructors, destructors, methods, statics, getters, setters and their argument/return types) from a generated <package>-finch_bindgen.h header. Returns classes keyed by name plus any warnings for declarations that were skipped.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        header_path: {
          type: 'string',
          description: 'Absolute path to the generated header',
        },
      },
      required: ['header_path'],
    },
  },
  {
    name: 'header_scan',
    description:
      'Find every generated *-finch_bindgen.h header under a project directory (respecting .gitignore) and report how many classes and warnings each one yields. Use header_extract afterwards for the full model of one header.',
    inputSchema: {
      type: 'object' as const,
      properties: {
        root_path: {
          type: 'string',
          description: 'Absolute path to the project root (use the current working directory)',
        },
      },
      required: ['root_path'],
    },
  },
];

// ---------------------------------------------------------------------------
// Dispatch
// ---------------------------------------------------------------------------

type ToolHandler = (args: unknown) => Promise<unknown>;

const TOOL_HANDLERS: Record<string, ToolHandler> = {
  header_extract: (args) => headerExtract(requireStringArg(args, 'header_path')),
  header_scan: (args) => headerScan(requireStringArg(args, 'root_path')),
};

function textResult(payload: unknown, isError = false) {
  return {
    content: [{ type: 'text' as const, text: JSON.stringify(payload, null, isError ? undefined : 2) }],
    ...(isError ? { isError: true } : {}),
  };
}

// ---------------------------------------------------------------------------
// startServer (exported for cli.ts)
// ---------------------------------------------------------------------------

export async function startServer(): Promise<void> {
  const server = new Server(
    { name: 'finch-bindgen', version: '0.1.0' },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOL_DEFINITIONS }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args } = request.params;
    const handler = Object.prototype.hasOwnProperty.call(TOOL_HANDLERS, name)
      ? TOOL_HANDLERS[name]
      : undefined;
    if (!handler) {
      return textResult({ error: `Unknown tool: ${name}` }, true);
    }

    try {
      return textResult(await handler(args));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return textResult({ error: message }, true);
    }
  });

  function shutdown(): void {
    server.close().then(
      () => process.exit(0),
      (error: unknown) => {
        console.error('[finch-bindgen] error during shutdown:', error);
        process.exit(1);
      },
    );
  }

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  await server.connect(new StdioServerTransport());
}
