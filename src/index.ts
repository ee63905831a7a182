#!/usr/bin/env node

import './utils/stdioHygiene.js';

import { fileURLToPath } from 'url';
import { realpathSync } from 'fs';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';

import { getTools, handleToolCall, toolModeFromEnv, type ToolExposureMode } from './tools/index.js';
import { runParseCli } from './ocean/cli.js';
import { SERVER_NAME, SERVER_VERSION } from './constants.js';

export { parseOceanRun } from './ocean/parser.js';
export type { OceanParseOptions, OceanParseResult } from './ocean/parser.js';
export { serializeParseResult, serializeChildRun } from './ocean/output.js';

const TOOL_MODE: ToolExposureMode = toolModeFromEnv();

function createServer(): Server {
  const server = new Server(
    {
      name: SERVER_NAME,
      version: SERVER_VERSION,
    },
    {
      capabilities: {
        tools: {},
      },
    }
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => {
    return { tools: getTools(TOOL_MODE) };
  });

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    return handleToolCall(request.params.name, request.params.arguments ?? {}, TOOL_MODE);
  });

  return server;
}

interface SimpleJsonRpcRequest {
  jsonrpc?: string;
  id?: string | number | null;
  method?: string;
  params?: Record<string, unknown>;
}

function simpleJsonRpcResult(
  id: string | number | null | undefined,
  result: unknown,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    result,
  };
}

function simpleJsonRpcError(
  id: string | number | null | undefined,
  code: number,
  message: string,
): Record<string, unknown> {
  return {
    jsonrpc: '2.0',
    id: id ?? null,
    error: { code, message },
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toSimpleRequest(value: Record<string, unknown>): SimpleJsonRpcRequest {
  const { id, method, params } = value;
  return {
    id: typeof id === 'string' || typeof id === 'number' ? id : null,
    method: typeof method === 'string' ? method : undefined,
    params: isRecord(params) ? params : undefined,
  };
}

export async function handleSimpleJsonRpcRequest(request: SimpleJsonRpcRequest): Promise<Record<string, unknown>> {
  if (request.method === 'tools/list') {
    return simpleJsonRpcResult(request.id, { tools: getTools(TOOL_MODE) });
  }

  if (request.method === 'tools/call') {
    const params = request.params ?? {};
    const name = typeof params.name === 'string' ? params.name : '';
    const args = isRecord(params.arguments) ? params.arguments : {};
    if (name.length === 0) {
      return simpleJsonRpcError(request.id, -32602, 'Invalid params: tools/call requires name');
    }
    const response = await handleToolCall(name, args, TOOL_MODE);
    return simpleJsonRpcResult(request.id, response);
  }

  return simpleJsonRpcError(request.id, -32601, `Method not found: ${request.method ?? '(missing)'}`);
}

async function maybeServeSimpleJsonRpcOnce(): Promise<boolean> {
  if (process.stdin.isTTY) return false;

  const firstChunk = await new Promise<Buffer | null>((resolve) => {
    let settled = false;
    const onData = (chunk: string | Buffer): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    };
    const onEnd = (): void => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(null);
    };
    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      cleanup();
      resolve(Buffer.alloc(0));
    }, 30);
    const cleanup = (): void => {
      clearTimeout(timer);
      process.stdin.off('data', onData);
      process.stdin.off('end', onEnd);
    };

    process.stdin.on('data', onData);
    process.stdin.on('end', onEnd);
    process.stdin.resume();
  });

  if (firstChunk === null || firstChunk.length === 0) {
    return false;
  }

  const firstText = firstChunk.toString('utf-8');
  if (!firstText.trimStart().startsWith('{')) {
    process.stdin.unshift(firstChunk);
    return false;
  }

  let payload = firstText;
  for await (const chunk of process.stdin) {
    payload += (typeof chunk === 'string' ? chunk : Buffer.from(chunk).toString('utf-8'));
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(payload.trim());
  } catch {
    const error = simpleJsonRpcError(null, -32700, 'Parse error');
    process.stdout.write(`${JSON.stringify(error)}\n`);
    return true;
  }
  if (!isRecord(parsed)) {
    const error = simpleJsonRpcError(null, -32600, 'Invalid Request');
    process.stdout.write(`${JSON.stringify(error)}\n`);
    return true;
  }

  const response = await handleSimpleJsonRpcRequest(toSimpleRequest(parsed));
  process.stdout.write(`${JSON.stringify(response)}\n`);
  return true;
}

async function main() {
  if (process.argv[2] === 'parse') {
    await runParseCli(process.argv.slice(3));
    return;
  }

  if (await maybeServeSimpleJsonRpcOnce()) {
    console.error('[ocean-mcp] Served one-shot simple JSON-RPC request');
    return;
  }

  const transport = new StdioServerTransport();
  await createServer().connect(transport);
  console.error('[ocean-mcp] Server started');
}

const isExecutedAsScript = (() => {
  try {
    const entryPath = process.argv[1] ? realpathSync(process.argv[1]) : '';
    const modulePath = fileURLToPath(import.meta.url);
    return entryPath === modulePath;
  } catch {
    return false;
  }
})();

if (isExecutedAsScript) {
  main().catch(err => {
    console.error('[ocean-mcp] Fatal:', err);
    process.exitCode = 1;
  });
}
