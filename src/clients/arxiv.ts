/**
 * arXiv MCP Client
 * Spawns arXiv MCP server as a subprocess for download_paper / read_paper
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { access } from 'fs/promises';
import { constants } from 'fs';
import { z } from 'zod';
import { Env } from '../config.js';

/**
 * The slice of the MCP client the structurer needs; lets tests hand in a fake
 */
export interface ToolCaller {
  callTool(params: { name: string; arguments: Record<string, string> }, options?: { signal?: AbortSignal }): Promise<unknown>;
}

export interface ArxivClient {
  client: ToolCaller;
  close: () => Promise<void>;
}

export type ArxivToolName = 'read_paper' | 'download_paper';

const toolResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  isError: z.boolean().optional(),
});

/**
 * Discover the path to the uv binary.
 * Checks in order:
 * 1. UV_BINARY_PATH environment variable
 * 2. Common installation paths
 * 3. System PATH (via 'uv' command)
 */
async function discoverUvPath(env: Env): Promise<string> {
  const envPath = env.UV_BINARY_PATH;
  if (envPath) {
    try {
      await access(envPath, constants.F_OK);
      console.error(`[arXiv Client] Using uv from UV_BINARY_PATH: ${envPath}`);
      return envPath;
    } catch {
      console.error(`[arXiv Client] UV_BINARY_PATH set but file not found: ${envPath}`);
    }
  }

  const commonPaths = [
    '/opt/homebrew/bin/uv', // Apple Silicon Homebrew
    '/usr/local/bin/uv',    // Intel Mac Homebrew / Linux
    join(homedir(), '.local/bin/uv'),
    join(homedir(), '.cargo/bin/uv'),
  ];

  for (const path of commonPaths) {
    const found = await access(path, constants.F_OK).then(() => true, () => false);
    if (found) {
      console.error(`[arXiv Client] Found uv at: ${path}`);
      return path;
    }
  }

  console.error('[arXiv Client] Using uv from PATH');
  return 'uv';
}

export async function createArxivClient(env: Env, storagePath?: string): Promise<ArxivClient> {
  console.error('[arXiv Client] Spawning arXiv MCP subprocess...');

  const path = storagePath || env.ARXIV_STORAGE_PATH || join(homedir(), '.arxiv-mcp');
  const uvPath = await discoverUvPath(env);

  const transport = new StdioClientTransport({
    command: uvPath,
    args: ['tool', 'run', 'arxiv-mcp-server', '--storage-path', path],
  });

  const client = new Client({
    name: 'lit-research-arxiv-client',
    version: '0.1.0',
  });

  try {
    await client.connect(transport);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const isPathError = errorMessage.includes('ENOENT') ||
                       errorMessage.includes('spawn') ||
                       errorMessage.includes('not found');
    if (isPathError) {
      throw new Error(
        `Failed to spawn arxiv-mcp-server: uv binary not found. ` +
        `Install uv or set UV_BINARY_PATH. Original error: ${errorMessage}`
      );
    }
    console.error(`[arXiv Client] Connection failed: ${errorMessage}`);
    throw error;
  }
  console.error('[arXiv Client] Connected successfully');

  return {
    client: {
      callTool: (params, options) => client.callTool(params, undefined, options),
    },
    close: async () => {
      await client.close();
      console.error('[arXiv Client] Closed');
    },
  };
}

/**
 * Call an arXiv MCP tool and return its text content.
 * Different arXiv MCP servers have used different parameter names historically,
 * so the strict name is tried first and the older ones as fallbacks.
 */
export async function callArxivTool(
  client: ToolCaller,
  toolName: ArxivToolName,
  arxivId: string,
  signal?: AbortSignal
): Promise<string> {
  const argumentVariants: Array<Record<string, string>> = [
    { paper_id: arxivId },
    { arxiv_id: arxivId },
  ];

  let lastError: unknown;
  for (const args of argumentVariants) {
    if (signal?.aborted) break;
    try {
      const raw = await client.callTool({ name: toolName, arguments: args }, { signal });
      const parsed = toolResultSchema.safeParse(raw);
      if (!parsed.success) {
        throw new Error(`${toolName} returned an unexpected result shape`);
      }
      const text = parsed.data.content
        .filter(block => block.type === 'text' && block.text)
        .map(block => block.text)
        .join('\n');
      if (parsed.data.isError) {
        throw new Error(`${toolName} failed: ${text.slice(0, 200)}`);
      }
      return text;
    } catch (err) {
      lastError = err;
    }
  }

  throw lastError ?? new Error(`${toolName} aborted for ${arxivId}`);
}
