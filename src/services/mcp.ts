// src/services/mcp.ts
// MCP client for the tool server sidecar, spoken to over stdio

import path from 'path';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport } from '@modelcontextprotocol/sdk/client/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import type { Config } from '../config.js';
import type { ToolCallResult, ToolDescriptor, ToolTransport } from '../tools/types.js';
import { info, warn, debug } from '../utils/logger.js';

const CLIENT_INFO = { name: 'weather-chat', version: '0.1.0' };

// Loose on purpose: servers add fields, and content items other than text
const CallResultSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() }).passthrough()).default([]),
  isError: z.boolean().optional(),
}).passthrough();

export interface ServerCommand {
  command: string;
  args: string[];
}

/**
 * Pick the interpreter for a tool server script: node for JavaScript,
 * python for Python. Anything else is rejected.
 */
export function resolveServerCommand(serverPath: string): ServerCommand {
  const ext = path.extname(serverPath).toLowerCase();

  if (ext === '.js' || ext === '.mjs' || ext === '.cjs') {
    return { command: process.execPath, args: [serverPath] };
  }
  if (ext === '.py') {
    return { command: 'python', args: [serverPath] };
  }

  throw new Error(`Tool server must be a .js or .py file: ${serverPath}`);
}

export class McpToolClient implements ToolTransport {
  private config: Config;
  private client: Client | null = null;
  private tools: ToolDescriptor[] = [];

  constructor(config: Config) {
    this.config = config;
  }

  /**
   * Spawn the server, run the initialize handshake and load its tool list.
   */
  async connect(serverPath: string): Promise<ToolDescriptor[]> {
    const { command, args } = resolveServerCommand(serverPath);

    info('Connecting to tool server', { command, args });

    return this.connectTransport(new StdioClientTransport({ command, args }));
  }

  /**
   * Handshake over an already constructed transport and load the tool list.
   */
  async connectTransport(transport: Transport): Promise<ToolDescriptor[]> {
    const client = new Client(CLIENT_INFO, { capabilities: {} });
    await client.connect(transport);
    this.client = client;

    this.tools = await this.listTools();

    const available = this.hasTool(this.config.tool.name);
    info('Tool server connected', {
      tools: this.getToolNames(),
      weatherTool: available ? 'available' : 'missing',
    });
    if (!available) {
      warn('Weather tool not offered by server', { tool: this.config.tool.name });
    }

    return this.tools;
  }

  async listTools(): Promise<ToolDescriptor[]> {
    const client = this.requireClient();
    const response = await client.listTools();
    return response.tools.map((tool) => ({
      name: tool.name,
      description: tool.description,
      inputSchema: tool.inputSchema,
    }));
  }

  hasTool(name: string): boolean {
    return this.tools.some((tool) => tool.name === name);
  }

  getToolNames(): string[] {
    return this.tools.map((tool) => tool.name);
  }

  async callTool(name: string, args: Record<string, unknown>): Promise<ToolCallResult | null> {
    const client = this.requireClient();

    debug('Calling MCP tool', { tool: name, args });

    const raw = await client.callTool(
      { name, arguments: args },
      undefined,
      { timeout: this.config.tool.timeout }
    );

    const parsed = CallResultSchema.safeParse(raw);
    if (!parsed.success) {
      warn('Unexpected tool call result shape', { tool: name, issues: parsed.error.issues.length });
      return null;
    }

    return {
      content: parsed.data.content.map((item) => ({ type: item.type, text: item.text })),
      isError: parsed.data.isError,
    };
  }

  async close(): Promise<void> {
    if (!this.client) return;

    try {
      await this.client.close();
    } catch (err) {
      warn('Error closing MCP client', { error: String(err) });
    }

    this.client = null;
    this.tools = [];
    info('Tool server disconnected');
  }

  private requireClient(): Client {
    if (!this.client) {
      throw new Error('Tool server is not connected');
    }
    return this.client;
  }
}
