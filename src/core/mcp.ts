// src/core/mcp.ts
/**
 * MCP (Model Context Protocol) tool executor.
 * Reads the server list from the MCP config file, starts each stdio server on
 * first use and routes `TOOL_CALL` requests to it.
 */
import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StdioClientTransport, getDefaultEnvironment } from '@modelcontextprotocol/sdk/client/stdio.js';
import { config } from '../config.js';
import { logger } from '../utils/logger.js';
import { asError } from './errors.js';
import { isRecord } from './json_repair.js';
import type { ToolExecutor } from '../types/index.js';

const serverSchema = z.object({
  name: z.string().min(1),
  command: z.string().min(1),
  args: z.array(z.string()).optional(),
  env: z.record(z.string()).optional(),
  enabled: z.boolean().optional(),
  /** Tool call timeout in ms */
  timeout: z.number().positive().optional(),
});

const configSchema = z.object({
  servers: z.array(serverSchema),
});

/** MCP Server configuration */
export type MCPServerConfig = z.infer<typeof serverSchema>;

/** MCP configuration file structure */
type MCPConfig = z.infer<typeof configSchema>;

/** A live session with one server */
export interface MCPConnection {
  callTool(toolName: string, args: Record<string, unknown>): Promise<string>;
  close(): Promise<void>;
}

export type MCPConnector = (server: MCPServerConfig) => Promise<MCPConnection>;

const DEFAULT_TOOL_TIMEOUT_MS = 120000;

/**
 * Flattens an MCP tool result into text.
 */
export function toolResultText(result: Record<string, unknown>): string {
  const content = result.content;
  if (!Array.isArray(content)) return JSON.stringify(result);

  const unknownItems: unknown[] = content;
  return unknownItems
    .map(item => (isRecord(item) && item.type === 'text' && typeof item.text === 'string' ? item.text : JSON.stringify(item)))
    .join('\n');
}

/**
 * Connects to a stdio MCP server with the SDK client.
 */
export const stdioConnector: MCPConnector = async server => {
  const transport = new StdioClientTransport({
    command: server.command,
    args: server.args ?? [],
    env: { ...getDefaultEnvironment(), ...server.env },
    stderr: 'pipe',
  });
  const client = new Client({ name: 'tether', version: config.app.version }, { capabilities: {} });
  await client.connect(transport);

  const timeout = server.timeout ?? DEFAULT_TOOL_TIMEOUT_MS;
  return {
    async callTool(toolName, args) {
      const result = await client.callTool({ name: toolName, arguments: args }, undefined, { timeout });
      const text = toolResultText(result);
      if (result.isError === true) {
        throw new Error(text || `Tool ${toolName} reported an error`);
      }
      return text;
    },
    close: () => client.close(),
  };
};

/**
 * MCPClient - Manages MCP server configuration and connections.
 */
export class MCPClient implements ToolExecutor {
  private readonly configPath: string;
  private readonly connector: MCPConnector;
  private config: MCPConfig = { servers: [] };
  private readonly connections = new Map<string, Promise<MCPConnection>>();

  constructor(options: { configPath?: string; connector?: MCPConnector } = {}) {
    this.configPath = options.configPath ?? config.paths.mcpConfigFile;
    this.connector = options.connector ?? stdioConnector;
    this.ensureConfigExists();
    this.loadConfig();
  }

  /**
   * Ensures the MCP configuration file exists.
   */
  private ensureConfigExists(): void {
    try {
      fs.mkdirSync(path.dirname(this.configPath), { recursive: true });
      if (!fs.existsSync(this.configPath)) {
        const defaultConfig: MCPConfig = { servers: [] };
        fs.writeFileSync(this.configPath, JSON.stringify(defaultConfig, null, 2));
        logger.info('Created default MCP config', { path: this.configPath });
      }
    } catch (e) {
      logger.error('Failed to create MCP config', e);
    }
  }

  /**
   * Loads the MCP configuration from disk.
   */
  private loadConfig(): void {
    try {
      const parsed = configSchema.safeParse(JSON.parse(fs.readFileSync(this.configPath, 'utf-8')));
      if (parsed.success) {
        this.config = parsed.data;
        logger.info('MCP config loaded', { serverCount: this.config.servers.length });
      } else {
        logger.warn('Invalid MCP config; no servers loaded', { issues: parsed.error.issues.map(i => i.message) });
      }
    } catch (e) {
      logger.warn('Failed to load MCP config', e);
      this.config = { servers: [] };
    }
  }

  /**
   * Runs a tool on a configured server, connecting on first use.
   * A connection that fails is dropped so the next call reconnects.
   */
  async callTool(serverName: string, toolName: string, args: Record<string, unknown>): Promise<string> {
    const server = this.config.servers.find(s => s.name === serverName);
    if (!server) {
      throw new Error(`MCP server "${serverName}" is not configured`);
    }
    if (server.enabled === false) {
      throw new Error(`MCP server "${serverName}" is disabled`);
    }

    logger.action(`tool:${serverName}.${toolName}`, args);

    let pending = this.connections.get(serverName);
    if (!pending) {
      pending = this.connector(server);
      this.connections.set(serverName, pending);
    }

    try {
      const connection = await pending;
      return await connection.callTool(toolName, args);
    } catch (e) {
      const error = asError(e);
      if (/not connected|connection closed/i.test(error.message) || !(await this.isLive(pending))) {
        this.connections.delete(serverName);
      }
      logger.error(`MCP tool call failed [${serverName}/${toolName}]`, error);
      throw error;
    }
  }

  private async isLive(pending: Promise<MCPConnection>): Promise<boolean> {
    try {
      await pending;
      return true;
    } catch {
      return false;
    }
  }

  listServers(): MCPServerConfig[] {
    return [...this.config.servers];
  }

  private async disconnect(name: string): Promise<void> {
    const pending = this.connections.get(name);
    if (!pending) return;
    this.connections.delete(name);
    try {
      await (await pending).close();
    } catch (e) {
      logger.debug(`MCP server "${name}" close error`, { error: asError(e).message });
    }
  }

  /**
   * Closes every open server connection.
   */
  async disconnectAll(): Promise<void> {
    for (const name of [...this.connections.keys()]) {
      await this.disconnect(name);
    }
  }
}
