import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { Request, Response } from 'express';
import { moduleLogger } from './logger.js';

const log = moduleLogger('server');

/** Unset fields fall back to `TRANSPORT`, `PORT` and `HOST` from the environment. */
export interface ServerTransportConfig {
  transport?: 'stdio' | 'http';
  port?: number;
  host?: string;
  serverName?: string;
}

function transportFromEnv(): 'stdio' | 'http' {
  return process.env.TRANSPORT === 'http' ? 'http' : 'stdio';
}

/**
 * Connect an MCP server over stdio, or over stateless Streamable HTTP at
 * `POST /mcp` when `TRANSPORT=http`. Logs go to stderr either way.
 */
export async function startServer(
  server: McpServer,
  config: ServerTransportConfig = {}
): Promise<void> {
  const transport = config.transport || transportFromEnv();
  const serverName = config.serverName || 'mcp-server';

  if (transport === 'http') {
    await startHttpServer(server, config, serverName);
  } else {
    await startStdioServer(server, serverName);
  }
}

async function startStdioServer(server: McpServer, serverName: string): Promise<void> {
  const { StdioServerTransport } = await import('@modelcontextprotocol/sdk/server/stdio.js');
  const transport = new StdioServerTransport();
  await server.connect(transport);
  log.info({ server: serverName }, 'running on stdio');
}

async function startHttpServer(
  server: McpServer,
  config: ServerTransportConfig,
  serverName: string
): Promise<void> {
  const { StreamableHTTPServerTransport } = await import('@modelcontextprotocol/sdk/server/streamableHttp.js');
  const express = (await import('express')).default;

  const port = config.port || parseInt(process.env.PORT || '8005', 10);
  const host = config.host || process.env.HOST || '0.0.0.0';

  const app = express();
  app.use(express.json());

  app.post('/mcp', async (req: Request, res: Response) => {
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined, // stateless
      enableJsonResponse: true
    });

    res.on('close', () => {
      transport.close().catch((error: unknown) => {
        log.warn({ err: error instanceof Error ? error.message : String(error) }, 'failed to close MCP transport');
      });
    });

    try {
      await server.connect(transport);
      await transport.handleRequest(req, res, req.body);
    } catch (error) {
      log.error({ err: error instanceof Error ? error.message : String(error) }, 'MCP request failed');
      if (!res.headersSent) {
        res.status(500).json({ error: 'Internal server error' });
      }
    }
  });

  await new Promise<void>(resolve => {
    app.listen(port, host, () => resolve());
  });
  log.info({ server: serverName, url: `http://${host}:${port}/mcp` }, 'running on streamable HTTP');
}
