#!/usr/bin/env node

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import {
  CapabilitiesService,
  loadConfig,
  loadServiceRegistryYaml,
  moduleLogger,
  startServer
} from '@ogc-explorer/core';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

import { listServices, listServicesSchema } from './tools/list_services.js';
import { getCapabilities, getCapabilitiesSchema } from './tools/get_capabilities.js';

const __dirname = dirname(fileURLToPath(import.meta.url));
const log = moduleLogger('ogc-mcp');

const config = loadConfig();
const registryFile = process.env.OGC_SERVICES_FILE || join(__dirname, '..', 'services.yaml');
const registry = loadServiceRegistryYaml(registryFile, config.maxUrlLength);
const capabilities = new CapabilitiesService({ registry, config });

const server = new McpServer({
  name: 'ogc-mcp',
  version: '0.1.0'
});

server.tool(
  'ogc_list_services',
  {
    kind: listServicesSchema.shape.kind
  },
  async (params) => {
    return listServices(listServicesSchema.parse(params), capabilities);
  }
);

server.tool(
  'ogc_get_capabilities',
  {
    service: getCapabilitiesSchema.shape.service,
    refresh: getCapabilitiesSchema.shape.refresh
  },
  async (params) => {
    return getCapabilities(getCapabilitiesSchema.parse(params), capabilities);
  }
);

server.server.onerror = (error) => log.error({ err: error.message }, 'server error');
process.on('SIGINT', () => {
  server.close().then(
    () => process.exit(0),
    (error: unknown) => {
      log.error({ err: error instanceof Error ? error.message : String(error) }, 'shutdown failed');
      process.exit(1);
    }
  );
});

startServer(server, { serverName: 'ogc-mcp' }).catch((error: unknown) => {
  log.fatal({ err: error instanceof Error ? error.message : String(error) }, 'fatal');
  process.exit(1);
});
