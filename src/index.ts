#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadConfig } from './config.js';
import { createEngineFromConfig } from './engine/engine.js';
import { OperationJournal } from './journal/operationJournal.js';
import { createLogger } from './logger.js';
import { buildMcpServer } from './mcp/server.js';
import { PolicyEngine } from './policy/policyEngine.js';
import { HomeAssistantRegistryClient } from './registry/client.js';

async function main(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel, { pretty: config.logPretty });

  const client = new HomeAssistantRegistryClient({
    url: config.registryUrl,
    token: config.registryToken,
    timeoutMs: config.requestTimeoutMs,
    connectTimeoutMs: config.connectTimeoutMs,
    logger
  });
  const engine = createEngineFromConfig(config, { client, logger });
  const journal = new OperationJournal({
    maxEntries: config.journalMaxEntries,
    persistPath: config.journalPersistPath,
    logger
  });
  const policy = new PolicyEngine(config);

  const server = buildMcpServer({ engine, logger, policy, journal });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      transport: 'stdio',
      registryUrl: config.registryUrl,
      dataDir: config.dataDir,
      rulesPath: config.rulesPath,
      safeMode: config.safeMode
    },
    'mcp-registry-housekeeper running on stdio'
  );

  let closing = false;
  const shutdown = async () => {
    if (closing) {
      return;
    }
    closing = true;
    logger.info('Shutting down stdio server');
    try {
      await server.close();
      await engine.close();
    } catch (error) {
      logger.error({ err: error }, 'Shutdown did not complete cleanly');
    }
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown());
  process.on('SIGTERM', () => void shutdown());
}

main().catch((error) => {
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
