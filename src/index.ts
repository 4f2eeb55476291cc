#!/usr/bin/env node

/**
 * civic-advisor - Entry Point
 *
 * Loads configuration and prompt templates, then runs one of:
 *   interactive (default), one-shot --query, http, mcp
 */

import { getConfig, printConfigInfo } from './config.js';
import { ConfigError, errorMessage } from './core/errors.js';
import { loadPromptStore } from './core/templates/PromptStore.js';
import { GeminiApiClient } from './infrastructure/http/GeminiApiClient.js';
import { WebServer } from './infrastructure/web/WebServer.js';
import { QueryRouterService } from './application/services/QueryRouterService.js';
import { InteractiveCli, runOnce } from './presentation/cli/InteractiveCli.js';
import { McpServer } from './presentation/McpServer.js';
import { DEFAULT_RETRY_CONFIG } from './utils/retry.js';
import { createLogger } from './utils/logger.js';

async function main(): Promise<number> {
  // Fails with ConfigError before anything touches the network
  const config = getConfig();
  const logger = createLogger(config.server.name, { debug: config.server.debug });
  const store = loadPromptStore(config.promptsDir);

  const client = new GeminiApiClient({
    apiKey: config.gemini.apiKey,
    apiUrl: config.gemini.apiUrl,
    model: config.gemini.model,
    temperature: config.gemini.temperature,
    maxOutputTokens: config.gemini.maxOutputTokens,
    timeoutMs: config.gemini.timeoutMs,
    retryConfig: { ...DEFAULT_RETRY_CONFIG, maxAttempts: config.gemini.retryAttempts },
    logger: logger.child('gemini'),
  });
  const router = new QueryRouterService(store, client, logger.child('router'));

  if (config.query !== undefined) {
    return runOnce(router, config.query);
  }

  printConfigInfo(config);

  if (config.mode === 'interactive') {
    await new InteractiveCli(router, { input: process.stdin, output: process.stdout }, logger.child('cli')).run();
    return 0;
  }

  let shutdownTask: () => Promise<void>;
  if (config.mode === 'http') {
    const webServer = new WebServer(router, config.http.port, logger.child('http'));
    await webServer.start();
    shutdownTask = () => webServer.stop();
  } else {
    const mcpServer = new McpServer(config, router, logger.child('mcp'));
    await mcpServer.start();
    shutdownTask = () => mcpServer.shutdown();
  }

  // Setup graceful shutdown
  return new Promise<number>((resolve) => {
    const shutdown = (signal: string) => {
      logger.info('Shutting down', { signal });
      shutdownTask().then(
        () => resolve(0),
        (error: unknown) => {
          logger.error('Shutdown failed', { error: errorMessage(error) });
          resolve(1);
        }
      );
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
  });
}

main().then(
  (code) => process.exit(code),
  (error: unknown) => {
    if (error instanceof ConfigError) {
      console.error(`\n❌ ${error.message}\n`);
    } else {
      console.error('💥 Fatal error in main():', error);
    }
    process.exit(1);
  }
);
