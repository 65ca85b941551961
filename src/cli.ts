#!/usr/bin/env node
/**
 * Relay CLI
 *
 * Usage:
 *   llm-dialect-relay [--port n] [--host h] [--config path] [--progress] [-v]
 *
 * @packageDocumentation
 */

import { readFileSync } from 'node:fs';
import { CliUsageError, HELP_TEXT, parseArgs, type CliOptions } from './args.js';
import { loadConfig, type RelayConfig } from './config.js';
import { ConfigError } from './errors.js';
import { createLogger, describeError } from './logger.js';
import { ProgressLine } from './progress.js';
import { RelayServer } from './server.js';
import { formatStats } from './stats.js';

function readVersion(): string {
  try {
    const pkg: unknown = JSON.parse(readFileSync(new URL('../package.json', import.meta.url), 'utf8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch {
    // fall through to the placeholder version
  }
  return '0.0.0';
}

async function main(): Promise<void> {
  let cli: CliOptions;
  try {
    cli = parseArgs(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`Error: ${err.message}`);
      console.log(HELP_TEXT);
      process.exit(1);
    }
    throw err;
  }

  if (cli.help) {
    console.log(HELP_TEXT);
    process.exit(0);
  }
  if (cli.version) {
    console.log(`llm-dialect-relay v${readVersion()}`);
    process.exit(0);
  }

  const overrides: Record<string, unknown> = {};
  if (cli.port !== undefined) overrides['port'] = cli.port;
  if (cli.host !== undefined) overrides['host'] = cli.host;
  if (cli.progress) overrides['progress'] = true;
  if (cli.verbose) overrides['logLevel'] = 'debug';

  let config: RelayConfig;
  try {
    config = loadConfig({ configPath: cli.configPath, overrides });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(`Error: ${err.message}`);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel });
  const relay = new RelayServer({
    config,
    logger,
    progress: config.progress && process.stderr.isTTY ? new ProgressLine(process.stderr) : null,
  });

  relay.dispatcher.on('open', ({ id, url }: { id: string; url: string }) => {
    logger.debug(`[${id}] upstream open ${url}`);
  });
  relay.dispatcher.on('close', ({ id, durationMs }: { id: string; durationMs: number }) => {
    logger.debug(`[${id}] upstream closed after ${durationMs}ms`);
  });

  const address = await relay.start();
  logger.info(`Relay listening on http://${address.address}:${address.port}`);
  logger.info(
    `Upstream: ${config.upstreamBaseUrl} | Messages: ${config.anthropicBaseUrl} | Proxy: ${config.proxyUrl ?? 'direct'}`
  );
  logger.info(
    `Models mapped: ${Object.keys(config.modelMap).length} | Web search: ${config.enableWebSearch ? 'on' : 'off'}`
  );

  const shutdown = () => {
    logger.info('Relay shutting down...');
    for (const line of formatStats(relay.stats.getStats()).split('\n')) {
      logger.info(line);
    }
    relay.stop().then(
      () => process.exit(0),
      (err: unknown) => {
        logger.error(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      }
    );
    // Force exit after 5s
    setTimeout(() => process.exit(1), 5000).unref();
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((err: unknown) => {
  console.error(`Fatal: ${describeError(err)}`);
  process.exit(1);
});
