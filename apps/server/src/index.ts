#!/usr/bin/env node

import { Command } from 'commander';
import { createDb } from '@todo-api/core';
import { buildApp } from './app.js';
import {
  APP_VERSION, createServerConfig, applyCliOverrides, type ServerCliOptions,
} from './config.js';

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

async function serve(opts: ServerCliOptions): Promise<void> {
  const config = applyCliOverrides(createServerConfig(), opts);
  const db = createDb(config.dbPath);
  const app = await buildApp({ db, corsOrigins: config.corsOrigins, logLevel: config.logLevel });

  for (const signal of SHUTDOWN_SIGNALS) {
    process.once(signal, () => {
      app.log.info({ signal }, 'shutting down');
      app.close().catch((err: unknown) => {
        app.log.error({ err }, 'shutdown failed');
        process.exitCode = 1;
      });
    });
  }

  app.log.info({ dbPath: config.dbPath }, 'database ready');
  await app.listen({ port: config.port, host: config.host });
}

const program = new Command()
  .name('todo-api')
  .description('HTTP service for managing tasks')
  .version(APP_VERSION)
  .option('-p, --port <port>', 'Port to listen on (env: PORT, default 8000)')
  .option('-H, --host <host>', 'Address to bind (env: HOST, default 127.0.0.1)')
  .option('-d, --db <path>', 'SQLite database file, or :memory: (env: TODO_DB_PATH)')
  .option('--log-level <level>', 'fatal, error, warn, info, debug, trace or silent (env: LOG_LEVEL)')
  .action(async (opts: ServerCliOptions) => {
    try {
      await serve(opts);
    } catch (err: unknown) {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    }
  });

await program.parseAsync();
