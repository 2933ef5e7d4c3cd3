#!/usr/bin/env node
// Copyright 2026 Layne Penney
// SPDX-License-Identifier: Apache-2.0

import { program, InvalidArgumentError } from 'commander';
import { VERSION } from './version.js';
import { logger, parseLogLevel } from './logger.js';
import { formatError } from './errors.js';
import { resolveConfig, type ResolvedConfig } from './config/index.js';
import { ApiClient } from './api/client.js';
import { StreamSink } from './output/sink.js';
import {
  showHandler,
  listHandler,
  createHandler,
  saveHandler,
  pushHandler,
  deleteHandler,
} from './commands/model-commands.js';
import { logsHandler } from './commands/logs-commands.js';

type GlobalOptions = {
  host?: string;
  verbose?: boolean;
  debug?: boolean;
  trace?: boolean;
};

interface LogsCommandOptions {
  follow?: boolean;
  tail?: number;
  app?: boolean;
  logDir?: string;
}

/**
 * Parse a non-negative integer option such as `--tail`.
 */
function parseCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Not a non-negative integer.');
  }
  return parsed;
}

function loadConfig(logDir?: string): ResolvedConfig {
  const config = resolveConfig({ host: program.opts<GlobalOptions>().host, logDir });
  logger.verbose(`Server: ${config.host}`);
  return config;
}

function createClient(config: ResolvedConfig): ApiClient {
  return new ApiClient(config.host);
}

/**
 * Wrap a command action so failures are reported once and set exit code 1.
 */
function run<A extends unknown[]>(action: (...args: A) => Promise<void>): (...args: A) => Promise<void> {
  return async (...args: A): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      logger.error(formatError(error), error instanceof Error ? error : undefined);
      process.exitCode = 1;
    }
  };
}

const stdout = new StreamSink(process.stdout);

program
  .name('lmctl')
  .description('Inspect, manage and monitor models on a local model server')
  .version(VERSION, '-V, --version', 'Output the current version')
  .option('-H, --host <host>', 'Server address (default: $OLLAMA_HOST or 127.0.0.1:11434)')
  .option('--verbose', 'Show resolved configuration and file positions')
  .option('--debug', 'Show API requests and responses')
  .option('--trace', 'Show full request payloads')
  .enablePositionalOptions()
  .hook('preAction', () => {
    logger.setLevel(parseLogLevel(program.opts<GlobalOptions>()));
  });

program
  .command('show <model>')
  .description('Show information for a model')
  .option('-v, --verbose', 'Include metadata and tensors')
  .action(
    run(async (model: string, opts: { verbose?: boolean }) => {
      await showHandler(createClient(loadConfig()), model, { verbose: opts.verbose }, stdout);
    })
  );

program
  .command('list [prefix]')
  .alias('ls')
  .description('List models')
  .action(
    run(async (prefix: string | undefined) => {
      await listHandler(createClient(loadConfig()), prefix, stdout);
    })
  );

program
  .command('create <model>')
  .description('Create a model from a Modelfile')
  .option('-f, --file <path>', 'Name of the Modelfile (default: "Modelfile")')
  .action(
    run(async (model: string, opts: { file?: string }) => {
      await createHandler(createClient(loadConfig()), model, { file: opts.file }, process.cwd());
    })
  );

program
  .command('save <source> <model>')
  .description('Save a copy of a model with a new system prompt')
  .option('--parent <model>', 'Model the source was derived from')
  .option('--system <text>', 'System prompt for the new model')
  .action(
    run(async (source: string, model: string, opts: { parent?: string; system?: string }) => {
      await saveHandler(createClient(loadConfig()), model, {
        model: source,
        parentModel: opts.parent,
        system: opts.system,
      });
    })
  );

program
  .command('push <model>')
  .description('Push a model to a registry')
  .option('--insecure', 'Use an insecure registry')
  .action(
    run(async (model: string, opts: { insecure?: boolean }) => {
      const config = loadConfig();
      await pushHandler(
        createClient(config),
        model,
        { insecure: opts.insecure, registryUrl: config.registryUrl },
        stdout
      );
    })
  );

program
  .command('rm <models...>')
  .description('Remove one or more models')
  .action(
    run(async (models: string[]) => {
      const client = createClient(loadConfig());
      for (const model of models) {
        await deleteHandler(client, model, stdout);
      }
    })
  );

program
  .command('logs [path]')
  .description('Show server logs')
  .option('-f, --follow', 'Keep printing lines as they are written')
  .option('-n, --tail <lines>', 'Number of lines to show from the end (0 = all)', parseCount)
  .option('--app', 'Show the desktop app log instead of the server log')
  .option('--log-dir <dir>', 'Directory containing the log files')
  .action(
    run(async (path: string | undefined, opts: LogsCommandOptions) => {
      const config = loadConfig(opts.logDir);
      const controller = new AbortController();
      const stop = (): void => controller.abort();
      process.once('SIGINT', stop);
      process.once('SIGTERM', stop);

      try {
        await logsHandler(
          {
            follow: opts.follow,
            tail: opts.tail ?? config.tail,
            app: opts.app,
            path,
            logDir: config.logDir,
            pollIntervalMs: config.pollIntervalMs,
          },
          stdout,
          controller.signal
        );
      } finally {
        process.off('SIGINT', stop);
        process.off('SIGTERM', stop);
      }
    })
  );

await program.parseAsync();
