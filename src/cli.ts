#!/usr/bin/env node
import path from 'node:path';
import { Command } from 'commander';
import { loadConfig, coerceNumber, type MockServerConfig, type PartialDeep } from './config.js';
import { loadDeclarations, registerDeclarations } from './declarations.js';
import { MockServerError, messageOf } from './errors.js';
import { MockServer } from './server.js';

interface ServeOptions {
  mocks?: string;
  port?: string;
  host?: string;
  config?: string;
  verbose?: boolean;
}

async function serve(options: ServeOptions) {
  const overrides: PartialDeep<MockServerConfig> = {};
  if (options.mocks) overrides.mocks = options.mocks;
  if (options.port) overrides.port = coerceNumber(options.port, undefined);
  if (options.host) overrides.host = options.host;
  if (options.verbose) overrides.logging = { verbose: true };

  const config = await loadConfig(options.config, overrides);
  if (!config.mocks) {
    throw new MockServerError({
      code: 'CONFIG_NOT_FOUND',
      message: 'Mock declarations are required. Provide --mocks or set `mocks` in config.'
    });
  }

  const declarations = await loadDeclarations(config.mocks);
  const server = new MockServer(config);
  registerDeclarations(server, declarations, path.dirname(config.mocks));
  await server.start();

  console.log(`Mocks:  ${config.mocks}`);
  console.log(`Server: ${server.url()}`);
  console.log('Press Ctrl+C to stop and verify expectations.');

  const shutdown = async () => {
    const failures = server.verify();
    await server.teardown();
    if (failures.length === 0) {
      console.log('All expectations met.');
      process.exit(0);
    }
    console.error(`${failures.length} expectation failure(s):`);
    failures.forEach((failure) => console.error(`  - ${failure}`));
    process.exit(1);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      console.error('Failed to stop server:', messageOf(error));
      process.exit(2);
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
}

const program = new Command();

program
  .name('http-scenario-mock')
  .description('Scripted HTTP test double');

program
  .command('serve')
  .description('Serve the scenarios of a JSON declaration file')
  .option('-m, --mocks <path>', 'Path to the mock declaration file (JSON)')
  .option('-p, --port <number>', 'Port to run the server on')
  .option('--host <host>', 'Host to bind the server to')
  .option('-c, --config <path>', 'Path to config file')
  .option('-v, --verbose', 'Print the start-up banner')
  .action(serve);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(messageOf(error));
  process.exit(1);
});
