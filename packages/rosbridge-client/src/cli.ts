#!/usr/bin/env node

/**
 * rosbridge - command line client for a rosbridge server.
 */

import { USAGE, parseCliArgs, resolveCliUrl, runCommand, type CliOptions } from './cli-commands.js';
import { PACKAGE_NAME, VERSION } from './constants.js';
import { Ros } from './ros.js';
import { loadClientConfig } from './utils/config.js';
import { Logger } from './utils/logger.js';

function fail(message: string): never {
  console.error(message);
  process.exit(1);
}

let options: CliOptions;
try {
  options = parseCliArgs(process.argv.slice(2));
} catch (err) {
  fail(err instanceof Error ? err.message : String(err));
}

if (options.version) {
  console.log(`${PACKAGE_NAME} ${VERSION}`);
  process.exit(0);
}

if (options.help || options.command.length === 0) {
  console.error(USAGE);
  process.exit(options.help ? 0 : 1);
}

async function main(cli: CliOptions): Promise<void> {
  const config = loadClientConfig(cli.configPath);
  const url = resolveCliUrl(cli) ?? config.url;

  const logger = new Logger({ level: cli.verbose ? 'debug' : config.logLevel, format: config.logFormat });
  const ros = Ros.fromConfig({ ...config, url, reconnect: false }, { logger });

  try {
    await ros.run();
    await runCommand(ros, cli.command, line => process.stdout.write(line + '\n'));
  } finally {
    ros.terminate();
  }
}

main(options).catch((err: unknown) => {
  fail(`Error: ${err instanceof Error ? err.message : String(err)}`);
});
