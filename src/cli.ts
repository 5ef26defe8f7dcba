#!/usr/bin/env node

/**
 * `todo-triage-mcp`: serves the todo document tools over stdio.
 */
import { loadConfigFromArgs } from './config.js';
import { SERVER_NAME, SERVER_VERSION, runStdioServer } from './server.js';
import { createStreamNotifier } from './todo/notify.js';

const HELP = [
  `${SERVER_NAME} (stdio MCP server)`,
  '',
  'Usage:',
  `  ${SERVER_NAME} [--root <dir>] [--config <file>] [--debug] [--require-categories]`,
  '',
  'Options:',
  '  --root                Root directory for todo documents (default: cwd)',
  '  --config              JSON file overriding the todo format settings',
  '  --debug               Include debug notifications in tool results',
  '  --require-categories  Refuse to prioritize documents without categories',
  '  --help, -h            Show help',
  '  --version, -v         Show version',
  '',
].join('\n');

async function main(argv: string[]): Promise<void> {
  if (argv.includes('--help') || argv.includes('-h')) {
    process.stdout.write(HELP);
    return;
  }
  if (argv.includes('--version') || argv.includes('-v')) {
    process.stdout.write(`${SERVER_NAME} ${SERVER_VERSION}\n`);
    return;
  }

  const config = loadConfigFromArgs(argv, process.cwd());
  await runStdioServer(config);
  // stdout belongs to the transport from here on.
  createStreamNotifier(process.stderr, { debug: config.format.debug })(
    `Serving todo documents under ${config.rootDir}`,
    'debug'
  );
}

try {
  await main(process.argv.slice(2));
} catch (error) {
  process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
  process.exitCode = 1;
}
