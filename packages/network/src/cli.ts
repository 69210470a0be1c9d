#!/usr/bin/env node
import { z } from 'zod';
import { checkArgsSchema, runCheckAction } from './actions/check.js';
import { fetchArgsSchema, runFetchAction } from './actions/fetch.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const optionsSchema = z.record(z.string(), z.string());

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({ command: z.literal('help'), options: optionsSchema }),
  z.object({ command: z.literal('check'), options: optionsSchema }),
  z.object({ command: z.literal('fetch'), options: optionsSchema }),
]);

/** `--key=value`, `--key value` and bare `--flag` (read as `true`). */
function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const options: Record<string, string> = {};

  let index = 0;
  while (index < rest.length) {
    const arg = rest[index] ?? '';
    index += 1;
    if (!arg.startsWith('--')) {
      continue;
    }

    const separator = arg.indexOf('=');
    const key = separator === -1 ? arg.slice(2) : arg.slice(2, separator);
    if (!key) {
      continue;
    }

    if (separator !== -1) {
      options[key] = arg.slice(separator + 1);
      continue;
    }

    const next = rest[index];
    if (next !== undefined && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
    } else {
      options[key] = 'true';
    }
  }

  return { command: normalizeCommand(rawCommand), options };
}

function normalizeCommand(command?: string): string {
  if (!command || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`metasearch-outgoing CLI

Usage:
  cli help
  cli check --settings=./settings.yml
  cli check --settings=./settings.yml --pretty
  cli fetch --url="https://search.example.com/search?q=test"
  cli fetch --url="https://search.example.com/search?q=test" --settings=./settings.yml --network=tor
  cli fetch --url="https://search.example.com/api" --method=HEAD --timeout=5 --raise
  cli fetch --url="https://search.example.com/search?q=test" --outputFile="./tmp/page.html" --pretty

Commands:
  help   Show this help message
  check  Build every network from a settings file and verify it (Tor exits are checked)
  fetch  Send one request through a network and print the response summary

Check options:
  --settings   Required. YAML settings file with outgoing and engines sections.
  --pretty     Optional. Pretty-print JSON output.

Fetch options:
  --url        Required. Absolute URL to request.
  --method     Optional. GET, POST, PUT, PATCH, DELETE, HEAD or OPTIONS (default: GET).
  --settings   Optional. YAML settings file (default: built-in networks only).
  --network    Optional. Network or engine name (default: the default network).
  --timeout    Optional. Time budget in seconds (default: outgoing.request_timeout, capped by outgoing.max_request_timeout).
  --raise      Optional. Fail on HTTP error statuses, CAPTCHA and access-denied pages.
  --outputFile Optional. Writes the response body to the given file path.
  --pretty     Optional. Pretty-print JSON output.

Environment:
  LOG_LEVEL    fatal, error, warn, info (default), debug, trace or silent
  LOG_FORMAT   pretty (default) or json
`);
}

function reportInvalidArgs(error: z.ZodError): number {
  console.error(error.issues[0]?.message ?? 'Invalid arguments');
  printHelp();
  return 1;
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  switch (parsedCliInput.data.command) {
    case 'help':
      printHelp();
      return 0;

    case 'check': {
      const parsedCheckArgs = checkArgsSchema.safeParse(parsedCliInput.data.options);
      if (!parsedCheckArgs.success) {
        return reportInvalidArgs(parsedCheckArgs.error);
      }
      return runCheckAction(parsedCheckArgs.data);
    }

    case 'fetch': {
      const parsedFetchArgs = fetchArgsSchema.safeParse(parsedCliInput.data.options);
      if (!parsedFetchArgs.success) {
        return reportInvalidArgs(parsedFetchArgs.error);
      }
      return runFetchAction(parsedFetchArgs.data);
    }
  }
}

const exitCode = await main();
process.exitCode = exitCode;
