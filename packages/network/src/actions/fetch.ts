import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadSettingsFile, parseSettings } from '../config/settings.js';
import { Dispatcher } from '../dispatcher/dispatcher.js';
import { ConfigurationError, NetworkError } from '../errors.js';
import { NetworkRegistry } from '../network/registry.js';
import { NetworkMetrics } from '../observability/metrics.js';
import { formatJson } from '../utils/json.js';
import { cliFlagSchema, optionalPathSchema } from './cli-options.js';

const fetchArgsSchema = z.object({
  url: z
    .string({ required_error: 'Missing required option: --url' })
    .trim()
    .url('Invalid --url. Must be an absolute URL.'),
  method: z
    .preprocess(
      (value) => (typeof value === 'string' ? value.toUpperCase() : value),
      z.enum(['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'HEAD', 'OPTIONS']),
    )
    .default('GET'),
  network: z.string().trim().min(1, 'Invalid --network').optional(),
  settings: optionalPathSchema('settings'),
  /** Seconds. */
  timeout: z.coerce.number().positive('Invalid --timeout. Must be a positive number of seconds.').optional(),
  outputFile: optionalPathSchema('outputFile'),
  raise: cliFlagSchema,
  pretty: cliFlagSchema,
});

type FetchArgs = z.infer<typeof fetchArgsSchema>;

function buildDispatcher(args: FetchArgs, metrics: NetworkMetrics): Dispatcher {
  const settings = args.settings ? loadSettingsFile(args.settings) : parseSettings({});
  return new Dispatcher(NetworkRegistry.fromSettings(settings), { metrics });
}

/**
 * Sends one request through a network and prints what came back. The body
 * goes to `--outputFile` when given.
 */
export async function runFetchAction(args: FetchArgs): Promise<number> {
  const metrics = new NetworkMetrics();

  let dispatcher: Dispatcher;
  try {
    dispatcher = buildDispatcher(args, metrics);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(formatJson({ success: false, error: error.message }, args.pretty));
      return 1;
    }
    throw error;
  }

  const { requestTimeoutMs, maxRequestTimeoutMs } = dispatcher.registry;
  const requestedMs = args.timeout !== undefined ? Math.round(args.timeout * 1000) : requestTimeoutMs;
  const timeoutMs = maxRequestTimeoutMs !== undefined ? Math.min(requestedMs, maxRequestTimeoutMs) : requestedMs;
  const session = dispatcher.session(args.network, { timeoutMs });

  log.info('Starting fetch action', { url: args.url, method: args.method, network: session.network.name, timeoutMs });
  try {
    const response = await session.request(args.method, args.url, { raiseForHttpError: args.raise });

    if (args.outputFile) {
      await mkdir(dirname(args.outputFile), { recursive: true });
      await writeFile(args.outputFile, response.body);
    }

    console.log(
      formatJson(
        {
          success: response.ok,
          status: response.status,
          url: response.url,
          httpVersion: response.httpVersion ?? null,
          contentType: response.header('content-type') ?? null,
          bytes: response.body.length,
          httpTimeMs: Math.round(session.httpTimeMs),
        },
        args.pretty,
      ),
    );
    return response.ok ? 0 : 1;
  } catch (error) {
    if (error instanceof NetworkError) {
      console.error(formatJson({ success: false, error: error.name, message: error.message }, args.pretty));
      return 1;
    }
    throw error;
  } finally {
    metrics.log(log);
    await dispatcher.shutdown();
  }
}

export { fetchArgsSchema };
export type { FetchArgs };
