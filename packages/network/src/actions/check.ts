import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadSettingsFile } from '../config/settings.js';
import { ConfigurationError } from '../errors.js';
import { NetworkRegistry } from '../network/registry.js';
import { formatJson } from '../utils/json.js';
import { cliFlagSchema } from './cli-options.js';

const checkArgsSchema = z.object({
  settings: z
    .string({ required_error: 'Missing required option: --settings' })
    .trim()
    .min(1, 'Missing required option: --settings'),
  pretty: cliFlagSchema,
});

type CheckArgs = z.infer<typeof checkArgsSchema>;

/**
 * Builds every network from a settings file and acquires one client on
 * each (Tor networks check where their proxies exit). Prints the network table.
 */
export async function runCheckAction(args: CheckArgs): Promise<number> {
  const startTime = Date.now();

  let registry: NetworkRegistry;
  try {
    registry = NetworkRegistry.fromSettings(loadSettingsFile(args.settings));
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(formatJson({ success: false, error: error.message }, args.pretty));
      return 1;
    }
    throw error;
  }

  log.info('Checking networks', { settings: args.settings, networks: registry.names().length });
  try {
    await registry.verify();
    console.log(formatJson(registry.summarize(), args.pretty));
    log.info(`Check finished in ${Date.now() - startTime}ms`);
    return 0;
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(formatJson({ success: false, error: error.message }, args.pretty));
      return 1;
    }
    throw error;
  } finally {
    await registry.shutdown();
  }
}

export { checkArgsSchema };
export type { CheckArgs };
