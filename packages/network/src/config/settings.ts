import { existsSync, readFileSync } from 'node:fs';
import yaml from 'js-yaml';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { formatIssues, rawNetworkSettingsSchema } from '../network/settings.js';

const engineSettingsSchema = z
  .object({
    name: z.string().min(1),
    network: z.union([z.string().min(1), z.record(z.string(), z.unknown())]).optional(),
    /** Seconds. */
    timeout: z.number().positive().optional(),
  })
  .passthrough();

const outgoingSettingsSchema = rawNetworkSettingsSchema.extend({
  /** Seconds. */
  request_timeout: z.number().positive().default(3),
  max_request_timeout: z.number().positive().nullish(),
  networks: z.record(z.string(), z.record(z.string(), z.unknown())).default({}),
});

export const settingsSchema = z
  .object({
    outgoing: outgoingSettingsSchema.default({}),
    engines: z.array(engineSettingsSchema).default([]),
  })
  .passthrough();

type Settings = z.output<typeof settingsSchema>;
type SettingsInput = z.input<typeof settingsSchema>;
type EngineSettings = z.output<typeof engineSettingsSchema>;
type OutgoingSettings = z.output<typeof outgoingSettingsSchema>;

export function parseSettings(raw: unknown): Settings {
  const parsed = settingsSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid settings: ${formatIssues(parsed.error)}`, { cause: parsed.error });
  }
  return parsed.data;
}

export function parseSettingsYaml(content: string, source = 'settings'): Settings {
  let data: unknown;
  try {
    data = yaml.load(content);
  } catch (error) {
    throw new ConfigurationError(`Failed to parse ${source}`, { cause: error });
  }
  return parseSettings(data);
}

/**
 * Reads a YAML (or JSON, which YAML accepts) settings file.
 */
export function loadSettingsFile(filePath: string): Settings {
  if (!existsSync(filePath)) {
    throw new ConfigurationError(`Settings file not found: ${filePath}`);
  }

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read settings file: ${filePath}`, { cause: error });
  }

  return parseSettingsYaml(content, filePath);
}

export type { Settings, SettingsInput, EngineSettings, OutgoingSettings };
