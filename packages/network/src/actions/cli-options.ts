import { z } from 'zod';

const booleanFromCliSchema = z.enum(['true', 'false']).transform((value) => value === 'true');

/** `--flag`, `--flag=true` and `--flag=false`; off when absent. */
export const cliFlagSchema = z
  .preprocess((value) => {
    if (value === undefined) {
      return 'false';
    }

    if (typeof value === 'string') {
      return value.toLowerCase();
    }

    return value;
  }, booleanFromCliSchema)
  .default(false);

/** Trimmed path; blank counts as absent. */
export function optionalPathSchema(option: string) {
  return z
    .preprocess(
      (value) => {
        if (typeof value === 'string') {
          const trimmed = value.trim();
          return trimmed.length ? trimmed : undefined;
        }

        return value;
      },
      z.string().min(1, `Invalid --${option} path`),
    )
    .optional();
}
