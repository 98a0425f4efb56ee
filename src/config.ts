/**
 * Root configuration, validated with zod.
 */

import { z } from 'zod';
import { DEFAULT_CHUNK_SIZE } from './chunker.js';
import { DEFAULT_MAX_LINKS } from './layout.js';
import { validateRefName } from './paths.js';
import { ConfigError, InvalidRefNameError } from './types.js';

export const ConfigSchema = z.object({
  /** Addressing scheme version for new files. Version 1 stores raw leaves. */
  version: z.union([z.literal(0), z.literal(1)]).default(1),
  chunkSize: z.number().int().positive().default(DEFAULT_CHUNK_SIZE),
  maxLinks: z.number().int().min(2).default(DEFAULT_MAX_LINKS),
  branch: z
    .string()
    .min(1)
    .superRefine((name, ctx) => {
      try {
        validateRefName(name);
      } catch (err) {
        if (!(err instanceof InvalidRefNameError)) throw err;
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: err.message });
      }
    })
    .default('main'),
  author: z.string().min(1).default('dagfile'),
  email: z.string().min(1).default('dagfile@localhost'),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ConfigInput = z.input<typeof ConfigSchema>;

/**
 * Fill defaults and validate.
 *
 * @throws {ConfigError} Listing every invalid field.
 */
export function resolveConfig(input: ConfigInput = {}): Config {
  const parsed = ConfigSchema.safeParse(input);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${detail}`);
  }
  return parsed.data;
}
