import { readFileSync } from 'node:fs';
import type { z } from 'zod';
import { RuleConfigError } from './errors.js';

/**
 * Read and validate one JSON configuration file. Every failure mode surfaces
 * as a RuleConfigError naming the file.
 */
export function readConfigFile<S extends z.ZodTypeAny>(path: string, schema: S): z.infer<S> {
  let raw: string;
  try {
    raw = readFileSync(path, 'utf8');
  } catch (error) {
    throw new RuleConfigError('Cannot read configuration file', path, { cause: error });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new RuleConfigError('Configuration file is not valid JSON', path, { cause: error });
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first && first.path.length > 0 ? ` at ${first.path.join('.')}` : '';
    throw new RuleConfigError(`Invalid configuration${where}: ${first?.message ?? 'unknown issue'}`, path);
  }

  return result.data;
}
