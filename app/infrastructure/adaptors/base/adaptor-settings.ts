import type { Static, TSchema } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from '../../../core/errors';

export function parseAdaptorSettings<T extends TSchema>(schema: T, owner: string, settings: unknown): Static<T> {
  if (Value.Check(schema, settings)) {
    return settings;
  }

  const problems = [...Value.Errors(schema, settings)]
    .map(error => `${error.path || '/'} ${error.message}`)
    .join('; ');

  throw new ConfigError(`Invalid adaptor settings for ${owner}: ${problems}`);
}

export function readSecretFromEnv(variable: string, owner: string): string {
  const value = process.env[variable];
  if (!value) {
    throw new ConfigError(`Environment variable ${variable} required by ${owner} is not set`);
  }
  return value;
}
