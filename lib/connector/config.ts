/**
 * Connector configuration parsing.
 */

import {z} from 'zod';
import {ConfigurationError} from './errors';
import type {RawConfiguration} from './types';

const configurationSchema = z.object({
  api_token: z
    .string({required_error: 'api_token is required'})
    .trim()
    .min(1, 'api_token must not be empty'),
  collection_ids: z
    .string({required_error: 'collection_ids is required'})
    .transform(raw =>
      raw
        .split(',')
        .map(id => id.trim())
        .filter(id => id.length > 0),
    )
    .pipe(z.array(z.string()).min(1, 'collection_ids must name a sheet')),
});

export interface ConnectorConfiguration {
  apiToken: string;
  /** Sheet IDs in configured order */
  collectionIds: string[];
}

/**
 * Validate the raw `{api_token, collection_ids}` configuration.
 * @throws ConfigurationError when the token or the ID list is missing or empty
 */
export function parseConnectorConfiguration(
  raw: RawConfiguration,
): ConnectorConfiguration {
  const result = configurationSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(i => i.message).join('; ');
    throw new ConfigurationError(
      `Missing API token or sheet IDs in configuration: ${issues}`,
    );
  }
  return {
    apiToken: result.data.api_token,
    collectionIds: result.data.collection_ids,
  };
}
