/**
 * Retrieves the generator service's client metadata.
 */
import type { Config } from '../config/index.js';
import { ServiceError, ErrorCodes } from '../../utils/errors.js';
import { ensureOk, fetchWithTimeout } from '../../utils/http.js';
import { formatZodError } from '../../utils/yaml.js';
import { ClientMetadataSchema, type ClientMetadata } from './schema.js';

export const METADATA_MEDIA_TYPE = 'application/vnd.initializr.v2.2+json';

/**
 * URL of the metadata document for a service base URL.
 */
export function metadataUrl(serviceUrl: string): string {
  return `${serviceUrl.replace(/\/+$/, '')}/metadata/client`;
}

export async function fetchMetadata(config: Config): Promise<ClientMetadata> {
  const url = metadataUrl(config.service_url);
  const body = await fetchWithTimeout(
    url,
    { method: 'GET', headers: { Accept: METADATA_MEDIA_TYPE } },
    config.timeout_ms,
    async (response) => {
      await ensureOk(response, 'Failed to load service metadata');
      return response.text();
    }
  );

  let payload: unknown;
  try {
    payload = JSON.parse(body);
  } catch {
    throw new ServiceError(ErrorCodes.SERVICE_PAYLOAD, `Service metadata from ${url} is not valid JSON`, { url });
  }

  return parseMetadata(payload);
}

/**
 * Validate a metadata payload.
 */
export function parseMetadata(payload: unknown): ClientMetadata {
  const result = ClientMetadataSchema.safeParse(payload);
  if (!result.success) {
    throw new ServiceError(
      ErrorCodes.SERVICE_PAYLOAD,
      `Unexpected service metadata: ${formatZodError(result.error)}`,
      { errors: result.error.issues }
    );
  }
  return result.data;
}
