/**
 * Requests a generated project archive from the service.
 */
import type { Config } from '../config/index.js';
import { toFormParams, type ProjectInfo } from '../project/index.js';
import { ensureOk, fetchWithTimeout } from '../../utils/http.js';

export function starterUrl(serviceUrl: string): string {
  return `${serviceUrl.replace(/\/+$/, '')}/starter.zip`;
}

/**
 * POST the project form and return the archive bytes.
 */
export async function downloadProjectArchive(config: Config, info: ProjectInfo): Promise<Buffer> {
  return fetchWithTimeout(
    starterUrl(config.service_url),
    {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/zip',
      },
      body: toFormParams(info).toString(),
    },
    config.timeout_ms,
    async (response) => {
      await ensureOk(response, 'failed to generate project');
      return Buffer.from(await response.arrayBuffer());
    }
  );
}
