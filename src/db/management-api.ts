/**
 * Management API client
 *
 * Used only as a fallback: when every pooled endpoint fails, the pooler
 * hostname is looked up again from the project's database configuration.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { IManagementApi } from '../engines/interfaces.js';
import { logger } from '../utils/logger.js';

const poolerEntrySchema = z
  .object({
    db_host: z.string().optional(),
    connection_string: z.string().optional(),
    pooler_url: z.string().optional(),
  })
  .passthrough();

const poolerResponseSchema = z.union([z.array(poolerEntrySchema), poolerEntrySchema]);

type PoolerEntry = z.infer<typeof poolerEntrySchema>;

export function hostFromConnectionString(value: string): string | undefined {
  const match = value.match(/^[a-z]+:\/\/(?:[^@/]*@)?([^:/?]+)/i);
  return match?.[1];
}

function hostOf(entry: PoolerEntry): string | undefined {
  if (entry.db_host) return entry.db_host;
  const url = entry.connection_string ?? entry.pooler_url;
  return url ? hostFromConnectionString(url) : undefined;
}

export class ManagementApiClient implements IManagementApi {
  private client: AxiosInstance;

  constructor(baseUrl: string = 'https://api.supabase.com', client?: AxiosInstance) {
    this.client = client ?? axios.create({
      baseURL: baseUrl,
      timeout: 15000,
    });
  }

  async resolveHost(projectRef: string, token: string): Promise<string> {
    const response = await this.client.get(`/v1/projects/${encodeURIComponent(projectRef)}/config/database/pooler`, {
      headers: { Authorization: `Bearer ${token}` },
    });

    const parsed = poolerResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new Error(`Unexpected pooler configuration response for project ${projectRef}`);
    }

    const entries = Array.isArray(parsed.data) ? parsed.data : [parsed.data];
    for (const entry of entries) {
      const host = hostOf(entry);
      if (host) {
        logger.debug({ projectRef, host }, 'Resolved pooler host from management API');
        return host;
      }
    }

    throw new Error(`No pooler host in management API response for project ${projectRef}`);
  }
}
