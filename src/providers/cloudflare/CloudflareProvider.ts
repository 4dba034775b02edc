/**
 * Cloudflare DNS Provider Implementation
 * Using the official cloudflare npm package
 */
import Cloudflare from 'cloudflare';
import { z } from 'zod';
import { DNSProvider } from '../base/DNSProvider.js';
import { toProviderError } from '../errors.js';
import { parseCaaContent, parseSrvContent } from '../../utils/recordContent.js';
import type { DNSRecord, DNSRecordInput, Zone } from '../../types/index.js';

export const CLOUDFLARE_API_BASE_URL = 'https://api.cloudflare.com/client/v4';

const ZONES_PER_PAGE = 50;
const RECORDS_PER_PAGE = 100;

export interface CloudflareProviderOptions {
  baseURL?: string;
  /** Per-request timeout in milliseconds */
  timeout?: number;
}

type RecordParams = Parameters<Cloudflare['dns']['records']['create']>[0];

const cloudflareZoneSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: z.string().nullish(),
});

const cloudflareRecordSchema = z.object({
  id: z.string(),
  type: z.string(),
  name: z.string(),
  content: z.string().nullish(),
  ttl: z.number(),
  proxied: z.boolean().nullish(),
  proxiable: z.boolean().nullish(),
  priority: z.number().nullish(),
  comment: z.string().nullish(),
  created_on: z.string().nullish(),
  modified_on: z.string().nullish(),
});

type CloudflareDNSRecord = z.infer<typeof cloudflareRecordSchema>;

/**
 * Cloudflare DNS Provider
 */
export class CloudflareProvider extends DNSProvider {
  private readonly client: Cloudflare;

  constructor(apiToken: string, options: CloudflareProviderOptions = {}) {
    super('Cloudflare');

    // Explicit nulls keep the SDK from picking up CLOUDFLARE_API_KEY/EMAIL from the environment
    this.client = new Cloudflare({
      apiToken: apiToken.trim(),
      apiKey: null,
      apiEmail: null,
      userServiceKey: null,
      baseURL: options.baseURL ?? CLOUDFLARE_API_BASE_URL,
      timeout: options.timeout ?? 20000,
      maxRetries: 0,
    });
  }

  async listZones(): Promise<Zone[]> {
    this.logger.debug('Listing zones');

    try {
      const zones: Zone[] = [];
      let page = 1;

      while (true) {
        const response = await this.client.zones.list({ page, per_page: ZONES_PER_PAGE });
        const batch = response.result ?? [];

        for (const zone of batch) {
          zones.push(this.convertZone(zone));
        }

        if (batch.length < ZONES_PER_PAGE) {
          break;
        }
        page++;
      }

      this.logger.debug({ count: zones.length }, 'Zones listed');
      return zones;
    } catch (error) {
      this.logger.warn({ error }, 'Failed to list zones');
      throw toProviderError(error);
    }
  }

  async listRecords(zoneId: string): Promise<DNSRecord[]> {
    this.logger.debug({ zoneId }, 'Listing DNS records');

    try {
      const records: DNSRecord[] = [];
      let page = 1;

      // Paginate through all records
      while (true) {
        const response = await this.client.dns.records.list({
          zone_id: zoneId,
          page,
          per_page: RECORDS_PER_PAGE,
        });
        const batch = response.result ?? [];

        for (const record of batch) {
          records.push(this.convertFromCloudflare(cloudflareRecordSchema.parse(record)));
        }

        if (batch.length < RECORDS_PER_PAGE) {
          break;
        }
        page++;
      }

      this.logger.debug({ zoneId, count: records.length }, 'DNS records listed');
      return records;
    } catch (error) {
      this.logger.warn({ error, zoneId }, 'Failed to list DNS records');
      throw toProviderError(error);
    }
  }

  async getRecord(zoneId: string, recordId: string): Promise<DNSRecord> {
    this.logger.debug({ zoneId, recordId }, 'Fetching DNS record');

    try {
      const response = await this.client.dns.records.get(recordId, { zone_id: zoneId });
      return this.convertFromCloudflare(cloudflareRecordSchema.parse(response));
    } catch (error) {
      this.logger.warn({ error, zoneId, recordId }, 'Failed to fetch DNS record');
      throw toProviderError(error);
    }
  }

  async createRecord(zoneId: string, input: DNSRecordInput): Promise<DNSRecord> {
    this.logger.debug({ zoneId, type: input.type, name: input.name }, 'Creating DNS record');

    try {
      const response = await this.client.dns.records.create(this.buildParams(zoneId, input));
      const created = this.convertFromCloudflare(cloudflareRecordSchema.parse(response));

      this.logger.info({ zoneId, type: created.type, name: created.name }, 'DNS record created');
      return created;
    } catch (error) {
      this.logger.warn({ error, zoneId, type: input.type, name: input.name }, 'Failed to create DNS record');
      throw toProviderError(error);
    }
  }

  async updateRecord(zoneId: string, recordId: string, input: DNSRecordInput): Promise<DNSRecord> {
    this.logger.debug({ zoneId, recordId, type: input.type, name: input.name }, 'Updating DNS record');

    try {
      const response = await this.client.dns.records.update(recordId, this.buildParams(zoneId, input));
      const updated = this.convertFromCloudflare(cloudflareRecordSchema.parse(response));

      this.logger.info({ zoneId, type: updated.type, name: updated.name }, 'DNS record updated');
      return updated;
    } catch (error) {
      this.logger.warn({ error, zoneId, recordId }, 'Failed to update DNS record');
      throw toProviderError(error);
    }
  }

  async deleteRecord(zoneId: string, recordId: string): Promise<void> {
    this.logger.debug({ zoneId, recordId }, 'Deleting DNS record');

    try {
      await this.client.dns.records.delete(recordId, { zone_id: zoneId });
      this.logger.info({ zoneId, recordId }, 'DNS record deleted');
    } catch (error) {
      this.logger.warn({ error, zoneId, recordId }, 'Failed to delete DNS record');
      throw toProviderError(error);
    }
  }

  private convertZone(zone: unknown): Zone {
    const parsed = cloudflareZoneSchema.parse(zone);
    return {
      id: parsed.id,
      name: parsed.name,
      status: parsed.status ?? undefined,
    };
  }

  /**
   * Convert Cloudflare record to internal format
   */
  private convertFromCloudflare(record: CloudflareDNSRecord): DNSRecord {
    return {
      id: record.id,
      type: record.type,
      name: record.name,
      content: record.content ?? '',
      ttl: record.ttl,
      proxied: record.proxied ?? false,
      proxiable: record.proxiable ?? undefined,
      priority: record.priority ?? undefined,
      comment: record.comment ?? undefined,
      createdOn: record.created_on ? new Date(record.created_on) : undefined,
      modifiedOn: record.modified_on ? new Date(record.modified_on) : undefined,
    };
  }

  /**
   * Build create/update params for the Cloudflare API
   */
  private buildParams(zoneId: string, input: DNSRecordInput): RecordParams {
    const baseParams = {
      zone_id: zoneId,
      name: input.name,
      ttl: input.ttl,
    };

    switch (input.type) {
      case 'A':
        return { ...baseParams, type: 'A' as const, content: input.content, proxied: input.proxied };
      case 'AAAA':
        return { ...baseParams, type: 'AAAA' as const, content: input.content, proxied: input.proxied };
      case 'CNAME':
        return { ...baseParams, type: 'CNAME' as const, content: input.content, proxied: input.proxied };
      case 'MX':
        return { ...baseParams, type: 'MX' as const, content: input.content, priority: input.priority ?? 10 };
      case 'TXT':
        return { ...baseParams, type: 'TXT' as const, content: input.content };
      case 'NS':
        return { ...baseParams, type: 'NS' as const, content: input.content };
      case 'SRV': {
        const srv = parseSrvContent(input.content);
        if (!srv) {
          throw new Error('SRV content must be "<weight> <port> <target>"');
        }
        return {
          ...baseParams,
          type: 'SRV' as const,
          data: { priority: input.priority ?? 1, weight: srv.weight, port: srv.port, target: srv.target },
        };
      }
      case 'CAA': {
        const caa = parseCaaContent(input.content);
        if (!caa) {
          throw new Error('CAA content must be "<flags> <issue|issuewild|iodef> <value>"');
        }
        return {
          ...baseParams,
          type: 'CAA' as const,
          data: { flags: caa.flags, tag: caa.tag, value: caa.value },
        };
      }
    }
  }
}
