/**
 * Panel Service
 * Runs the panel's zone and record operations against the provider of a session token.
 * Every call goes to the provider; the panel keeps no copy of zones or records.
 */
import { createChildLogger, symbols } from '../core/Logger.js';
import type { ProviderFactory } from '../providers/ProviderFactory.js';
import type { DNSRecord, DNSRecordInput, RecordFilter, Zone } from '../types/index.js';

const logger = createChildLogger({ service: 'PanelService' });

export interface RecordListing {
  /** Records left after filtering, in provider order */
  records: DNSRecord[];
  /** Number of records in the zone before filtering */
  total: number;
}

/**
 * Apply the keyword and proxied-only filters
 */
export function filterRecords(records: DNSRecord[], filter: RecordFilter = {}): DNSRecord[] {
  let result = records;

  if (filter.proxiedOnly) {
    result = result.filter((record) => record.proxied);
  }

  const keyword = filter.keyword?.trim().toLowerCase();
  if (keyword) {
    result = result.filter(
      (record) =>
        record.name.toLowerCase().includes(keyword) || record.content.toLowerCase().includes(keyword)
    );
  }

  return result;
}

/**
 * Pick the requested zone, falling back to the first one
 */
export function selectZone(zones: Zone[], zoneId?: string): Zone | undefined {
  return zones.find((zone) => zone.id === zoneId) ?? zones[0];
}

export class PanelService {
  constructor(private readonly providerFactory: ProviderFactory) {}

  /**
   * List the token's zones sorted by name
   */
  async listZones(apiToken: string): Promise<Zone[]> {
    const zones = await this.providerFactory(apiToken).listZones();
    return [...zones].sort((a, b) => a.name.localeCompare(b.name));
  }

  async listRecords(apiToken: string, zoneId: string, filter: RecordFilter = {}): Promise<RecordListing> {
    const records = await this.providerFactory(apiToken).listRecords(zoneId);
    return {
      records: filterRecords(records, filter),
      total: records.length,
    };
  }

  async getRecord(apiToken: string, zoneId: string, recordId: string): Promise<DNSRecord> {
    return this.providerFactory(apiToken).getRecord(zoneId, recordId);
  }

  async createRecord(apiToken: string, zoneId: string, input: DNSRecordInput): Promise<DNSRecord> {
    const record = await this.providerFactory(apiToken).createRecord(zoneId, input);
    logger.info({ zoneId, type: record.type, name: record.name }, `${symbols.success} Record created from panel`);
    return record;
  }

  async updateRecord(
    apiToken: string,
    zoneId: string,
    recordId: string,
    input: DNSRecordInput
  ): Promise<DNSRecord> {
    const record = await this.providerFactory(apiToken).updateRecord(zoneId, recordId, input);
    logger.info({ zoneId, type: record.type, name: record.name }, `${symbols.success} Record updated from panel`);
    return record;
  }

  async deleteRecord(apiToken: string, zoneId: string, recordId: string): Promise<void> {
    await this.providerFactory(apiToken).deleteRecord(zoneId, recordId);
    logger.info({ zoneId, recordId }, `${symbols.success} Record deleted from panel`);
  }
}
