/**
 * Abstract DNS Provider Interface
 * Base class for provider implementations the panel talks to
 */
import type { Logger } from 'pino';
import { createChildLogger } from '../../core/Logger.js';
import type { DNSRecord, DNSRecordInput, Zone } from '../../types/index.js';

/**
 * A provider instance is bound to one API token and lives for one request.
 * Nothing is cached: every call goes to the provider.
 */
export abstract class DNSProvider {
  protected logger: Logger;

  constructor(providerName: string) {
    this.logger = createChildLogger({ provider: providerName });
  }

  /**
   * List every zone the token can read
   */
  abstract listZones(): Promise<Zone[]>;

  /**
   * List every DNS record of a zone
   */
  abstract listRecords(zoneId: string): Promise<DNSRecord[]>;

  /**
   * Fetch one record as the provider currently stores it
   */
  abstract getRecord(zoneId: string, recordId: string): Promise<DNSRecord>;

  abstract createRecord(zoneId: string, input: DNSRecordInput): Promise<DNSRecord>;

  /**
   * Replace an existing record with the given fields
   */
  abstract updateRecord(zoneId: string, recordId: string, input: DNSRecordInput): Promise<DNSRecord>;

  abstract deleteRecord(zoneId: string, recordId: string): Promise<void>;
}
