/**
 * Core type definitions for the DNS panel
 */

export const DNS_RECORD_TYPES = ['A', 'AAAA', 'CNAME', 'TXT', 'MX', 'NS', 'SRV', 'CAA'] as const;

/** Record types that can be created and edited from the panel */
export type DNSRecordType = (typeof DNS_RECORD_TYPES)[number];

/** Record types Cloudflare can proxy */
export const PROXIABLE_TYPES: readonly DNSRecordType[] = ['A', 'AAAA', 'CNAME'];

/** 1 means "automatic" on Cloudflare */
export const TTL_OPTIONS = [1, 60, 120, 300, 600, 1800, 3600, 7200, 86400] as const;

export const CAA_TAGS = ['issue', 'issuewild', 'iodef'] as const;
export type CAATag = (typeof CAA_TAGS)[number];

export interface Zone {
  id: string;
  name: string;
  status?: string;
}

export interface DNSRecord {
  id: string;
  /** Anything the provider returns, including types the panel cannot edit */
  type: string;
  name: string;
  content: string;
  ttl: number;
  proxied: boolean;
  proxiable?: boolean;
  priority?: number;
  comment?: string;
  createdOn?: Date;
  modifiedOn?: Date;
}

export interface DNSRecordInput {
  type: DNSRecordType;
  name: string;
  content: string;
  ttl: number;
  proxied: boolean;
  priority?: number;
}

export interface RecordFilter {
  keyword?: string;
  proxiedOnly?: boolean;
}

export type FlashKind = 'success' | 'error' | 'warning' | 'info';

export interface FlashMessage {
  kind: FlashKind;
  message: string;
}

export function isEditableType(type: string): type is DNSRecordType {
  return (DNS_RECORD_TYPES as readonly string[]).includes(type);
}

export function ttlLabel(ttl: number): string {
  return ttl === 1 ? 'Auto' : `${ttl} s`;
}
