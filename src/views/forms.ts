/**
 * Form state shared by the record views and the controller
 */
import { z } from 'zod';
import type { FieldErrors } from '../api/validation.js';
import type { DNSRecord } from '../types/index.js';

export interface RecordFormValues {
  type: string;
  name: string;
  content: string;
  ttl: string;
  proxied: boolean;
  priority: string;
}

export interface RecordFormState {
  values: RecordFormValues;
  errors: FieldErrors;
}

/** Edit or delete form of one record that failed and is shown again */
export interface RecordRowState {
  recordId: string;
  values?: RecordFormValues;
  errors: FieldErrors;
}

const formBodySchema = z.record(z.unknown());

export function emptyRecordFormValues(): RecordFormValues {
  return {
    type: 'A',
    name: '',
    content: '',
    ttl: '1',
    proxied: false,
    priority: '',
  };
}

export function recordFormValuesFromRecord(record: DNSRecord): RecordFormValues {
  return {
    type: record.type,
    name: record.name,
    content: record.content,
    ttl: String(record.ttl),
    proxied: record.proxied,
    priority: record.priority === undefined ? '' : String(record.priority),
  };
}

/**
 * Recover what the operator typed so a rejected form can be shown again
 */
export function recordFormValuesFromBody(body: unknown): RecordFormValues {
  const parsed = formBodySchema.safeParse(body);
  const fields = parsed.success ? parsed.data : {};
  const text = (key: string, fallback: string): string => {
    const value = fields[key];
    return typeof value === 'string' ? value : fallback;
  };

  const defaults = emptyRecordFormValues();
  return {
    type: text('type', defaults.type),
    name: text('name', ''),
    content: text('content', ''),
    ttl: text('ttl', defaults.ttl),
    proxied: fields['proxied'] !== undefined,
    priority: text('priority', ''),
  };
}
