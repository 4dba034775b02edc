/**
 * Form Validation Schemas
 * Zod schemas for the panel's form posts and query strings
 */
import { z } from 'zod';
import { DNS_RECORD_TYPES, type DNSRecordInput } from '../types/index.js';
import { parseCaaContent, parseSrvContent } from '../utils/recordContent.js';

export type FieldErrors = Partial<Record<string, string>>;

export type FormResult<T> =
  | { success: true; data: T }
  | { success: false; errors: FieldErrors };

function requiredText(label: string) {
  return z
    .string({ required_error: `${label} is required`, invalid_type_error: `${label} is required` })
    .trim()
    .min(1, `${label} is required`);
}

/** Empty form inputs count as "not given" */
function optionalNumber<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess((value) => (value === '' || value === undefined ? undefined : value), schema.optional());
}

// Checkboxes only submit a value when ticked
const checkboxSchema = z
  .union([z.literal('on'), z.literal('true'), z.literal('1')])
  .optional()
  .transform((value) => value !== undefined);

export const dnsRecordTypeSchema = z.enum(DNS_RECORD_TYPES, {
  errorMap: () => ({ message: 'Choose a supported record type' }),
});

// Cloudflare ids are hex strings; anything else never reaches the API path
export const resourceIdSchema = z.string().regex(/^[A-Za-z0-9_-]{1,64}$/, 'Invalid identifier');

export const recordFormSchema = z
  .object({
    type: dnsRecordTypeSchema,
    name: requiredText('Name').max(255, 'Name must be at most 255 characters'),
    content: requiredText('Content'),
    ttl: z.coerce
      .number({ invalid_type_error: 'TTL must be a number' })
      .int('TTL must be a whole number')
      .min(1, 'TTL must be between 1 and 86400')
      .max(86400, 'TTL must be between 1 and 86400')
      .default(1),
    proxied: checkboxSchema,
    priority: optionalNumber(
      z.coerce
        .number({ invalid_type_error: 'Priority must be a number' })
        .int('Priority must be a whole number')
        .min(0, 'Priority must be between 0 and 65535')
        .max(65535, 'Priority must be between 0 and 65535')
    ),
  })
  .superRefine((record, ctx) => {
    if (record.type === 'SRV' && !parseSrvContent(record.content)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['content'],
        message: 'SRV content must be "<weight> <port> <target>"',
      });
    }
    if (record.type === 'CAA' && !parseCaaContent(record.content)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['content'],
        message: 'CAA content must be "<flags> <issue|issuewild|iodef> <value>"',
      });
    }
  });

export const tokenFormSchema = z.object({
  apiToken: requiredText('API token'),
});

export const deleteFormSchema = z.object({
  confirm: z.literal('on', {
    errorMap: () => ({ message: 'Tick "Confirm delete" before deleting' }),
  }),
});

function firstString(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && typeof value[0] === 'string') return value[0];
  return undefined;
}

export const panelQuerySchema = z.object({
  zone: z.preprocess(firstString, z.string().optional()),
  q: z.preprocess(firstString, z.string().trim().max(255).optional()).catch(undefined),
  proxied: z.preprocess(firstString, z.string().optional()).transform((value) => value === '1'),
});

export type PanelQuery = z.infer<typeof panelQuerySchema>;

/**
 * Collect the first message per field
 */
export function toFieldErrors(error: z.ZodError): FieldErrors {
  const errors: FieldErrors = {};
  for (const issue of error.issues) {
    const field = issue.path.length > 0 ? issue.path.join('.') : 'form';
    if (errors[field] === undefined) {
      errors[field] = issue.message;
    }
  }
  return errors;
}

function parseForm<T extends z.ZodTypeAny>(schema: T, body: unknown): FormResult<z.output<T>> {
  const result = schema.safeParse(body ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  return { success: false, errors: toFieldErrors(result.error) };
}

/**
 * Parse a record form; an existing record keeps its stored type whatever the form says
 */
export function parseRecordForm(body: unknown, storedType?: string): FormResult<DNSRecordInput> {
  if (storedType === undefined) {
    return parseForm(recordFormSchema, body);
  }
  const fields = typeof body === 'object' && body !== null ? body : {};
  return parseForm(recordFormSchema, { ...fields, type: storedType });
}

export function parseTokenForm(body: unknown): FormResult<{ apiToken: string }> {
  return parseForm(tokenFormSchema, body);
}

export function parseDeleteForm(body: unknown): FormResult<{ confirm: 'on' }> {
  return parseForm(deleteFormSchema, body);
}
