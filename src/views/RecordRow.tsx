import { isEditableType, ttlLabel, type DNSRecord } from '../types/index.js';
import { FieldError } from './Alert.js';
import { RecordFields } from './RecordFields.js';
import { recordFormValuesFromRecord, type RecordRowState } from './forms.js';

export interface RecordRowProps {
  zoneId: string;
  record: DNSRecord;
  /** Set when a submission for this record was rejected */
  state?: RecordRowState;
}

export function recordSummary(record: DNSRecord): string {
  const status = record.proxied ? 'Proxied' : 'DNS only';
  return `${status} | ${record.type} ${record.name} → ${record.content} (TTL ${ttlLabel(record.ttl)})`;
}

export function RecordRow({ zoneId, record, state }: RecordRowProps) {
  const action = `/zones/${zoneId}/records/${record.id}`;
  const errors = state?.errors ?? {};
  const values = state?.values ?? recordFormValuesFromRecord(record);

  return (
    <details className="record" id={`record-${record.id}`} open={state !== undefined}>
      <summary>{recordSummary(record)}</summary>
      <div className="body">
        {isEditableType(record.type) ? (
          <form method="post" action={action}>
            <RecordFields form={{ values, errors }} fixedType={record.type} />
            <div className="actions">
              <button type="submit">Save</button>
            </div>
          </form>
        ) : (
          <p className="caption">{record.type} records cannot be edited here.</p>
        )}
        <form method="post" action={`${action}/delete`} className="actions">
          <label className="inline">
            <input type="checkbox" name="confirm" />
            Confirm delete
          </label>
          <button type="submit" className="danger">
            Delete
          </button>
          <FieldError message={errors['confirm']} />
        </form>
      </div>
    </details>
  );
}
