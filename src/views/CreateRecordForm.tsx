import { DNS_RECORD_TYPES, type Zone } from '../types/index.js';
import { RecordFields } from './RecordFields.js';
import type { RecordFormState } from './forms.js';

export function CreateRecordForm({ zone, form }: { zone: Zone; form: RecordFormState }) {
  return (
    <section className="card">
      <h2>Add DNS record</h2>
      <form method="post" action={`/zones/${zone.id}/records`}>
        <RecordFields form={form} types={DNS_RECORD_TYPES} />
        <div className="actions">
          <button type="submit">Create record</button>
        </div>
      </form>
    </section>
  );
}
