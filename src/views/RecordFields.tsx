/**
 * Inputs shared by the create form and the per-record edit forms
 */
import { PROXIABLE_TYPES, TTL_OPTIONS, ttlLabel, type DNSRecordType } from '../types/index.js';
import { FieldError } from './Alert.js';
import type { RecordFormState } from './forms.js';

function ttlChoices(current: string): number[] {
  const value = Number(current);
  const choices: number[] = [...TTL_OPTIONS];
  if (Number.isInteger(value) && value > 0 && !choices.includes(value)) {
    choices.push(value);
    choices.sort((a, b) => a - b);
  }
  return choices;
}

export function TtlSelect({ value, error }: { value: string; error?: string }) {
  return (
    <label>
      TTL
      <select name="ttl" defaultValue={value}>
        {ttlChoices(value).map((ttl) => (
          <option key={ttl} value={String(ttl)}>
            {ttlLabel(ttl)}
          </option>
        ))}
      </select>
      <FieldError message={error} />
    </label>
  );
}

export interface RecordFieldsProps {
  form: RecordFormState;
  /** Stored type of an existing record, which the form cannot change; the create form lets the operator pick one */
  fixedType?: DNSRecordType;
  types?: readonly DNSRecordType[];
}

export function RecordFields({ form, fixedType, types = [] }: RecordFieldsProps) {
  const { values, errors } = form;
  const showProxied = fixedType === undefined || PROXIABLE_TYPES.includes(fixedType);
  const showPriority = fixedType === undefined || fixedType === 'MX' || fixedType === 'SRV';

  return (
    <>
      {fixedType === undefined && (
        <label>
          Type
          <select name="type" defaultValue={values.type}>
            {types.map((type) => (
              <option key={type} value={type}>
                {type}
              </option>
            ))}
          </select>
          <FieldError message={errors['type']} />
        </label>
      )}
      <div className="row">
        <label>
          Name
          <input type="text" name="name" defaultValue={values.name} placeholder="test.example.com or @" />
          <FieldError message={errors['name']} />
        </label>
        <label>
          Content
          <input type="text" name="content" defaultValue={values.content} placeholder="1.2.3.4, target.example.com, text..." />
          <FieldError message={errors['content']} />
        </label>
      </div>
      <div className="row">
        <TtlSelect value={values.ttl} error={errors['ttl']} />
        {showPriority && (
          <label>
            Priority (MX, SRV)
            <input type="number" name="priority" min={0} max={65535} defaultValue={values.priority} />
            <FieldError message={errors['priority']} />
          </label>
        )}
      </div>
      {showProxied && (
        <label className="inline">
          <input type="checkbox" name="proxied" defaultChecked={values.proxied} />
          Proxied through Cloudflare
        </label>
      )}
      <FieldError message={errors['proxied']} />
    </>
  );
}
