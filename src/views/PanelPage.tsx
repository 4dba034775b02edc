/**
 * Main panel page: token form, zone picker, record list and create form
 */
import type { PanelQuery } from '../api/validation.js';
import type { RecordListing } from '../services/PanelService.js';
import type { FlashMessage, Zone } from '../types/index.js';
import { AlertList } from './Alert.js';
import { CreateRecordForm } from './CreateRecordForm.js';
import { Layout } from './Layout.js';
import { RecordRow } from './RecordRow.js';
import { TokenForm } from './TokenForm.js';
import type { RecordFormState, RecordRowState } from './forms.js';

export interface PanelPageProps {
  hasToken: boolean;
  alerts: FlashMessage[];
  tokenError?: string;
  zones: Zone[];
  zone?: Zone;
  listing?: RecordListing;
  query: PanelQuery;
  createForm: RecordFormState;
  recordState?: RecordRowState;
}

function ZonePicker({ zones, zone }: { zones: Zone[]; zone: Zone }) {
  return (
    <form method="get" action="/" className="toolbar card">
      <label>
        Zone
        <select name="zone" defaultValue={zone.id}>
          {zones.map((z) => (
            <option key={z.id} value={z.id}>
              {z.name}
            </option>
          ))}
        </select>
      </label>
      <button type="submit">Open</button>
    </form>
  );
}

function RecordFilters({ zone, query }: { zone: Zone; query: PanelQuery }) {
  return (
    <form method="get" action="/" className="toolbar">
      <input type="hidden" name="zone" value={zone.id} />
      <label>
        Search (name/content)
        <input type="text" name="q" defaultValue={query.q ?? ''} placeholder="Keyword..." />
      </label>
      <label className="inline">
        <input type="checkbox" name="proxied" value="1" defaultChecked={query.proxied} />
        Proxied only
      </label>
      <button type="submit">Apply</button>
      <a href={`/?zone=${encodeURIComponent(zone.id)}`}>Refresh</a>
    </form>
  );
}

function RecordList({ zone, listing, query, recordState }: {
  zone: Zone;
  listing: RecordListing;
  query: PanelQuery;
  recordState?: RecordRowState;
}) {
  return (
    <section className="card">
      <h2>DNS records - {zone.name}</h2>
      <RecordFilters zone={zone} query={query} />
      <p className="caption">
        Showing {listing.records.length} of {listing.total} records
      </p>
      {listing.records.length === 0 ? (
        <p className="caption">No records, or none match the filters.</p>
      ) : (
        listing.records.map((record) => (
          <RecordRow
            key={record.id}
            zoneId={zone.id}
            record={record}
            state={recordState?.recordId === record.id ? recordState : undefined}
          />
        ))
      )}
    </section>
  );
}

export function PanelPage(props: PanelPageProps) {
  const { hasToken, alerts, tokenError, zones, zone, listing, query, createForm, recordState } = props;

  return (
    <Layout>
      <div className="layout">
        <aside>
          <TokenForm hasToken={hasToken} error={tokenError} />
        </aside>
        <main>
          <AlertList alerts={alerts} />
          {zone && (
            <>
              <ZonePicker zones={zones} zone={zone} />
              <div className="columns">
                <div className="records">
                  {listing && <RecordList zone={zone} listing={listing} query={query} recordState={recordState} />}
                </div>
                <div className="create">
                  <CreateRecordForm zone={zone} form={createForm} />
                </div>
              </div>
            </>
          )}
        </main>
      </div>
    </Layout>
  );
}
