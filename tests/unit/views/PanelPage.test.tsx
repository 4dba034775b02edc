/**
 * Server-rendered view tests
 */
import { describe, it, expect } from 'vitest';
import { renderToStaticMarkup } from 'react-dom/server';
import { ErrorPage } from '../../../src/views/ErrorPage.js';
import { PanelPage, type PanelPageProps } from '../../../src/views/PanelPage.js';
import { RecordRow, recordSummary } from '../../../src/views/RecordRow.js';
import { TtlSelect } from '../../../src/views/RecordFields.js';
import { emptyRecordFormValues, recordFormValuesFromBody } from '../../../src/views/forms.js';
import { countOccurrences, decodeHtml } from '../../helpers/html.js';
import { makeRecord } from '../../helpers/stubProvider.js';

const zones = [
  { id: 'z1', name: 'example.com' },
  { id: 'z2', name: 'example.org' },
];

function panelProps(overrides: Partial<PanelPageProps> = {}): PanelPageProps {
  return {
    hasToken: true,
    alerts: [],
    zones,
    query: { zone: undefined, q: undefined, proxied: false },
    createForm: { values: emptyRecordFormValues(), errors: {} },
    ...overrides,
  };
}

describe('recordSummary', () => {
  it('should describe a proxied record', () => {
    const record = makeRecord({ id: '1', name: 'www.example.com', content: '1.2.3.4', proxied: true });

    expect(recordSummary(record)).toBe('Proxied | A www.example.com → 1.2.3.4 (TTL Auto)');
  });

  it('should describe a DNS-only record with a fixed TTL', () => {
    const record = makeRecord({ id: '2', type: 'TXT', name: 'example.com', content: 'hello', ttl: 300 });

    expect(recordSummary(record)).toBe('DNS only | TXT example.com → hello (TTL 300 s)');
  });
});

describe('PanelPage', () => {
  it('should show only the token form without a token', () => {
    const html = renderToStaticMarkup(<PanelPage {...panelProps({ hasToken: false, zones: [] })} />);

    expect(html).toContain('<h2>Authentication (not stored)</h2>');
    expect(html).toContain('name="apiToken"');
    expect(html).not.toContain('Clear token');
    expect(html).not.toContain('Add DNS record');
  });

  it('should render alerts with their kind', () => {
    const html = renderToStaticMarkup(
      <PanelPage {...panelProps({ alerts: [{ kind: 'error', message: 'Failed to load zones: boom' }] })} />
    );

    expect(html).toContain('<div class="alert alert-error" role="alert">Failed to load zones: boom</div>');
  });

  it('should render the selected zone with its records', () => {
    const html = renderToStaticMarkup(
      <PanelPage
        {...panelProps({
          zone: zones[1],
          listing: {
            records: [makeRecord({ id: 'r1', name: 'www.example.org', content: '1.2.3.4' })],
            total: 3,
          },
        })}
      />
    );

    expect(html).toContain('<option value="z2" selected="">example.org</option>');
    expect(html).toContain('<h2>DNS records - example.org</h2>');
    expect(html).toContain('Showing 1 of 3 records');
    expect(html).toContain('action="/zones/z2/records/r1"');
    expect(html).toContain('action="/zones/z2/records/r1/delete"');
    expect(html).toContain('action="/zones/z2/records"');
    expect(decodeHtml(html)).toContain('DNS only | A www.example.org → 1.2.3.4 (TTL Auto)');
  });

  it('should say when no records match', () => {
    const html = renderToStaticMarkup(
      <PanelPage {...panelProps({ zone: zones[0], listing: { records: [], total: 4 } })} />
    );

    expect(html).toContain('Showing 0 of 4 records');
    expect(html).toContain('No records, or none match the filters.');
  });

  it('should keep the filter values', () => {
    const html = renderToStaticMarkup(
      <PanelPage
        {...panelProps({
          zone: zones[0],
          listing: { records: [], total: 0 },
          query: { zone: 'z1', q: 'mail', proxied: true },
        })}
      />
    );

    expect(html).toContain('value="mail"');
    expect(html).toContain('name="proxied" checked="" value="1"');
  });

  it('should show the rejected create form with its errors', () => {
    const values = recordFormValuesFromBody({ type: 'MX', name: '', content: 'mail.example.com', ttl: '300' });
    const html = renderToStaticMarkup(
      <PanelPage
        {...panelProps({
          zone: zones[0],
          createForm: { values, errors: { name: 'Name is required' } },
        })}
      />
    );

    expect(html).toContain('<span class="field-error">Name is required</span>');
    expect(html).toContain('value="mail.example.com"');
    expect(html).toContain('<option value="MX" selected="">MX</option>');
    expect(html).toContain('<option value="300" selected="">300 s</option>');
  });
});

describe('RecordRow', () => {
  it('should open the row that failed', () => {
    const record = makeRecord({ id: 'r1', name: 'www.example.com', content: '1.2.3.4' });
    const html = renderToStaticMarkup(
      <RecordRow zoneId="z1" record={record} state={{ recordId: 'r1', errors: { confirm: 'Tick it' } }} />
    );

    expect(html).toContain('<details class="record" id="record-r1" open="">');
    expect(html).toContain('<span class="field-error">Tick it</span>');
  });

  it('should show fields that match the record type', () => {
    const mx = renderToStaticMarkup(
      <RecordRow zoneId="z1" record={makeRecord({ id: 'r1', type: 'MX', name: 'example.com', content: 'mail.example.com', priority: 10 })} />
    );
    const a = renderToStaticMarkup(
      <RecordRow zoneId="z1" record={makeRecord({ id: 'r2', name: 'www.example.com', content: '1.2.3.4' })} />
    );

    expect(mx).not.toContain('name="type"');
    expect(mx).toContain('name="priority"');
    expect(mx).not.toContain('Proxied through Cloudflare');
    expect(a).toContain('Proxied through Cloudflare');
    expect(a).not.toContain('name="priority"');
  });

  it('should list other record types read-only', () => {
    const record = makeRecord({ id: 'r1', type: 'TLSA', name: '_443._tcp.example.com', content: '3 1 1 ab' });
    const html = renderToStaticMarkup(<RecordRow zoneId="z1" record={record} />);

    expect(html).toContain('TLSA records cannot be edited here.');
    expect(countOccurrences(html, '<form')).toBe(1);
  });
});

describe('TtlSelect', () => {
  it('should offer a non-standard current value', () => {
    const html = renderToStaticMarkup(<TtlSelect value="90" />);

    expect(html).toContain('<option value="1">Auto</option>');
    expect(html).toContain('<option value="90" selected="">90 s</option>');
  });
});

describe('ErrorPage', () => {
  it('should render the status and message', () => {
    const html = renderToStaticMarkup(<ErrorPage status={404} message="Page not found: GET /nope" />);

    expect(html).toContain('<h2>Error 404</h2>');
    expect(html).toContain('Page not found: GET /nope');
    expect(html).toContain('<a href="/">Back to the panel</a>');
  });
});
