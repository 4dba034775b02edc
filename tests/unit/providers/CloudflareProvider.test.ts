/**
 * CloudflareProvider tests against an in-process Cloudflare API
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { CloudflareProvider } from '../../../src/providers/cloudflare/CloudflareProvider.js';
import { NETWORK_ERROR_MESSAGE, ProviderError } from '../../../src/providers/errors.js';
import { FakeCloudflareApi, type FakeZone } from '../../helpers/fakeCloudflareApi.js';

describe('CloudflareProvider', () => {
  let api: FakeCloudflareApi;
  let baseURL: string;
  let zone: FakeZone;
  let provider: CloudflareProvider;

  beforeEach(async () => {
    api = new FakeCloudflareApi();
    zone = api.addZone('example.com');
    baseURL = await api.start();
    provider = new CloudflareProvider('test-token', { baseURL, timeout: 5000 });
  });

  afterEach(async () => {
    await api.stop();
  });

  describe('listZones', () => {
    it('should send the token as a bearer credential', async () => {
      const zones = await provider.listZones();

      expect(zones).toEqual([{ id: zone.id, name: 'example.com', status: 'active' }]);
      expect(api.requests[0]?.authorization).toBe('Bearer test-token');
    });

    it('should trim whitespace around the token', async () => {
      const padded = new CloudflareProvider('  test-token\n', { baseURL });

      await expect(padded.listZones()).resolves.toHaveLength(1);
    });

    it('should fetch every page of zones', async () => {
      for (let i = 0; i < 59; i++) {
        api.addZone(`zone${i}.test`);
      }

      const zones = await provider.listZones();

      expect(zones).toHaveLength(60);
      expect(api.requests.map((r) => r.query['page'])).toEqual(['1', '2']);
      expect(api.requests.every((r) => r.query['per_page'] === '50')).toBe(true);
    });
  });

  describe('listRecords', () => {
    it('should fetch every page of records', async () => {
      for (let i = 0; i < 150; i++) {
        api.addRecord(zone.id, { type: 'A', name: `host${i}.example.com`, content: `10.0.0.${i}` });
      }

      const records = await provider.listRecords(zone.id);

      expect(records).toHaveLength(150);
      expect(records[149]?.name).toBe('host149.example.com');
      expect(api.requests.map((r) => r.path)).toEqual([
        `/zones/${zone.id}/dns_records`,
        `/zones/${zone.id}/dns_records`,
      ]);
      expect(api.requests.map((r) => r.query['page'])).toEqual(['1', '2']);
    });

    it('should map provider fields to records', async () => {
      const stored = api.addRecord(zone.id, {
        type: 'MX',
        name: 'example.com',
        content: 'mail.example.com',
        priority: 10,
        ttl: 3600,
      });

      const [record] = await provider.listRecords(zone.id);

      expect(record).toMatchObject({
        id: stored.id,
        type: 'MX',
        name: 'example.com',
        content: 'mail.example.com',
        ttl: 3600,
        proxied: false,
        proxiable: false,
        priority: 10,
      });
      expect(record?.comment).toBeUndefined();
    });

    it('should keep record types the panel cannot edit', async () => {
      api.addRecord(zone.id, { type: 'TLSA', name: '_443._tcp.example.com', content: '3 1 1 abcd' });

      const records = await provider.listRecords(zone.id);

      expect(records.map((r) => r.type)).toEqual(['TLSA']);
    });

    it('should report an unknown zone verbatim', async () => {
      await expect(provider.listRecords('f'.repeat(32))).rejects.toMatchObject({
        kind: 'api',
        status: 404,
        message: '[7003] Could not route to zone, perhaps your object identifier is invalid?',
      });
    });
  });

  describe('getRecord', () => {
    it('should fetch one record', async () => {
      const stored = api.addRecord(zone.id, { type: 'PTR', name: 'ptr.example.com', content: 'host.example.net' });

      const record = await provider.getRecord(zone.id, stored.id);

      expect(record).toMatchObject({ id: stored.id, type: 'PTR', name: 'ptr.example.com', content: 'host.example.net' });
      expect(api.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
        `GET /zones/${zone.id}/dns_records/${stored.id}`,
      ]);
    });

    it('should report a missing record', async () => {
      await expect(provider.getRecord(zone.id, 'b'.repeat(32))).rejects.toMatchObject({
        kind: 'api',
        status: 404,
        message: '[81044] Record does not exist.',
      });
    });
  });

  describe('createRecord', () => {
    it('should create an A record', async () => {
      const created = await provider.createRecord(zone.id, {
        type: 'A',
        name: 'test.example.com',
        content: '1.2.3.4',
        ttl: 300,
        proxied: false,
      });

      expect(api.mutations[0]?.method).toBe('POST');
      expect(api.mutations[0]?.path).toBe(`/zones/${zone.id}/dns_records`);
      expect(api.mutations[0]?.body).toEqual({
        name: 'test.example.com',
        ttl: 300,
        type: 'A',
        content: '1.2.3.4',
        proxied: false,
      });
      expect(created.id).toBe(api.zoneRecords(zone.id)[0]?.id);
      expect(created).toMatchObject({ type: 'A', name: 'test.example.com', content: '1.2.3.4', ttl: 300 });
    });

    it('should not send proxied for records that cannot be proxied', async () => {
      await provider.createRecord(zone.id, {
        type: 'TXT',
        name: 'example.com',
        content: 'v=spf1 -all',
        ttl: 1,
        proxied: true,
      });

      expect(api.mutations[0]?.body).toEqual({
        name: 'example.com',
        ttl: 1,
        type: 'TXT',
        content: 'v=spf1 -all',
      });
    });

    it('should default MX priority to 10', async () => {
      await provider.createRecord(zone.id, {
        type: 'MX',
        name: 'example.com',
        content: 'mail.example.com',
        ttl: 1,
        proxied: false,
      });

      expect(api.mutations[0]?.body).toEqual({
        name: 'example.com',
        ttl: 1,
        type: 'MX',
        content: 'mail.example.com',
        priority: 10,
      });
    });

    it('should send SRV content as structured data', async () => {
      const created = await provider.createRecord(zone.id, {
        type: 'SRV',
        name: '_sip._tcp.example.com',
        content: '5 5060 sip.example.com',
        ttl: 1,
        proxied: false,
        priority: 20,
      });

      expect(api.mutations[0]?.body).toEqual({
        name: '_sip._tcp.example.com',
        ttl: 1,
        type: 'SRV',
        data: { priority: 20, weight: 5, port: 5060, target: 'sip.example.com' },
      });
      expect(created.content).toBe('5 5060 sip.example.com');
      expect(created.priority).toBe(20);
    });

    it('should send CAA content as structured data', async () => {
      const created = await provider.createRecord(zone.id, {
        type: 'CAA',
        name: 'example.com',
        content: '0 issue "letsencrypt.org"',
        ttl: 1,
        proxied: false,
      });

      expect(api.mutations[0]?.body).toEqual({
        name: 'example.com',
        ttl: 1,
        type: 'CAA',
        data: { flags: 0, tag: 'issue', value: 'letsencrypt.org' },
      });
      expect(created.content).toBe('0 issue "letsencrypt.org"');
    });

    it('should reject malformed SRV content without calling the API', async () => {
      await expect(
        provider.createRecord(zone.id, {
          type: 'SRV',
          name: '_sip._tcp.example.com',
          content: 'sip.example.com',
          ttl: 1,
          proxied: false,
        })
      ).rejects.toMatchObject({ kind: 'api', message: 'SRV content must be "<weight> <port> <target>"' });

      expect(api.requests).toHaveLength(0);
    });

    it('should pass provider errors through verbatim', async () => {
      api.failNext({
        status: 400,
        errors: [
          { code: 9005, message: 'Content for A record is invalid.' },
          { code: 1004, message: 'DNS Validation Error' },
        ],
      });

      const error = await provider
        .createRecord(zone.id, { type: 'A', name: 'bad.example.com', content: 'x', ttl: 1, proxied: false })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({
        kind: 'api',
        status: 400,
        message: '[9005] Content for A record is invalid.; [1004] DNS Validation Error',
        errors: [
          { code: 9005, message: 'Content for A record is invalid.' },
          { code: 1004, message: 'DNS Validation Error' },
        ],
      });
    });

    it('should report duplicate records', async () => {
      api.addRecord(zone.id, { type: 'A', name: 'www.example.com', content: '1.2.3.4' });

      await expect(
        provider.createRecord(zone.id, { type: 'A', name: 'www.example.com', content: '1.2.3.4', ttl: 1, proxied: false })
      ).rejects.toMatchObject({ kind: 'api', message: '[81058] An identical record already exists.' });
    });
  });

  describe('updateRecord', () => {
    it('should replace the record with a PUT', async () => {
      const stored = api.addRecord(zone.id, { type: 'A', name: 'www.example.com', content: '1.2.3.4' });

      const updated = await provider.updateRecord(zone.id, stored.id, {
        type: 'A',
        name: 'www.example.com',
        content: '5.6.7.8',
        ttl: 120,
        proxied: true,
      });

      expect(api.mutations[0]?.method).toBe('PUT');
      expect(api.mutations[0]?.path).toBe(`/zones/${zone.id}/dns_records/${stored.id}`);
      expect(updated).toMatchObject({ id: stored.id, content: '5.6.7.8', ttl: 120, proxied: true });
      expect(api.zoneRecords(zone.id)[0]?.content).toBe('5.6.7.8');
    });

    it('should report a missing record', async () => {
      await expect(
        provider.updateRecord(zone.id, 'a'.repeat(32), { type: 'A', name: 'x.example.com', content: '1.2.3.4', ttl: 1, proxied: false })
      ).rejects.toMatchObject({ kind: 'api', status: 404, message: '[81044] Record does not exist.' });
    });
  });

  describe('deleteRecord', () => {
    it('should delete the record', async () => {
      const stored = api.addRecord(zone.id, { type: 'A', name: 'www.example.com', content: '1.2.3.4' });

      await provider.deleteRecord(zone.id, stored.id);

      expect(api.mutations.map((r) => `${r.method} ${r.path}`)).toEqual([
        `DELETE /zones/${zone.id}/dns_records/${stored.id}`,
      ]);
      expect(api.zoneRecords(zone.id)).toHaveLength(0);
    });
  });

  describe('error classification', () => {
    it('should report an invalid token as an authentication failure', async () => {
      const rejected = new CloudflareProvider('wrong-token', { baseURL });

      await expect(rejected.listZones()).rejects.toMatchObject({
        kind: 'authentication',
        status: 401,
        message: 'Authentication failed: [10000] Authentication error',
      });
    });

    it('should treat token error codes as authentication failures', async () => {
      api.failNext({ status: 400, errors: [{ code: 9109, message: 'Invalid access token' }] });

      await expect(provider.listZones()).rejects.toMatchObject({
        kind: 'authentication',
        message: 'Authentication failed: [9109] Invalid access token',
      });
    });

    it('should treat 403 as an authentication failure', async () => {
      api.failNext({ status: 403, errors: [{ code: 9999, message: 'Forbidden' }] });

      const error = await provider.listRecords(zone.id).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ProviderError);
      expect(error).toMatchObject({ kind: 'authentication', status: 403 });
    });

    it('should report an unreachable API as a network failure', async () => {
      await api.stop();

      await expect(provider.listZones()).rejects.toMatchObject({
        kind: 'network',
        message: NETWORK_ERROR_MESSAGE,
      });
    });
  });
});
