import { describe, it, expect, beforeEach } from 'vitest';
import {
  ENRICHED_COUNT_KEY,
  THREAT_INTEL_ERROR_KEY,
  ThreatIntelEnricher,
  observableTypeId,
} from '../../../src/application/units/threat-intel-enricher.js';
import { EventRecord } from '../../../src/domain/event-record.js';
import { FakeLookupClient, fakeLogger } from '../../helpers.js';

const ENDPOINT = 'http://intel.test/api/threat-intel';

describe('observableTypeId', () => {
  it('accepts integers and digit strings', () => {
    expect(observableTypeId({ type_id: 7 })).toBe(7);
    expect(observableTypeId({ type_id: '23' })).toBe(23);
  });

  it('treats anything else as absent', () => {
    expect(observableTypeId({ type_id: 7.5 })).toBeUndefined();
    expect(observableTypeId({ type_id: 'seven' })).toBeUndefined();
    expect(observableTypeId({})).toBeUndefined();
  });
});

describe('ThreatIntelEnricher', () => {
  let client: FakeLookupClient;
  let log: ReturnType<typeof fakeLogger>;
  let unit: ThreatIntelEnricher;

  beforeEach(() => {
    client = new FakeLookupClient();
    log = fakeLogger();
    unit = new ThreatIntelEnricher({ endpoint: ENDPOINT, timeoutMs: 500 }, client, log);
  });

  it('enriches eligible observables in order and counts them', async () => {
    client
      .set(ENDPOINT, 'evil.exe', { severity: 'high' })
      .set(ENDPOINT, '10.0.0.5', { severity: 'low' });

    const record = new EventRecord({
      observables: [
        { name: 'evil.exe', type_id: 7 },
        { name: 'alice', type_id: 3 },
        { name: '10.0.0.5', type_id: '2' },
        'not-an-object',
        { name: '', type_id: 1 },
        { name: 'bad.test', type_id: 4 },
      ],
    });

    expect(await unit.apply(record, {})).toEqual({ kind: 'continue' });
    expect(client.calls.map((c) => c.key)).toEqual(['evil.exe', '10.0.0.5', 'bad.test']);
    expect(record.body).toEqual({
      observables: [
        { name: 'evil.exe', type_id: 7, threat_intel: { severity: 'high' } },
        { name: 'alice', type_id: 3 },
        { name: '10.0.0.5', type_id: '2', threat_intel: { severity: 'low' } },
        'not-an-object',
        { name: '', type_id: 1 },
        { name: 'bad.test', type_id: 4 },
      ],
    });
    expect(record.getMeta(ENRICHED_COUNT_KEY)).toBe('2');
    expect(record.getMeta(THREAT_INTEL_ERROR_KEY)).toBe('http status 404: not found');
    expect(log.warn).toHaveBeenCalledTimes(1);
  });

  it('continues without a count when there are no observables', async () => {
    const record = new EventRecord({ class_uid: 2004, observables: [] });

    expect(await unit.apply(record, {})).toEqual({ kind: 'continue' });
    expect(record.getMeta(ENRICHED_COUNT_KEY)).toBeUndefined();
    expect(client.calls).toHaveLength(0);
  });

  it('writes a zero count when nothing was eligible', async () => {
    const record = new EventRecord({ observables: [{ name: 'alice', type_id: 3 }] });
    await unit.apply(record, {});
    expect(record.getMeta(ENRICHED_COUNT_KEY)).toBe('0');
  });

  it('honours a configured type list', async () => {
    const usersOnly = new ThreatIntelEnricher({ endpoint: ENDPOINT, timeoutMs: 500, types: [3] }, client, log);
    client.set(ENDPOINT, 'alice', { known: true });
    const record = new EventRecord({
      observables: [{ name: 'alice', type_id: 3 }, { name: 'evil.exe', type_id: 7 }],
    });

    await usersOnly.apply(record, {});
    expect(client.calls.map((c) => c.key)).toEqual(['alice']);
    expect(record.getMeta(ENRICHED_COUNT_KEY)).toBe('1');
  });

  it('fails a record whose body is not an object', async () => {
    const outcome = await unit.apply(new EventRecord('text'), {});
    expect(outcome.kind).toBe('fail');
  });
});
