import { describe, it, expect } from 'vitest';
import { EventRecord, RECEIVED_AT_KEY, appendTags, eventUid } from '../../src/domain/event-record.js';
import type { JsonObject } from '../../src/domain/value.js';

describe('EventRecord', () => {
  it('uses metadata.uid as id when present', () => {
    const record = new EventRecord({ metadata: { uid: 'evt-42' } });
    expect(record.id).toBe('evt-42');
  });

  it('generates an id when the body has no uid', () => {
    const record = new EventRecord({ class_uid: 2004 });
    expect(record.id).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('keeps initial metadata and exposes it as a plain object', () => {
    const record = new EventRecord({}, [[RECEIVED_AT_KEY, '2026-02-18T12:00:00Z']]);
    record.setMeta('tag.source', 'http_receiver');

    expect(record.getMeta(RECEIVED_AT_KEY)).toBe('2026-02-18T12:00:00Z');
    expect(record.metadata()).toEqual({
      'http.received_at': '2026-02-18T12:00:00Z',
      'tag.source': 'http_receiver',
    });
  });

  it('objectBody() is undefined for non-object bodies', () => {
    expect(new EventRecord([1, 2]).objectBody()).toBeUndefined();
    expect(new EventRecord('text').objectBody()).toBeUndefined();
  });

  it('clone() is independent of the original', () => {
    const original = new EventRecord({ nested: { n: 1 } }, [['k', 'v']]);
    const copy = original.clone();

    const copyBody = copy.objectBody();
    if (!copyBody) throw new Error('expected object body');
    copyBody['nested'] = { n: 2 };
    copy.setMeta('k', 'changed');

    expect(original.body).toEqual({ nested: { n: 1 } });
    expect(original.getMeta('k')).toBe('v');
  });

  it('serializes body and metadata for sinks', () => {
    const record = new EventRecord({ a: 1 }, [['x', 'y']]);
    expect(JSON.parse(JSON.stringify(record))).toEqual({ body: { a: 1 }, metadata: { x: 'y' } });
  });
});

describe('eventUid', () => {
  it('ignores non-string uids', () => {
    expect(eventUid({ metadata: { uid: 7 } })).toBeUndefined();
    expect(eventUid('x')).toBeUndefined();
  });
});

describe('appendTags', () => {
  it('appends to an existing array in order', () => {
    const body: JsonObject = { tags: ['existing'] };
    appendTags(body, ['a', 'b']);
    expect(body['tags']).toEqual(['existing', 'a', 'b']);
  });

  it('replaces a non-array tags value', () => {
    const body: JsonObject = { tags: 'oops' };
    appendTags(body, ['a']);
    expect(body['tags']).toEqual(['a']);
  });

  it('does nothing for an empty tag list', () => {
    const body: JsonObject = {};
    appendTags(body, []);
    expect(body).toEqual({});
  });
});
