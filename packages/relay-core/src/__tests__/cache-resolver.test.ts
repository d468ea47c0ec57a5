import { describe, it, expect } from 'vitest';
import {
  artifactToReplay,
  isReusable,
  resolveCache,
  toReplay,
} from '../cache/cache-resolver.js';
import type { TransactionRecord, TransactionResponse } from '../transaction/types.js';

function makeResponse(overrides?: Partial<Omit<TransactionResponse, 'type' | 'payload'>>): TransactionResponse {
  return {
    status_code: 200,
    status_text: 'OK',
    headers: { 'content-type': 'application/json', 'content-encoding': 'gzip' },
    type: 'json',
    payload: { items: [] },
    ...overrides,
  };
}

function makeRecord(method: string, response?: TransactionResponse): TransactionRecord {
  const record: TransactionRecord = {
    method,
    path: 'items',
    query_string: '',
    folder: 'dev',
    headers: {},
    type: 'string',
    payload: '',
    stats: {},
    original_headers: {},
    server_headers: {},
  };
  if (response) record.response = response;
  return record;
}

describe('isReusable', () => {
  it('should accept any completed response in permissive mode', () => {
    expect(isReusable(makeResponse({ status_code: 500 }), 'DELETE', 'permissive')).toBe(true);
    expect(isReusable(makeResponse({ status_code: 404 }), 'GET', 'permissive')).toBe(true);
  });

  it('should require GET/POST and 2xx in strict mode', () => {
    expect(isReusable(makeResponse(), 'GET', 'strict')).toBe(true);
    expect(isReusable(makeResponse({ status_code: 201 }), 'post', 'strict')).toBe(true);
    expect(isReusable(makeResponse({ status_code: 299 }), 'GET', 'strict')).toBe(true);
    expect(isReusable(makeResponse({ status_code: 300 }), 'GET', 'strict')).toBe(false);
    expect(isReusable(makeResponse({ status_code: 404 }), 'GET', 'strict')).toBe(false);
    expect(isReusable(makeResponse(), 'PUT', 'strict')).toBe(false);
  });

  it('should reject a missing response', () => {
    expect(isReusable(undefined, 'GET', 'permissive')).toBe(false);
  });
});

describe('toReplay', () => {
  it('should drop transfer headers and decode the body', () => {
    expect(toReplay(makeResponse())).toEqual({
      statusCode: 200,
      statusText: 'OK',
      headers: { 'content-type': 'application/json' },
      body: '{"items":[]}',
    });
  });
});

describe('resolveCache', () => {
  it('should miss when nothing was sent', () => {
    expect(resolveCache(undefined, 'GET', 'permissive')).toEqual({ outcome: 'miss', reason: 'absent' });
  });

  it('should hit on a reusable record', () => {
    const decision = resolveCache(makeRecord('GET', makeResponse()), 'GET', 'strict');
    expect(decision.outcome).toBe('hit');
    if (decision.outcome === 'hit') {
      expect(decision.response.statusCode).toBe(200);
      expect(decision.response.body).toBe('{"items":[]}');
    }
  });

  it('should replay error responses in permissive mode only', () => {
    const record = makeRecord('GET', makeResponse({ status_code: 503, status_text: 'Service Unavailable' }));
    expect(resolveCache(record, 'GET', 'permissive').outcome).toBe('hit');
    expect(resolveCache(record, 'GET', 'strict')).toEqual({ outcome: 'miss', reason: 'not-reusable' });
  });

  it('should never replay an error sentinel', () => {
    expect(resolveCache({ error: 'connection refused' }, 'GET', 'permissive')).toEqual({
      outcome: 'miss',
      reason: 'not-reusable',
    });
  });

  it('should never replay a record without a response', () => {
    expect(resolveCache(makeRecord('GET'), 'GET', 'permissive')).toEqual({
      outcome: 'miss',
      reason: 'not-reusable',
    });
  });
});

describe('artifactToReplay', () => {
  it('should map an error sentinel to 500 with an empty body', () => {
    expect(artifactToReplay({ error: 'connection refused' })).toEqual({
      statusCode: 500,
      statusText: '',
      headers: {},
      body: '',
    });
  });

  it('should replay a completed record as stored', () => {
    const replay = artifactToReplay(
      makeRecord('DELETE', makeResponse({ status_code: 204, status_text: 'No Content', headers: {} }))
    );
    expect(replay.statusCode).toBe(204);
    expect(replay.statusText).toBe('No Content');
    expect(replay.headers).toEqual({});
  });
});
