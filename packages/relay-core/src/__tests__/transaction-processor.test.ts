import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { Mock } from 'vitest';
import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import type { Logger } from 'pino';
import { FolderQueue, buildQueuePaths } from '../queue/folder-queue.js';
import { TransactionProcessor, buildTargetUrl } from '../processor/transaction-processor.js';
import { encodeRequest } from '../transaction/encoder.js';
import { ForwardError } from '../forward/types.js';
import type { Forwarder, ForwardRequest, ForwardResponse } from '../forward/types.js';
import type { RelayRoute } from '../route.js';
import type { InboundRequest } from '../transaction/types.js';

function createMockLogger(): Logger {
  return {
    child: () => createMockLogger(),
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } as unknown as Logger;
}

type StubForwarder = Forwarder & {
  forward: Mock<(request: ForwardRequest) => Promise<ForwardResponse>>;
};

function createStubForwarder(): StubForwarder {
  return {
    kind: 'direct',
    forward: vi.fn<(request: ForwardRequest) => Promise<ForwardResponse>>(),
  };
}

const CREATED = new Date('2024-03-01T12:00:00.000Z');
const STARTED = new Date('2024-03-01T12:00:01.000Z');
const FINISHED = new Date('2024-03-01T12:00:03.500Z');

describe('buildTargetUrl', () => {
  it('should join base, path and query string', () => {
    expect(buildTargetUrl('http://api.internal', 'items', '')).toBe('http://api.internal/items');
    expect(buildTargetUrl('http://api.internal', 'items', 'page=2')).toBe(
      'http://api.internal/items?page=2'
    );
  });
});

describe('TransactionProcessor', () => {
  let tmpDir: string;
  let route: RelayRoute;
  let queue: FolderQueue;
  let forwarder: StubForwarder;
  let processor: TransactionProcessor;

  function submit(overrides?: Partial<InboundRequest>): Promise<string> {
    const { name, record } = encodeRequest(
      {
        method: 'GET',
        path: 'items',
        queryString: '',
        folder: 'dev',
        headers: { Host: 'localhost:19790', Accept: 'application/json' },
        ...overrides,
      },
      { cacheMode: 'permissive', now: () => CREATED }
    );
    return queue.submit(name, record).then(() => name);
  }

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'relay-proc-'));
    route = { name: 'dev', backendUrl: 'http://api.internal', paths: buildQueuePaths(tmpDir, 'dev') };
    queue = new FolderQueue(route.paths, createMockLogger());
    forwarder = createStubForwarder();
    const now = vi.fn<() => Date>().mockReturnValueOnce(STARTED).mockReturnValueOnce(FINISHED);
    processor = new TransactionProcessor({ route, queue, forwarder, logger: createMockLogger(), now });
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should forward a GET and store the completed record', async () => {
    forwarder.forward.mockResolvedValue({
      statusCode: 200,
      statusText: 'OK',
      headers: { 'content-type': 'application/json' },
      body: Buffer.from('{"items":[1,2]}'),
    });
    const name = await submit();

    const outcome = await processor.process(name);

    expect(outcome.status).toBe('completed');
    expect(forwarder.forward).toHaveBeenCalledWith({
      method: 'GET',
      url: 'http://api.internal/items',
      headers: {},
      body: undefined,
    });

    const sent = await queue.lookupSent(name);
    expect(sent).toMatchObject({
      method: 'GET',
      path: 'items',
      response: {
        status_code: 200,
        status_text: 'OK',
        headers: { 'content-type': 'application/json' },
        type: 'json',
        payload: { items: [1, 2] },
      },
      stats: {
        created_at: '2024-03-01T12:00:00.000Z',
        started_at: '2024-03-01T12:00:01.000Z',
        finished_at: '2024-03-01T12:00:03.500Z',
        elapsed_request: 2.5,
        elapsed_total: 3.5,
      },
    });
    expect(await queue.locate(name)).toEqual(['sent']);
  });

  it('should forward the decoded body and drop transport headers', async () => {
    forwarder.forward.mockResolvedValue({ statusCode: 201, statusText: 'Created', headers: {}, body: '' });
    const name = await submit({
      method: 'POST',
      queryString: 'dry=1',
      headers: { 'Content-Type': 'application/json', 'Content-Length': '17', 'X-Tenant': 't1' },
      body: Buffer.from('{"name":"widget"}'),
    });

    await processor.process(name);

    expect(forwarder.forward).toHaveBeenCalledWith({
      method: 'POST',
      url: 'http://api.internal/items?dry=1',
      headers: { 'Content-Type': 'application/json', 'X-Tenant': 't1' },
      body: '{"name":"widget"}',
    });
  });

  it('should carry a JSON null body through to the backend and back', async () => {
    forwarder.forward.mockResolvedValue({
      statusCode: 200,
      statusText: 'OK',
      headers: { 'content-type': 'application/json' },
      body: Buffer.from('null'),
    });
    const name = await submit({
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: Buffer.from('null'),
    });

    await processor.process(name);

    expect(forwarder.forward).toHaveBeenCalledWith({
      method: 'POST',
      url: 'http://api.internal/items',
      headers: { 'Content-Type': 'application/json' },
      body: 'null',
    });
    const sent = await queue.lookupSent(name);
    expect(sent).toMatchObject({
      type: 'json',
      payload: null,
      response: { status_code: 200, type: 'json', payload: null },
    });
  });

  it('should write an error artifact when the backend is unreachable', async () => {
    forwarder.forward.mockRejectedValue(
      new ForwardError('fetch failed: connect ECONNREFUSED 127.0.0.1:9', 'http://api.internal/items')
    );
    const name = await submit();

    const outcome = await processor.process(name);

    expect(outcome).toEqual({
      status: 'failed',
      name,
      reason: 'fetch failed: connect ECONNREFUSED 127.0.0.1:9',
    });
    expect(await queue.lookupSent(name)).toEqual({
      error: 'fetch failed: connect ECONNREFUSED 127.0.0.1:9',
    });
    expect(await queue.inboxExists(name)).toBe(false);
    expect(await queue.draftExists(name)).toBe(false);
  });

  it('should write an error artifact for an unreadable claimed record', async () => {
    const name = 'items_broken';
    fs.mkdirSync(route.paths.drafts, { recursive: true });
    fs.writeFileSync(path.join(route.paths.drafts, `${name}.json`), '{not json');

    const outcome = await processor.process(name);

    expect(outcome.status).toBe('failed');
    expect(forwarder.forward).not.toHaveBeenCalled();
    expect(await queue.locate(name)).toEqual(['sent']);
  });

  it('should skip a draft that is already gone', async () => {
    expect(await processor.process('items_missing')).toEqual({ status: 'skipped', name: 'items_missing' });
    expect(forwarder.forward).not.toHaveBeenCalled();
  });
});
