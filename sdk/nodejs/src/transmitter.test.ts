// SPDX-License-Identifier: MIT

import { describe, it, afterEach, mock } from 'node:test';
import assert from 'node:assert';
import { Transmitter, encodeReport, serializeReport } from './transmitter.js';
import { SerializationError, TransportError } from './errors.js';
import type { IdentitySnapshot, TickSnapshot } from './types.js';

const identity: IdentitySnapshot = {
  nodeId: 'node-test',
  cpuInfo: 'Test CPU @ 2.00GHz',
  version: '1.4.0',
  osType: 'linux',
  archType: 'x64',
  startTime: new Date(0),
};

const tick: TickSnapshot = {
  upTime: 900,
  storageUsed: 2048,
  memoryUsed: 512,
  cpuUsed: 7.25,
  upload: 10,
  download: 20,
  totalUpload: 110,
  totalDownload: 220,
  blocksUp: 3,
  blocksDown: 4,
  exchanges: 5,
  peersConnected: 6,
};

function waitForAbort(signal: AbortSignal | null | undefined): Promise<Response> {
  return new Promise((_resolve, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

describe('encodeReport', () => {
  it('should map every field to its wire name', () => {
    assert.deepStrictEqual(encodeReport(identity, tick), {
      node_id: 'node-test',
      cpu_info: 'Test CPU @ 2.00GHz',
      btfs_version: '1.4.0',
      os_type: 'linux',
      arch_type: 'x64',
      up_time: 900,
      storage_used: 2048,
      memory_used: 512,
      cpu_used: 7.25,
      upload: 10,
      download: 20,
      total_upload: 110,
      total_download: 220,
      blocks_up: 3,
      blocks_down: 4,
      exchanges: 5,
      peers_connected: 6,
    });
  });
});

describe('serializeReport', () => {
  it('should decode back to identical values', () => {
    const report = encodeReport(identity, tick);

    const decoded: unknown = JSON.parse(serializeReport(report));

    assert.deepStrictEqual(decoded, report);
  });

  it('should wrap encoding failures', () => {
    const report = encodeReport(identity, tick);
    const broken = {
      ...report,
      toJSON(): never {
        throw new Error('cannot encode');
      },
    };

    assert.throws(() => serializeReport(broken), SerializationError);
  });
});

describe('Transmitter', () => {
  afterEach(() => {
    mock.restoreAll();
  });

  it('should post the JSON report to the endpoint', async () => {
    const fetchMock = mock.method(
      globalThis,
      'fetch',
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Response('ignored', { status: 200 })
    );
    const transmitter = new Transmitter('http://collector.test/metrics', 1000);
    const report = encodeReport(identity, tick);

    await transmitter.send(report);

    assert.strictEqual(fetchMock.mock.callCount(), 1);
    const call = fetchMock.mock.calls[0];
    assert.ok(call);
    const [input, init] = call.arguments;
    assert.strictEqual(input, 'http://collector.test/metrics');
    assert.strictEqual(init?.method, 'POST');
    assert.deepStrictEqual(init?.headers, { 'Content-Type': 'application/json' });
    assert.strictEqual(init?.body, serializeReport(report));
  });

  it('should not inspect the response status', async () => {
    mock.method(
      globalThis,
      'fetch',
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> =>
        new Response('server error', { status: 500 })
    );
    const transmitter = new Transmitter('http://collector.test/metrics', 1000);

    await transmitter.send(encodeReport(identity, tick));
  });

  it('should wrap network failures', async () => {
    mock.method(
      globalThis,
      'fetch',
      async (_input: string | URL | Request, _init?: RequestInit): Promise<Response> => {
        throw new TypeError('fetch failed');
      }
    );
    const transmitter = new Transmitter('http://collector.test/metrics', 1000);

    await assert.rejects(transmitter.send(encodeReport(identity, tick)), (err: unknown) => {
      assert.ok(err instanceof TransportError);
      assert.strictEqual(err.code, 'TRANSPORT_FAILURE');
      assert.ok(err.cause instanceof TypeError);
      return true;
    });
  });

  it('should abort a request that exceeds the timeout', async () => {
    mock.method(
      globalThis,
      'fetch',
      (_input: string | URL | Request, init?: RequestInit): Promise<Response> => waitForAbort(init?.signal)
    );
    const transmitter = new Transmitter('http://collector.test/metrics', 20);

    await assert.rejects(transmitter.send(encodeReport(identity, tick)), TransportError);
  });

  it('should abort when the caller signal is already aborted', async () => {
    mock.method(
      globalThis,
      'fetch',
      (_input: string | URL | Request, init?: RequestInit): Promise<Response> => waitForAbort(init?.signal)
    );
    const transmitter = new Transmitter('http://collector.test/metrics', 10000);
    const controller = new AbortController();
    controller.abort();

    await assert.rejects(transmitter.send(encodeReport(identity, tick), controller.signal), TransportError);
  });
});
