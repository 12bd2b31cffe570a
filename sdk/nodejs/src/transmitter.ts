// SPDX-License-Identifier: MIT

import type { IdentitySnapshot, Report, TickSnapshot } from './types.js';
import { SerializationError, TransportError } from './errors.js';

/**
 * Merges the identity with a tick into the wire payload.
 */
export function encodeReport(identity: IdentitySnapshot, tick: TickSnapshot): Report {
  return {
    node_id: identity.nodeId,
    cpu_info: identity.cpuInfo,
    btfs_version: identity.version,
    os_type: identity.osType,
    arch_type: identity.archType,
    up_time: tick.upTime,
    storage_used: tick.storageUsed,
    memory_used: tick.memoryUsed,
    cpu_used: tick.cpuUsed,
    upload: tick.upload,
    download: tick.download,
    total_upload: tick.totalUpload,
    total_download: tick.totalDownload,
    blocks_up: tick.blocksUp,
    blocks_down: tick.blocksDown,
    exchanges: tick.exchanges,
    peers_connected: tick.peersConnected,
  };
}

/**
 * @throws SerializationError if the report cannot be encoded as JSON.
 */
export function serializeReport(report: Report): string {
  try {
    return JSON.stringify(report);
  } catch (err) {
    throw new SerializationError('report could not be serialized', { cause: err });
  }
}

/**
 * Delivers reports to the collection endpoint.
 * The response is read and discarded; its status is not inspected.
 */
export class Transmitter {
  private readonly url: string;
  private readonly timeoutMs: number;

  constructor(url: string, timeoutMs: number) {
    this.url = url;
    this.timeoutMs = timeoutMs;
  }

  /**
   * Posts one report.
   *
   * @throws SerializationError if the report cannot be encoded.
   * @throws TransportError if the request cannot be built, fails, times out or is aborted.
   */
  async send(report: Report, signal?: AbortSignal): Promise<void> {
    const body = serializeReport(report);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    // Combine signals
    const onAbort = (): void => controller.abort();
    if (signal) {
      if (signal.aborted) {
        controller.abort();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    try {
      const response = await fetch(this.url, {
        method: 'POST',
        body,
        signal: controller.signal,
        headers: {
          'Content-Type': 'application/json',
        },
      });
      await response.arrayBuffer();
    } catch (err) {
      throw new TransportError(`report delivery to ${this.url} failed`, { cause: err });
    } finally {
      clearTimeout(timeoutId);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
