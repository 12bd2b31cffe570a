// SPDX-License-Identifier: MIT

import type {
  ExchangeReading,
  HostNode,
  Readings,
  SystemProbe,
  TickSnapshot,
} from './types.js';
import { AnalyticsError, CapabilityAbsentError, SensorUnavailableError } from './errors.js';
import { ExchangeLedger, clampedDelta } from './ledger.js';

const KILOBYTE = 1024;

export function toKilobytes(bytes: number): number {
  return Math.floor(bytes / KILOBYTE);
}

/**
 * Baseline snapshot used before the first tick.
 */
export function emptyTick(): TickSnapshot {
  return {
    upTime: 0,
    storageUsed: 0,
    memoryUsed: 0,
    cpuUsed: 0,
    upload: 0,
    download: 0,
    totalUpload: 0,
    totalDownload: 0,
    blocksUp: 0,
    blocksDown: 0,
    exchanges: 0,
    peersConnected: 0,
  };
}

export interface TickResult {
  tick: TickSnapshot;
  /** False when some readings were unavailable and their fields kept previous values */
  complete: boolean;
}

export interface SampleResult extends TickResult {
  /** Why the tick is incomplete */
  issues: AnalyticsError[];
}

/**
 * Computes the next snapshot from the previous one and this tick's readings.
 *
 * Network and exchange fields are only updated when exchange readings are
 * present; otherwise they keep their previous values and the ledger is left
 * untouched. The ledger is updated in place for every connected peer.
 */
export function advance(
  previous: TickSnapshot,
  ledger: ExchangeLedger,
  readings: Readings
): TickResult {
  const tick: TickSnapshot = {
    ...previous,
    upTime: readings.upTime,
    memoryUsed: toKilobytes(readings.heapBytes),
    cpuUsed: readings.cpuPercent,
  };
  let complete = true;

  if (readings.storageBytes === null) {
    complete = false;
  } else {
    tick.storageUsed = toKilobytes(readings.storageBytes);
  }

  const exchange = readings.exchange;
  if (exchange === null) {
    return { tick, complete: false };
  }

  const totalUpload = toKilobytes(exchange.dataSent);
  const totalDownload = toKilobytes(exchange.dataReceived);
  tick.upload = clampedDelta(totalUpload, previous.totalUpload);
  tick.download = clampedDelta(totalDownload, previous.totalDownload);
  tick.totalUpload = totalUpload;
  tick.totalDownload = totalDownload;
  tick.blocksUp = exchange.blocksSent;
  tick.blocksDown = exchange.blocksReceived;

  let exchanges = 0;
  for (const peer of exchange.peers) {
    exchanges += ledger.record(peer.id, peer.exchanged);
  }
  tick.exchanges = exchanges;
  tick.peersConnected = exchange.peers.length;

  return { tick, complete };
}

/**
 * Pulls live readings from the host node and the system probe.
 */
export class Sampler {
  private readonly host: HostNode;
  private readonly probe: SystemProbe;
  private readonly startTime: Date;
  private readonly now: () => number;

  constructor(host: HostNode, probe: SystemProbe, startTime: Date, now: () => number = Date.now) {
    this.host = host;
    this.probe = probe;
    this.startTime = startTime;
    this.now = now;
  }

  /**
   * Reads every collaborator once. Failed readings are returned as null with the reason.
   */
  async read(): Promise<{ readings: Readings; issues: AnalyticsError[] }> {
    const issues: AnalyticsError[] = [];

    const upTime = Math.max(0, Math.floor((this.now() - this.startTime.getTime()) / 1000));
    const heapBytes = this.probe.heapUsed();
    const cpuPercent = this.probe.cpuPercent();

    let storageBytes: number | null = null;
    try {
      storageBytes = await this.host.storageUsage();
    } catch (err) {
      issues.push(new SensorUnavailableError('storage usage could not be read', { cause: err }));
    }

    let exchange: ExchangeReading | null = null;
    try {
      exchange = await this.readExchange();
    } catch (err) {
      issues.push(
        err instanceof CapabilityAbsentError
          ? err
          : new CapabilityAbsentError('exchange statistics could not be read', { cause: err })
      );
    }

    return {
      readings: { upTime, heapBytes, cpuPercent, storageBytes, exchange },
      issues,
    };
  }

  /**
   * Reads the collaborators and advances the snapshot.
   */
  async sample(previous: TickSnapshot, ledger: ExchangeLedger): Promise<SampleResult> {
    const { readings, issues } = await this.read();
    return { ...advance(previous, ledger, readings), issues };
  }

  private async readExchange(): Promise<ExchangeReading> {
    const provider = this.host.exchange();
    if (!provider) {
      throw new CapabilityAbsentError('exchange statistics are not supported by the active transfer mechanism');
    }

    const stat = await provider.stat();
    const peers = stat.peers.map((id) => ({ id, exchanged: provider.ledgerForPeer(id).exchanged }));

    return {
      dataSent: stat.dataSent,
      dataReceived: stat.dataReceived,
      blocksSent: stat.blocksSent,
      blocksReceived: stat.blocksReceived,
      peers,
    };
  }
}
