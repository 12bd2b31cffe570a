// SPDX-License-Identifier: MIT

import type {
  AgentConfig,
  AgentStatus,
  HostNode,
  IdentitySnapshot,
  Report,
  SystemProbe,
  TickSnapshot,
} from './types.js';
import { describeError } from './errors.js';
import { buildIdentity } from './identity.js';
import { ExchangeLedger } from './ledger.js';
import { Sampler, emptyTick } from './sampler.js';
import { NodeSystemProbe } from './system.js';
import { Transmitter, encodeReport } from './transmitter.js';

export const DEFAULT_SERVER_URL = 'http://18.220.204.165:8080/metrics';
const DEFAULT_REPORT_INTERVAL_MS = 900000; // 15 minutes
const MIN_REPORT_INTERVAL_MS = 1000; // 1 second
const HTTP_TIMEOUT_MS = 10000; // 10 seconds
const MAX_TIMER_DELAY_MS = 2147483647; // largest delay setTimeout/setInterval accept

type Counters = Pick<
  AgentStatus,
  'ticks' | 'reportsSent' | 'reportsFailed' | 'incompleteTicks' | 'lastTickAt' | 'lastError'
>;

/**
 * Background analytics agent of a storage node.
 *
 * @example
 * ```typescript
 * import { AnalyticsAgent } from '@storage-node/analytics';
 *
 * const agent = new AnalyticsAgent({ version: '1.2.0' }, node);
 *
 * // Reports once now, then every 15 minutes
 * agent.start();
 *
 * // On shutdown:
 * await agent.stop();
 * ```
 */
export class AnalyticsAgent {
  readonly config: Readonly<Required<AgentConfig>>;
  readonly identity: IdentitySnapshot;
  private readonly sampler: Sampler;
  private readonly transmitter: Transmitter;
  private readonly ledger = new ExchangeLedger();
  private previous: TickSnapshot = emptyTick();
  private report: Report | null = null;
  private counters: Counters = { ticks: 0, reportsSent: 0, reportsFailed: 0, incompleteTicks: 0 };
  private intervalId: ReturnType<typeof setInterval> | null = null;
  private abortController: AbortController | null = null;
  private inFlight: Promise<void> | null = null;
  private pending = false;

  /**
   * Creates a new agent and captures the node identity.
   *
   * @param config - Agent configuration.
   * @param host - Storage node the agent reports on.
   * @param probe - OS introspection (default: node:os and node:process).
   * @throws SensorUnavailableError if the node identifier or CPU information is missing.
   */
  constructor(config: AgentConfig, host: HostNode, probe: SystemProbe = new NodeSystemProbe()) {
    let reportIntervalMs = config.reportIntervalMs || DEFAULT_REPORT_INTERVAL_MS;

    if (reportIntervalMs < MIN_REPORT_INTERVAL_MS) {
      reportIntervalMs = MIN_REPORT_INTERVAL_MS;
    }
    if (reportIntervalMs > MAX_TIMER_DELAY_MS) {
      reportIntervalMs = MAX_TIMER_DELAY_MS;
    }

    this.config = {
      version: config.version,
      serverUrl: config.serverUrl || DEFAULT_SERVER_URL,
      enabled: isDoNotTrack() ? false : (config.enabled ?? analyticsEnabledFromEnv()),
      reportIntervalMs,
      timeoutMs: Math.min(config.timeoutMs || HTTP_TIMEOUT_MS, MAX_TIMER_DELAY_MS),
    };

    this.identity = buildIdentity(host, config.version, probe);
    this.sampler = new Sampler(host, probe, this.identity.startTime);
    this.transmitter = new Transmitter(this.config.serverUrl, this.config.timeoutMs);
  }

  /**
   * Starts reporting: one report immediately, then one per interval.
   * Calling start on a running agent returns its current controller.
   *
   * @returns AbortController to stop the agent.
   */
  start(): AbortController {
    if (this.abortController && !this.abortController.signal.aborted) {
      return this.abortController;
    }
    const controller = new AbortController();
    this.abortController = controller;

    if (!this.config.enabled) {
      this.log('Analytics disabled');
      return controller;
    }

    controller.signal.addEventListener('abort', () => this.clearTimer(), { once: true });

    this.trigger();
    this.intervalId = setInterval(() => this.trigger(), this.config.reportIntervalMs);
    // The host process may exit while the agent is idle
    this.intervalId.unref?.();

    this.log(`Analytics started for ${this.identity.nodeId}`);
    return controller;
  }

  /**
   * Stops the agent. A report in flight is aborted and dropped.
   * Resolves once the current cycle has settled.
   */
  async stop(): Promise<void> {
    this.clearTimer();
    const controller = this.abortController;
    if (!controller) {
      return;
    }
    this.abortController = null;
    this.pending = false;
    controller.abort();

    if (this.inFlight) {
      await this.inFlight;
    }
    if (this.config.enabled) {
      this.log('Analytics stopped');
    }
  }

  status(): AgentStatus {
    const controller = this.abortController;
    return {
      running: this.config.enabled && controller !== null && !controller.signal.aborted,
      ledgerSize: this.ledger.size,
      ...this.counters,
    };
  }

  /**
   * Returns the last report built, delivered or not.
   */
  lastReport(): Report | null {
    return this.report;
  }

  /**
   * Runs a cycle, or queues a single one if a cycle is still running.
   * Intervals elapsing while one is already queued are dropped.
   */
  private trigger(): void {
    if (!this.activeSignal()) return;

    this.pending = true;
    if (this.inFlight) return;

    this.inFlight = this.drain().finally(() => {
      this.inFlight = null;
      if (this.pending) {
        this.trigger();
      }
    });
  }

  /**
   * Runs queued cycles under the current controller, which may belong to a
   * later start() than the one that began draining.
   */
  private async drain(): Promise<void> {
    while (this.pending) {
      const signal = this.activeSignal();
      if (!signal) {
        this.pending = false;
        return;
      }
      this.pending = false;
      await this.cycle(signal);
    }
  }

  private activeSignal(): AbortSignal | null {
    const controller = this.abortController;
    return controller && !controller.signal.aborted ? controller.signal : null;
  }

  private async cycle(signal: AbortSignal): Promise<void> {
    let report: Report;
    try {
      const result = await this.sampler.sample(this.previous, this.ledger);
      this.previous = result.tick;
      this.counters.ticks++;
      this.counters.lastTickAt = new Date();

      const [issue] = result.issues;
      if (!result.complete) {
        this.counters.incompleteTicks++;
      }
      if (issue) {
        this.counters.lastError = describeError(issue);
      }

      report = encodeReport(this.identity, result.tick);
      this.report = report;
    } catch (err) {
      this.counters.lastError = describeError(err);
      return;
    }

    if (signal.aborted) return;

    try {
      await this.transmitter.send(report, signal);
      this.counters.reportsSent++;
    } catch (err) {
      if (!signal.aborted) {
        this.counters.reportsFailed++;
        this.counters.lastError = describeError(err);
      }
    }
  }

  private clearTimer(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
    }
  }

  private log(message: string): void {
    console.log(`[analytics] ${message}`);
  }
}

/**
 * Reads the BTFS_ANALYTICS environment variable.
 * Returns true by default (enabled), false only if explicitly set to "false" or "0".
 */
export function analyticsEnabledFromEnv(): boolean {
  const val = (process.env['BTFS_ANALYTICS'] ?? '').toLowerCase();
  return val !== 'false' && val !== '0';
}

/**
 * Checks if DO_NOT_TRACK environment variable is set to disable analytics.
 */
export function isDoNotTrack(): boolean {
  const val = (process.env['DO_NOT_TRACK'] ?? '').toLowerCase();
  return val === 'true' || val === '1';
}
