// SPDX-License-Identifier: MIT

/**
 * Configuration for the analytics agent.
 */
export interface AgentConfig {
  /** Version of the host node software, reported as `btfs_version` */
  version: string;
  /** Collection endpoint (default: "http://18.220.204.165:8080/metrics") */
  serverUrl?: string;
  /** Enable or disable reporting (default: BTFS_ANALYTICS env, off under DO_NOT_TRACK) */
  enabled?: boolean;
  /** Interval between reports in milliseconds (default: 900000 = 15 minutes, minimum: 1000) */
  reportIntervalMs?: number;
  /** Timeout of a single report request in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * Per-peer accounting kept by the host's block exchange.
 */
export interface PeerLedger {
  /** Cumulative count of blocks exchanged with the peer */
  exchanged: number;
}

/**
 * Cumulative block exchange statistics.
 */
export interface ExchangeStat {
  dataSent: number;
  dataReceived: number;
  blocksSent: number;
  blocksReceived: number;
  /** Identifiers of currently connected peers */
  peers: string[];
}

/**
 * Exchange statistics capability. Only some transfer mechanisms provide it.
 */
export interface ExchangeProvider {
  stat(): ExchangeStat | Promise<ExchangeStat>;
  ledgerForPeer(peerId: string): PeerLedger;
}

/**
 * The storage node the agent is embedded in.
 */
export interface HostNode {
  /** Node identifier */
  readonly id: string;
  /** Bytes currently used by the node's repository */
  storageUsage(): number | Promise<number>;
  /** Returns the exchange statistics capability, or undefined when unsupported */
  exchange(): ExchangeProvider | undefined;
}

/**
 * OS and runtime introspection used by the agent.
 */
export interface SystemProbe {
  /** Model names of the available CPUs */
  cpuModels(): string[];
  /** CPU usage in percent since the previous call */
  cpuPercent(): number;
  /** Bytes currently allocated on the heap */
  heapUsed(): number;
  platform(): string;
  arch(): string;
}

/**
 * Static information captured once at agent start.
 */
export interface IdentitySnapshot {
  readonly nodeId: string;
  readonly cpuInfo: string;
  readonly version: string;
  readonly osType: string;
  readonly archType: string;
  readonly startTime: Date;
}

/**
 * Dynamic state sampled on each tick.
 * Sizes are in kilobytes; `upload`, `download` and `exchanges` are deltas since the previous tick.
 */
export interface TickSnapshot {
  upTime: number;
  storageUsed: number;
  memoryUsed: number;
  cpuUsed: number;
  upload: number;
  download: number;
  totalUpload: number;
  totalDownload: number;
  blocksUp: number;
  blocksDown: number;
  exchanges: number;
  peersConnected: number;
}

/**
 * Exchange readings for one tick, with per-peer cumulative counts already looked up.
 */
export interface ExchangeReading {
  dataSent: number;
  dataReceived: number;
  blocksSent: number;
  blocksReceived: number;
  peers: Array<{ id: string; exchanged: number }>;
}

/**
 * Raw collaborator readings for one tick.
 * A null field means the reading could not be taken this tick.
 */
export interface Readings {
  upTime: number;
  heapBytes: number;
  cpuPercent: number;
  storageBytes: number | null;
  exchange: ExchangeReading | null;
}

/**
 * Payload posted to the collection endpoint.
 */
export interface Report {
  node_id: string;
  cpu_info: string;
  btfs_version: string;
  os_type: string;
  arch_type: string;
  up_time: number;
  storage_used: number;
  memory_used: number;
  cpu_used: number;
  upload: number;
  download: number;
  total_upload: number;
  total_download: number;
  blocks_up: number;
  blocks_down: number;
  exchanges: number;
  peers_connected: number;
}

/**
 * Internal health of the agent. Never affects the host node.
 */
export interface AgentStatus {
  running: boolean;
  ticks: number;
  reportsSent: number;
  reportsFailed: number;
  incompleteTicks: number;
  ledgerSize: number;
  lastTickAt?: Date;
  lastError?: string;
}
