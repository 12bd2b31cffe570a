// SPDX-License-Identifier: MIT

export {
  AnalyticsAgent,
  DEFAULT_SERVER_URL,
  analyticsEnabledFromEnv,
  isDoNotTrack,
} from './agent.js';
export type {
  AgentConfig,
  AgentStatus,
  ExchangeProvider,
  ExchangeReading,
  ExchangeStat,
  HostNode,
  IdentitySnapshot,
  PeerLedger,
  Readings,
  Report,
  SystemProbe,
  TickSnapshot,
} from './types.js';
export {
  AnalyticsError,
  CapabilityAbsentError,
  SensorUnavailableError,
  SerializationError,
  TransportError,
} from './errors.js';
export type { AnalyticsErrorCode } from './errors.js';
export { buildIdentity } from './identity.js';
export { ExchangeLedger, clampedDelta } from './ledger.js';
export { Sampler, advance, emptyTick, toKilobytes } from './sampler.js';
export type { SampleResult, TickResult } from './sampler.js';
export { NodeSystemProbe } from './system.js';
export { Transmitter, encodeReport, serializeReport } from './transmitter.js';
