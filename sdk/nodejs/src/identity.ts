// SPDX-License-Identifier: MIT

import type { HostNode, IdentitySnapshot, SystemProbe } from './types.js';
import { SensorUnavailableError } from './errors.js';

/**
 * Captures the static information reported with every snapshot.
 * The CPU model is taken from the first reported CPU.
 *
 * @param host - Node the agent is embedded in.
 * @param version - Host software version.
 * @param probe - OS introspection.
 * @param startTime - Reference for uptime (default: now).
 * @throws SensorUnavailableError if the node identifier or CPU information is missing.
 */
export function buildIdentity(
  host: HostNode,
  version: string,
  probe: SystemProbe,
  startTime: Date = new Date()
): IdentitySnapshot {
  const nodeId = host.id;
  if (!nodeId) {
    throw new SensorUnavailableError('host node has no identifier');
  }

  let models: string[];
  try {
    models = probe.cpuModels();
  } catch (err) {
    throw new SensorUnavailableError('CPU information could not be read', { cause: err });
  }

  const [cpuInfo] = models;
  if (cpuInfo === undefined) {
    throw new SensorUnavailableError('no CPU information reported');
  }

  return Object.freeze({
    nodeId,
    cpuInfo,
    version,
    osType: probe.platform(),
    archType: probe.arch(),
    startTime,
  });
}
