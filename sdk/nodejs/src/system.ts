// SPDX-License-Identifier: MIT

import { arch, cpus, platform, type CpuInfo } from 'node:os';
import { memoryUsage } from 'node:process';
import type { SystemProbe } from './types.js';

/**
 * Aggregate busy and total CPU time across all cores, in milliseconds.
 */
export interface CpuTimes {
  busy: number;
  total: number;
}

export function sumCpuTimes(infos: CpuInfo[]): CpuTimes {
  let busy = 0;
  let total = 0;
  for (const { times } of infos) {
    const { user, nice, sys, idle, irq } = times;
    busy += user + nice + sys + irq;
    total += user + nice + sys + idle + irq;
  }
  return { busy, total };
}

/**
 * Percentage of busy CPU time between two samples.
 * Returns 0 when no time has elapsed.
 */
export function cpuPercentBetween(previous: CpuTimes, current: CpuTimes): number {
  const total = current.total - previous.total;
  if (total <= 0) {
    return 0;
  }
  const busy = Math.max(0, current.busy - previous.busy);
  return Math.min(100, (busy / total) * 100);
}

/**
 * System probe backed by node:os and node:process.
 *
 * CPU usage is a zero-window sample: each call compares the cumulative CPU
 * times with those of the previous call, and the first call compares them
 * with the probe's construction.
 */
export class NodeSystemProbe implements SystemProbe {
  private readonly readCpus: () => CpuInfo[];
  private last: CpuTimes;

  constructor(readCpus: () => CpuInfo[] = cpus) {
    this.readCpus = readCpus;
    this.last = sumCpuTimes(readCpus());
  }

  cpuModels(): string[] {
    return this.readCpus().map((cpu) => cpu.model);
  }

  cpuPercent(): number {
    const current = sumCpuTimes(this.readCpus());
    const percent = cpuPercentBetween(this.last, current);
    this.last = current;
    return percent;
  }

  heapUsed(): number {
    return memoryUsage().heapUsed;
  }

  platform(): string {
    return platform();
  }

  arch(): string {
    return arch();
  }
}
