import os from "node:os";

/**
 * Source of host resource readings for the system sampler.
 */
export interface ResourceProbe {
  /** Host CPU utilization since the previous call, 0 - 100 */
  cpuPercent(): number;
  /** Host memory in use, in MB */
  memoryUsedMb(): number;
}

interface CpuTimes {
  idle: number;
  total: number;
}

function readCpuTimes(): CpuTimes {
  let idle = 0;
  let total = 0;
  for (const cpu of os.cpus()) {
    const { user, nice, sys, irq } = cpu.times;
    idle += cpu.times.idle;
    total += user + nice + sys + irq + cpu.times.idle;
  }
  return { idle, total };
}

/**
 * Probe over `node:os`. CPU usage is the busy share of all cores between
 * consecutive readings; the first reading covers the time since creation.
 */
export function createHostProbe(): ResourceProbe {
  let previous = readCpuTimes();

  return {
    cpuPercent() {
      const current = readCpuTimes();
      const total = current.total - previous.total;
      const idle = current.idle - previous.idle;
      previous = current;
      return total > 0 ? ((total - idle) / total) * 100 : 0;
    },
    memoryUsedMb() {
      return (os.totalmem() - os.freemem()) / 1024 / 1024;
    },
  };
}
