import fs from 'node:fs';
import os from 'node:os';

export interface LanAddress {
  address: string;
  iface: string;
}

export interface DiskStats {
  mountPath: string;
  totalBytes: number;
  usedBytes: number;
  freeBytes: number;
  usagePercent: number;
}

export interface SystemInfo {
  timestamp: string;
  hostname: string;
  platform: string;
  release: string;
  architecture: string;
  cpu: {
    model: string;
    coreCount: number;
    loadAverage: number[];
  };
  memory: {
    totalBytes: number;
    usedBytes: number;
    freeBytes: number;
    usagePercent: number;
  };
  uptimeSec: number;
  disk: DiskStats | null;
  network: LanAddress | null;
}

const PREFERRED_INTERFACE_PREFIXES = ['wlp', 'ens', 'enp', 'eth', 'wlan', 'em'];

export function getLanAddress(): LanAddress | null {
  const nets = os.networkInterfaces();
  const candidates: LanAddress[] = [];
  for (const [iface, infos] of Object.entries(nets)) {
    if (!infos) {
      continue;
    }
    for (const info of infos) {
      if (info.family === 'IPv4' && !info.internal) {
        candidates.push({ address: info.address, iface });
      }
    }
  }

  for (const prefix of PREFERRED_INTERFACE_PREFIXES) {
    const preferred = candidates.find((candidate) => candidate.iface.startsWith(prefix));
    if (preferred) {
      return preferred;
    }
  }
  return candidates[0] ?? null;
}

function collectMemoryStats(): SystemInfo['memory'] {
  const totalBytes = os.totalmem();
  const freeBytes = os.freemem();
  const usedBytes = Math.max(0, totalBytes - freeBytes);
  const usagePercent = totalBytes > 0 ? (usedBytes / totalBytes) * 100 : 0;
  return {
    totalBytes,
    usedBytes,
    freeBytes,
    usagePercent: Number(usagePercent.toFixed(2))
  };
}

export async function collectDiskStats(baseDir: string): Promise<DiskStats | null> {
  try {
    const stats = await fs.promises.statfs(baseDir);
    const totalBytes = Number(stats.bsize) * Number(stats.blocks);
    const freeBytes = Number(stats.bsize) * Number(stats.bavail);
    if (!Number.isFinite(totalBytes) || !Number.isFinite(freeBytes) || totalBytes <= 0) {
      return null;
    }
    const usedBytes = Math.max(0, totalBytes - freeBytes);
    return {
      mountPath: baseDir,
      totalBytes: Math.round(totalBytes),
      usedBytes: Math.round(usedBytes),
      freeBytes: Math.round(freeBytes),
      usagePercent: Number(((usedBytes / totalBytes) * 100).toFixed(2))
    };
  } catch (error) {
    const text = error instanceof Error ? error.message : String(error);
    console.log(`[lanshare] system: disk stats unavailable for ${baseDir} (${text})`);
    return null;
  }
}

export async function collectSystemInfo(servedRoot: string): Promise<SystemInfo> {
  const cpus = os.cpus();
  return {
    timestamp: new Date().toISOString(),
    hostname: os.hostname(),
    platform: os.platform(),
    release: os.release(),
    architecture: os.arch(),
    cpu: {
      model: cpus[0]?.model ?? 'unknown',
      coreCount: cpus.length,
      loadAverage: os.loadavg().map((value) => Number(value.toFixed(3)))
    },
    memory: collectMemoryStats(),
    uptimeSec: Math.floor(os.uptime()),
    disk: await collectDiskStats(servedRoot),
    network: getLanAddress()
  };
}
