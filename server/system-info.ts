import os from "node:os";

export type SystemInfo = {
  platform: string;
  release: string;
  nodeVersion: string;
  pid: number;
  uptimeSeconds: number;
  loadAverage: number[];
  memoryTotalBytes: number;
  memoryFreeBytes: number;
  rssBytes: number;
};

export function readSystemInfo(): SystemInfo {
  return {
    platform: os.platform(),
    release: os.release(),
    nodeVersion: process.version,
    pid: process.pid,
    uptimeSeconds: process.uptime(),
    loadAverage: os.loadavg(),
    memoryTotalBytes: os.totalmem(),
    memoryFreeBytes: os.freemem(),
    rssBytes: process.memoryUsage().rss,
  };
}
