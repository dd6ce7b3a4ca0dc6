/**
 * Host facts logged at startup.
 */

import * as fs from "fs";
import * as os from "os";

export interface SystemInfo {
  platform: string;
  arch: string;
  release: string;
  cpuCount: number;
  totalMemoryMb: number;
  freeMemoryMb: number;
  nodeVersion: string;
  raspberryPi: boolean;
}

const toMb = (bytes: number): number => Math.round(bytes / (1024 * 1024));

/** True when /proc/cpuinfo (or the device-tree model) names a Raspberry Pi. */
export function isRaspberryPi(readFile: (path: string) => string = (p) => fs.readFileSync(p, "utf8")): boolean {
  for (const path of ["/proc/device-tree/model", "/proc/cpuinfo"]) {
    try {
      if (/raspberry pi/i.test(readFile(path))) return true;
    } catch {
      // Not on Linux, or the file is not readable.
    }
  }
  return false;
}

export function getSystemInfo(): SystemInfo {
  return {
    platform: os.platform(),
    arch: os.arch(),
    release: os.release(),
    cpuCount: os.cpus().length,
    totalMemoryMb: toMb(os.totalmem()),
    freeMemoryMb: toMb(os.freemem()),
    nodeVersion: process.version,
    raspberryPi: os.platform() === "linux" && isRaspberryPi(),
  };
}
