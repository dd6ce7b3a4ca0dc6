/**
 * Unit tests for host detection.
 */

import { getSystemInfo, isRaspberryPi } from "../../../src/system/info";

describe("isRaspberryPi", () => {
  it("detects the device-tree model", () => {
    const files: Record<string, string> = { "/proc/device-tree/model": "Raspberry Pi 4 Model B Rev 1.4\0" };
    expect(isRaspberryPi((p) => files[p] ?? "")).toBe(true);
  });

  it("falls back to cpuinfo when the model file is unreadable", () => {
    const read = (p: string): string => {
      if (p === "/proc/cpuinfo") return "Hardware\t: BCM2835\nModel\t\t: Raspberry Pi 3 Model B Plus";
      throw new Error("ENOENT");
    };
    expect(isRaspberryPi(read)).toBe(true);
  });

  it("returns false elsewhere", () => {
    expect(isRaspberryPi(() => "model name\t: Intel(R) Xeon(R) CPU")).toBe(false);
    expect(
      isRaspberryPi(() => {
        throw new Error("ENOENT");
      })
    ).toBe(false);
  });
});

describe("getSystemInfo", () => {
  it("reports the running process", () => {
    const info = getSystemInfo();
    expect(info.nodeVersion).toBe(process.version);
    expect(info.cpuCount).toBeGreaterThan(0);
  });
});
