import type { ManagedDevice } from "../../lib/infrastructure/cvcue/types/api-responses";
import type { CvCueClientOptions } from "../../lib/infrastructure/cvcue/client/cvcue-client";

export const BASE_URL = "https://cvcue.test/wifi/api";

export const sampleDevices: ManagedDevice[] = [
  {
    boxid: 123,
    name: "AP-Test-01",
    macaddress: "AA:BB:CC:DD:EE:FF",
    model: "AP-555",
    active: true,
    ipaddress: "192.168.1.100",
  },
  {
    boxid: 124,
    name: "AP-Test-02",
    macaddress: "11:22:33:44:55:66",
    model: "AP-635",
    active: false,
    ipaddress: "192.168.1.101",
  },
];

/**
 * Devices with sequential box ids, starting at `from`
 */
export function makeDevices(count: number, from = 0): ManagedDevice[] {
  return Array.from({ length: count }, (_, i) => ({
    boxid: from + i,
    name: `AP-${from + i}`,
    macaddress: `00:00:00:00:00:${(from + i).toString(16).padStart(2, "0")}`,
  }));
}

export const silentLogger = { info: () => {}, warn: () => {}, error: () => {} };

export function clientOptions(sessionFile: string, overrides: CvCueClientOptions = {}): CvCueClientOptions {
  return {
    keyId: "test-key-id",
    keyValue: "test-key-value",
    clientId: "test-client",
    baseUrl: BASE_URL,
    sessionFile,
    env: {},
    logger: silentLogger,
    ...overrides,
  };
}
