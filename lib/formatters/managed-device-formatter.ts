/**
 * Managed Device Formatter
 *
 * Renders managed-device listings for the terminal: pretty JSON, a fixed-width
 * table, a compact one-line-per-device form, or a count.
 */

import type { ManagedDevice, ManagedDevicesPage } from "../infrastructure/cvcue/types/api-responses";

export type ListOutputFormat = "json" | "table" | "compact";
export type FetchAllOutputFormat = "json" | "count";

const RULE = "-".repeat(80);
const MISSING = "N/A";

export function formatJson(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

/**
 * Fixed-width table of name, model, MAC address and active flag.
 * The total line is only added when the page was requested with a total count.
 */
export function formatDeviceTable(page: ManagedDevicesPage, includeTotal = false): string {
  const devices = page.managedDevices ?? [];
  if (devices.length === 0) {
    return "No devices found";
  }

  const lines = [
    "",
    `Found ${devices.length} devices:`,
    RULE,
    `${"Name".padEnd(30)} ${"Model".padEnd(15)} ${"MAC Address".padEnd(20)} Active`,
    RULE,
    ...devices.map(formatTableRow),
  ];

  if (includeTotal) {
    lines.push(RULE, `Total: ${page.totalCount ?? MISSING}`);
  }

  return lines.join("\n");
}

export function formatDeviceCompact(devices: readonly ManagedDevice[]): string {
  return devices.map((device) => `${text(device.name)} - ${text(device.macaddress)}`).join("\n");
}

export function formatDeviceCount(devices: readonly ManagedDevice[]): string {
  return `Total devices: ${devices.length}`;
}

export function formatDevicePage(page: ManagedDevicesPage, format: ListOutputFormat, includeTotal = false): string {
  switch (format) {
    case "table":
      return formatDeviceTable(page, includeTotal);
    case "compact":
      return formatDeviceCompact(page.managedDevices ?? []);
    case "json":
    default:
      return formatJson(page);
  }
}

export function formatDeviceList(devices: readonly ManagedDevice[], format: FetchAllOutputFormat): string {
  return format === "count" ? formatDeviceCount(devices) : formatJson(devices);
}

function formatTableRow(device: ManagedDevice): string {
  const name = text(device.name).slice(0, 29);
  const model = text(device.model).slice(0, 14);
  const mac = text(device.macaddress);
  const active = device.active ? "✓" : "✗";
  return `${name.padEnd(30)} ${model.padEnd(15)} ${mac.padEnd(20)} ${active}`;
}

function text(value: string | undefined): string {
  return value ?? MISSING;
}
