// pattern: Functional Core
// USB device presence, checked on the target with lsusb

import { checkResult } from "../classify.js";

import type { RemoteShell } from "../../ssh/types.js";
import type { CheckResult, Probe } from "../types.js";

export function usbLookupCommand(vendorId: string, productId: string): string {
  return `lsusb -d ${vendorId}:${productId}`;
}

export const USB_LIST_COMMAND = "lsusb";

// Verbose runs list everything on the bus, not only the expected devices
async function listAllUsbDevices(shell: RemoteShell): Promise<CheckResult> {
  const result = await shell.executeOne(USB_LIST_COMMAND);
  const lines = result.stdout
    .split("\n")
    .map(line => line.trim())
    .filter(line => line !== "");

  if (result.exitCode !== 0) {
    return checkResult("USB: All devices", "warn", "Could not list USB devices", {
      detail: result.stderr.trim() || `lsusb exited with code ${result.exitCode}`,
    });
  }
  if (lines.length === 0) {
    return checkResult("USB: All devices", "ok", "No USB devices found");
  }
  return checkResult(
    "USB: All devices",
    "ok",
    `${lines.length} USB device${lines.length === 1 ? "" : "s"} detected`,
    { detail: lines.join("\n") }
  );
}

export const usbDevicesProbe: Probe = {
  name: "USB Devices",
  category: "devices",
  async run({ shell, host, verbose }) {
    const results: CheckResult[] = [];

    if (verbose) {
      results.push(await listAllUsbDevices(shell));
    }

    for (const device of host.devices) {
      const checkName = `Device: ${device.name}`;
      const result = await shell.executeOne(
        usbLookupCommand(device.vendorId, device.productId)
      );
      const line = result.stdout.trim().split("\n")[0]?.trim() ?? "";

      if (result.exitCode === 0 && line) {
        results.push(
          checkResult(checkName, "ok", `${device.name} connected`, { detail: line })
        );
      } else {
        results.push(
          checkResult(checkName, "fail", `${device.name} missing`, {
            detail: `expected ${device.vendorId}:${device.productId}`,
          })
        );
      }
    }

    return results;
  },
};

export const DEVICE_PROBES: readonly Probe[] = [usbDevicesProbe];
