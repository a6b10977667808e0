import { randomUUID } from "node:crypto";
import type { DeviceIdentity } from "@paybridge/types";

export class DeviceIdentityProvider {
  private current: Readonly<DeviceIdentity> | null = null;

  /** @param deviceId a device UUID already registered with the backend */
  constructor(private readonly deviceId?: string) {}

  identity(): Readonly<DeviceIdentity> {
    if (!this.current) {
      this.current = Object.freeze({
        deviceId: this.deviceId ?? randomUUID(),
        clientId: randomUUID(),
        installId: randomUUID()
      });
    }
    return this.current;
  }
}
