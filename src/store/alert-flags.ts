import type { AlertFlagKey } from "../model/alert-model";

function flagId(key: AlertFlagKey): string {
  return JSON.stringify([key.subscriberId, key.sensorId, key.boundKey]);
}

/**
 * "Currently alerting" flags per (subscriber, sensor, bound). A missing entry
 * reads as false.
 */
export class AlertFlagTable {
  private readonly lastCond = new Map<string, boolean>();

  get(key: AlertFlagKey): boolean {
    return this.lastCond.get(flagId(key)) ?? false;
  }

  set(key: AlertFlagKey, alerting: boolean): void {
    this.lastCond.set(flagId(key), alerting);
  }

  delete(key: AlertFlagKey): boolean {
    return this.lastCond.delete(flagId(key));
  }

  activeCount(): number {
    let n = 0;
    for (const v of this.lastCond.values()) if (v) n++;
    return n;
  }
}
