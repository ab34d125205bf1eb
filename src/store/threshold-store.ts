import type {
  Bound,
  BoundKey,
  SubscriberThresholds,
  ThresholdKey,
} from "../model/alert-model";

export function boundKey(metric: string, bound: Bound): BoundKey {
  return `${metric}_${bound}`;
}

export function splitBoundKey(
  key: BoundKey,
): { metric: string; bound: Bound } {
  const bound: Bound = key.endsWith("_min") ? "min" : "max";
  return { metric: key.slice(0, -"_min".length), bound };
}

/**
 * Per-subscriber threshold bounds, kept in memory for the life of the process.
 * Every method runs synchronously, so readers never observe a half-applied write.
 */
export class ThresholdStore {
  private readonly bySubscriber = new Map<
    string,
    Map<string, Map<BoundKey, number>>
  >();

  set(subscriberId: string, key: ThresholdKey, value: number): void {
    let sensors = this.bySubscriber.get(subscriberId);
    if (!sensors) {
      sensors = new Map();
      this.bySubscriber.set(subscriberId, sensors);
    }

    let bounds = sensors.get(key.sensorId);
    if (!bounds) {
      bounds = new Map();
      sensors.set(key.sensorId, bounds);
    }

    bounds.set(key.boundKey, value);
  }

  get(subscriberId: string, key: ThresholdKey): number | undefined {
    return this.bySubscriber
      .get(subscriberId)
      ?.get(key.sensorId)
      ?.get(key.boundKey);
  }

  getAll(subscriberId: string): SubscriberThresholds {
    return copySensors(this.bySubscriber.get(subscriberId));
  }

  iterate(): Array<[string, SubscriberThresholds]> {
    return [...this.bySubscriber].map(
      ([id, sensors]): [string, SubscriberThresholds] => [
        id,
        copySensors(sensors),
      ],
    );
  }

  clear(subscriberId: string, key: ThresholdKey): boolean {
    const sensors = this.bySubscriber.get(subscriberId);
    const bounds = sensors?.get(key.sensorId);
    if (!sensors || !bounds?.delete(key.boundKey)) return false;

    if (bounds.size === 0) sensors.delete(key.sensorId);
    if (sensors.size === 0) this.bySubscriber.delete(subscriberId);
    return true;
  }

  subscriberCount(): number {
    return this.bySubscriber.size;
  }
}

function copySensors(
  sensors: Map<string, Map<BoundKey, number>> | undefined,
): SubscriberThresholds {
  const out = new Map<string, ReadonlyMap<BoundKey, number>>();
  for (const [sensorId, bounds] of sensors ?? []) {
    out.set(sensorId, new Map(bounds));
  }
  return out;
}
