import type {
  AlertDetail,
  AlertFlagKey,
  Bound,
  TickResult,
} from "../model/alert-model";
import { describeError } from "../model/errors";
import type { NotificationSink } from "../model/notify-model";
import type { FetchReadings, Reading } from "../model/sensor-model";
import type { AlertFlagTable } from "../store/alert-flags";
import { boundKey, type ThresholdStore } from "../store/threshold-store";
import { formatAlert, type DisplayOptions } from "./format-message";
import type { Logger } from "./logger";

export type AlertDeps = {
  fetchReadings: FetchReadings;
  thresholds: ThresholdStore;
  flags: AlertFlagTable;
  sink: NotificationSink;
  display: DisplayOptions;
  log: Logger;
};

const BOUNDS: readonly Bound[] = ["min", "max"];

export function isViolation(
  bound: Bound,
  value: number,
  limit: number,
): boolean {
  return bound === "min" ? value < limit : value > limit;
}

type PendingAlert = {
  key: AlertFlagKey;
  reading: Reading;
  limit: number;
  text: string;
};

/**
 * One evaluation pass: fetch, compare every reading against every
 * subscriber's bounds and notify on the transition into violation.
 *
 * A bound that is back within limits re-arms (flag = false); the threshold
 * itself stays configured.
 */
export async function runAlertsOnce(deps: AlertDeps): Promise<TickResult> {
  const { log } = deps;

  const fetched = await deps.fetchReadings();
  if (!fetched.ok) {
    log.warn(
      `[alerts] sensor fetch failed (${fetched.error.kind}): ${describeError(fetched.error)}`,
    );
    return {
      ok: false,
      readings: 0,
      sent: 0,
      failed: 0,
      details: [],
      note: `fetch failed (${fetched.error.kind})`,
    };
  }

  const readings = fetched.readings;
  const subscribers = deps.thresholds.iterate();
  const pending: PendingAlert[] = [];

  // no await between here and the sends: flag updates of this pass are atomic
  for (const reading of readings) {
    try {
      for (const [subscriberId, thresholds] of subscribers) {
        const bounds = thresholds.get(reading.sensorId);
        if (!bounds) continue;

        for (const bound of BOUNDS) {
          const key = boundKey(reading.metric, bound);
          const limit = bounds.get(key);
          if (limit === undefined) continue;

          const flagKey: AlertFlagKey = {
            subscriberId,
            sensorId: reading.sensorId,
            boundKey: key,
          };

          if (!isViolation(bound, reading.value, limit)) {
            deps.flags.set(flagKey, false);
            continue;
          }

          if (deps.flags.get(flagKey)) continue;

          deps.flags.set(flagKey, true);
          pending.push({
            key: flagKey,
            reading,
            limit,
            text: formatAlert(reading, bound, limit, deps.display),
          });
        }
      }
    } catch (err) {
      log.error(
        `[alerts] ${reading.sensorId}/${reading.metric} failed: ${describeError(err)}`,
      );
    }
  }

  const details = await Promise.all(
    pending.map((p) => deliver(deps, p)),
  );
  const sent = details.filter((d) => d.delivered).length;
  const failed = details.length - sent;

  log.info(
    `[alerts] tick done: ${readings.length} readings, ${subscribers.length} subscribers, ${sent} sent, ${failed} failed`,
  );

  return { ok: true, readings: readings.length, sent, failed, details };
}

async function deliver(
  deps: AlertDeps,
  alert: PendingAlert,
): Promise<AlertDetail> {
  const detail: AlertDetail = {
    subscriberId: alert.key.subscriberId,
    sensorId: alert.key.sensorId,
    boundKey: alert.key.boundKey,
    value: alert.reading.value,
    limit: alert.limit,
    delivered: false,
  };

  try {
    await deps.sink.send(alert.key.subscriberId, alert.text);
    detail.delivered = true;
    deps.log.info(
      `[alerts] notified ${alert.key.subscriberId}: ${alert.key.sensorId} ${alert.key.boundKey} value=${alert.reading.value} limit=${alert.limit}`,
    );
  } catch (err) {
    detail.note = describeError(err);
    deps.log.error(
      `[alerts] delivery to ${alert.key.subscriberId} failed: ${detail.note}`,
    );
  }

  return detail;
}

export type AlertLoop = {
  stop(): Promise<void>;
};

/**
 * Runs a pass immediately, then one every `intervalMs` after the previous pass
 * finished. Passes never overlap.
 */
export function startAlertLoop(deps: AlertDeps, intervalMs: number): AlertLoop {
  let timer: NodeJS.Timeout | undefined;
  let stopped = false;
  let current: Promise<void> = Promise.resolve();

  const tick = () => {
    timer = undefined;
    current = runAlertsOnce(deps)
      .then(
        () => undefined,
        (err: unknown) => {
          deps.log.error(`[loop] tick failed: ${describeError(err)}`);
        },
      )
      .finally(() => {
        if (!stopped) timer = setTimeout(tick, intervalMs);
      });
  };

  deps.log.info(`[loop] started, interval ${Math.round(intervalMs / 1000)}s`);
  tick();

  return {
    async stop() {
      stopped = true;
      if (timer) clearTimeout(timer);
      await current;
      deps.log.info("[loop] stopped");
    },
  };
}
