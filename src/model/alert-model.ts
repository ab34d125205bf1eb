export type Bound = "min" | "max";

export type BoundKey = `${string}_${Bound}`;

export type ThresholdKey = {
  sensorId: string;
  boundKey: BoundKey;
};

export type AlertFlagKey = ThresholdKey & {
  subscriberId: string;
};

// sensorId -> boundKey -> limit
export type SubscriberThresholds = ReadonlyMap<
  string,
  ReadonlyMap<BoundKey, number>
>;

export type AlertDetail = {
  subscriberId: string;
  sensorId: string;
  boundKey: BoundKey;
  value: number;
  limit: number;
  delivered: boolean;
  note?: string;
};

export type TickResult = {
  ok: boolean;
  readings: number;
  sent: number;
  failed: number;
  details: AlertDetail[];
  note?: string;
};
