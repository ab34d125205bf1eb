export type FetchErrorKind = "transport" | "decode";

export class FetchError extends Error {
  override name = "FetchError";

  constructor(
    readonly kind: FetchErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class DeliveryError extends Error {
  override name = "DeliveryError";

  constructor(
    readonly subscriberId: string,
    message: string,
    readonly status?: number,
  ) {
    super(message);
  }
}

export class ConfigError extends Error {
  override name = "ConfigError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    return err.cause instanceof Error
      ? `${err.message} (${err.cause.message})`
      : err.message;
  }
  return String(err);
}
