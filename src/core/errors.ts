export type DataFetchFailure = "timeout" | "network" | "auth" | "http_status" | "invalid_payload";

/** Snapshot retrieval failed; the current cycle is skipped. */
export class DataFetchError extends Error {
  override readonly name = "DataFetchError";
  readonly statusCode: number | undefined;

  constructor(
    message: string,
    readonly failure: DataFetchFailure,
    options?: { cause?: unknown; statusCode?: number }
  ) {
    super(message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
  }
}

/** Notification channel rejected or never received a message. Never fatal. */
export class NotificationDeliveryError extends Error {
  override readonly name = "NotificationDeliveryError";
  readonly statusCode: number | undefined;

  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super(message, { cause: options?.cause });
    this.statusCode = options?.statusCode;
  }
}

/** Invalid settings detected at startup, before the first cycle runs. */
export class ConfigurationError extends Error {
  override readonly name = "ConfigurationError";

  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
  }
}

export class RiskAnnotationError extends Error {
  override readonly name = "RiskAnnotationError";
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
