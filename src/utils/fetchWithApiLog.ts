import { errorMessage } from "../core/errors";
import type { ApiRequestLogInput } from "../storage/apiRequestLogStore";
import { nowIso } from "./time";

export interface ApiRequestLogSink {
  log(entry: ApiRequestLogInput): unknown;
}

export interface OutboundCall {
  provider: string;
  /** Logged instead of the URL, which may carry a token. */
  endpoint: string;
  reason: string;
  requestPayload?: unknown;
}

/**
 * `fetch` that leaves one external row in the request log per call, whether
 * the call answered, failed, or timed out. Errors are rethrown untouched.
 */
export const fetchWithApiLog = async (
  url: string,
  init: RequestInit | undefined,
  call: OutboundCall,
  sink: ApiRequestLogSink
): Promise<Response> => {
  const startedAt = nowIso();
  const startedMs = Date.now();
  const record = (outcome: Pick<ApiRequestLogInput, "status" | "statusCode" | "errorMessage">) =>
    sink.log({
      ...call,
      ...outcome,
      startedAt,
      finishedAt: nowIso(),
      durationMs: Date.now() - startedMs,
      direction: "external",
      method: init?.method ?? "GET"
    });

  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    record({ status: "error", errorMessage: errorMessage(error) });
    throw error;
  }

  record({
    status: response.ok ? "success" : "error",
    statusCode: response.status,
    errorMessage: response.ok ? undefined : `HTTP ${response.status}`
  });
  return response;
};
