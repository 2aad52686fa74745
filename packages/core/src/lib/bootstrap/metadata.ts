import type { Logger } from "pino";
import { coerceTrimmedString, formatUnknown } from "@outpostctl/shared/lib/strings";
import { UNKNOWN, type ResourceSnapshot } from "../notify/types.js";

export const IMDS_BASE_URL = "http://169.254.169.254";
export const IMDS_REQUEST_TIMEOUT_MS = 2_000;
const IMDS_TOKEN_TTL_SECONDS = "21600";

export type MetadataClientOptions = {
  baseUrl?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
};

async function imdsRequest(
  opts: Required<Pick<MetadataClientOptions, "baseUrl" | "timeoutMs" | "fetchImpl">>,
  params: { method: "GET" | "PUT"; path: string; headers: Record<string, string> },
): Promise<{ ok: true; text: string } | { ok: false; error: string }> {
  const controller = new AbortController();
  const timeoutId = setTimeout(() => {
    controller.abort();
  }, opts.timeoutMs);
  try {
    const res = await opts.fetchImpl(`${opts.baseUrl}${params.path}`, {
      method: params.method,
      headers: params.headers,
      signal: controller.signal,
    });
    if (!res.ok) return { ok: false, error: `HTTP ${res.status}` };
    return { ok: true, text: (await res.text()).trim() };
  } catch (err) {
    return {
      ok: false,
      error: controller.signal.aborted ? `request timed out after ${opts.timeoutMs}ms` : formatUnknown(err, "request failed"),
    };
  } finally {
    clearTimeout(timeoutId);
  }
}

/**
 * Reads the instance description from the metadata service (session token first, token-less as a
 * fallback). Any field that cannot be read is reported as "unknown"; this never throws.
 */
export async function fetchInstanceSnapshot(options: MetadataClientOptions = {}): Promise<ResourceSnapshot> {
  const opts = {
    baseUrl: options.baseUrl ?? IMDS_BASE_URL,
    timeoutMs: options.timeoutMs ?? IMDS_REQUEST_TIMEOUT_MS,
    fetchImpl: options.fetchImpl ?? fetch,
  };

  const token = await imdsRequest(opts, {
    method: "PUT",
    path: "/latest/api/token",
    headers: { "X-aws-ec2-metadata-token-ttl-seconds": IMDS_TOKEN_TTL_SECONDS },
  });
  const headers: Record<string, string> = token.ok ? { "X-aws-ec2-metadata-token": token.text } : {};
  if (!token.ok) options.logger?.debug({ error: token.error }, "metadata token unavailable; using token-less requests");

  const read = async (path: string): Promise<string> => {
    const res = await imdsRequest(opts, { method: "GET", path: `/latest/meta-data/${path}`, headers });
    if (!res.ok) {
      options.logger?.debug({ path, error: res.error }, "metadata read failed");
      return UNKNOWN;
    }
    return coerceTrimmedString(res.text) || UNKNOWN;
  };

  const [instanceId, instanceType, publicIp, privateIp, availabilityZone] = await Promise.all([
    read("instance-id"),
    read("instance-type"),
    read("public-ipv4"),
    read("local-ipv4"),
    read("placement/availability-zone"),
  ]);
  return { instanceId, instanceType, publicIp, privateIp, availabilityZone };
}
