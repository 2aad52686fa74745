import https from "node:https";

export const ENDPOINT_PROBE_TIMEOUT_MS = 10_000;

/** Resolves true when the endpoint answers with any HTTP status. */
export type EndpointProbe = (url: string) => Promise<boolean>;

/** Cockpit serves a self-signed certificate on first boot, so the chain is not verified. */
export function createHttpsProbe(opts: { timeoutMs?: number } = {}): EndpointProbe {
  const timeoutMs = opts.timeoutMs ?? ENDPOINT_PROBE_TIMEOUT_MS;
  return async (url) =>
    await new Promise<boolean>((resolve) => {
      const req = https.request(url, { method: "GET", rejectUnauthorized: false, timeout: timeoutMs }, (res) => {
        res.resume();
        resolve(true);
      });
      req.on("timeout", () => {
        req.destroy(new Error(`request timed out after ${timeoutMs}ms`));
      });
      req.on("error", () => {
        resolve(false);
      });
      req.end();
    });
}
