// backend/services/shared/health.ts
import express from "express";

export type DependencyStatus = "ok" | "unavailable";

/** Named dependency probes, e.g. `{ redis: () => store.ping() }`. */
export type ProbeMap = Record<string, () => Promise<boolean>>;

type Options = {
  service: string;
  env?: string;
  version?: string;
  probes?: ProbeMap;
};

async function runProbes(
  probes: ProbeMap
): Promise<Record<string, DependencyStatus>> {
  const entries = await Promise.all(
    Object.entries(probes).map(async ([name, probe]) => {
      const ok = await probe().catch(() => false);
      const status: DependencyStatus = ok ? "ok" : "unavailable";
      return [name, status] as const;
    })
  );
  return Object.fromEntries(entries);
}

/**
 * Exposes:
 *   GET /health   -> status "ok" | "degraded" with one field per probe (always 200)
 *   GET /healthz  -> liveness, never touches dependencies
 *   GET /readyz   -> readiness, 503 while any probe fails
 */
export function createHealthRouter(opts: Options) {
  const router = express.Router();
  const probes = opts.probes ?? {};

  const base = {
    service: opts.service,
    env: opts.env ?? process.env.NODE_ENV,
    version: opts.version,
  };

  router.get("/health", async (_req, res) => {
    const deps = await runProbes(probes);
    const healthy = Object.values(deps).every((s) => s === "ok");
    res.json({ ...base, status: healthy ? "ok" : "degraded", ...deps });
  });

  router.get("/healthz", (_req, res) => {
    res.json({ ...base, ok: true });
  });

  router.get("/readyz", async (_req, res) => {
    const deps = await runProbes(probes);
    const ready = Object.values(deps).every((s) => s === "ok");
    res.status(ready ? 200 : 503).json({ ...base, ok: ready, ...deps });
  });

  return router;
}
