import { Counter, Histogram, register } from "prom-client";

export const CONFIG_RELOADS_NAME = "reelbridge_config_reloads_total";
export const CONFIG_RELOAD_SECONDS_NAME = "reelbridge_config_reload_seconds";

export type ReloadOutcome = "published" | "rejected" | "failed";

function getOrCreateReloadCounter(): Counter<string> {
  const existing = register.getSingleMetric(CONFIG_RELOADS_NAME);
  if (existing instanceof Counter) {
    return existing;
  }
  return new Counter({
    name: CONFIG_RELOADS_NAME,
    help: "Configuration reloads by outcome",
    labelNames: ["outcome"],
  });
}

function getOrCreateReloadHistogram(): Histogram<string> {
  const existing = register.getSingleMetric(CONFIG_RELOAD_SECONDS_NAME);
  if (existing instanceof Histogram) {
    return existing;
  }
  return new Histogram({
    name: CONFIG_RELOAD_SECONDS_NAME,
    help: "Duration of configuration reloads in seconds",
    labelNames: ["outcome"],
    buckets: [0.005, 0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  });
}

const reloadCounter = getOrCreateReloadCounter();
const reloadHistogram = getOrCreateReloadHistogram();

export const configReloadCounter = reloadCounter;
export const configReloadHistogram = reloadHistogram;

export function recordReload(outcome: ReloadOutcome, durationSeconds: number): void {
  reloadCounter.labels(outcome).inc();
  reloadHistogram.labels(outcome).observe(Math.max(0, durationSeconds));
}

export function resetMetrics(): void {
  reloadCounter.reset();
  reloadHistogram.reset();
}
