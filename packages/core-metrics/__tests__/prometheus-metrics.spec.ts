import { describe, expect, it } from "vitest";
import { Registry } from "prom-client";
import { NoopMetricsService, PrometheusMetricsService } from "../src";

describe("PrometheusMetricsService", () => {
  it("counts increments per label set", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);
    metrics.increment("ladder_draws_total", { players: "4" });
    metrics.increment("ladder_draws_total", { players: "4" });
    metrics.increment("ladder_draws_total", { players: "6" });

    const [draws] = await registry.getMetricsAsJSON();
    expect(draws.name).toBe("ladder_draws_total");
    const byPlayers = new Map(draws.values.map((v) => [v.labels.players, v.value] as const));
    expect(byPlayers.get("4")).toBe(2);
    expect(byPlayers.get("6")).toBe(1);
  });

  it("observes histogram samples", async () => {
    const registry = new Registry();
    const metrics = new PrometheusMetricsService(registry);
    metrics.observe("ladder_rungs", 3, { players: "4" });
    metrics.observe("ladder_rungs", 7, { players: "4" });

    const text = await registry.metrics();
    expect(text).toContain("# TYPE ladder_rungs histogram");
    expect(text).toMatch(/ladder_rungs_sum\{[^}]*players="4"[^}]*\} 10/);
    expect(text).toMatch(/ladder_rungs_count\{[^}]*players="4"[^}]*\} 2/);
  });
});

describe("NoopMetricsService", () => {
  it("accepts calls without recording", () => {
    const metrics = new NoopMetricsService();
    expect(() => {
      metrics.increment();
      metrics.observe();
    }).not.toThrow();
  });
});
