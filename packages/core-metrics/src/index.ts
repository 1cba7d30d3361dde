import { Global, Module } from "@nestjs/common";
import { Counter, Histogram, Registry, register } from "prom-client";

export interface IMetrics {
  increment(name: string, labels?: Record<string, string>): void;
  observe(name: string, value: number, labels?: Record<string, string>): void;
}

export const METRICS = Symbol("METRICS");

const DEFAULT_BUCKETS = [0, 1, 2, 5, 10, 25, 50, 100, 250, 500];

export class PrometheusMetricsService implements IMetrics {
  private counters = new Map<string, Counter<string>>();
  private histograms = new Map<string, Histogram<string>>();

  constructor(private readonly registry: Registry = register, service = "ladder-lottery") {
    this.registry.setDefaultLabels({ service });
  }

  increment(name: string, labels: Record<string, string> = {}): void {
    const counter = this.getOrCreateCounter(name, Object.keys(labels));
    counter.inc(labels, 1);
  }

  observe(name: string, value: number, labels: Record<string, string> = {}): void {
    const histogram = this.getOrCreateHistogram(name, Object.keys(labels));
    histogram.observe(labels, value);
  }

  private getOrCreateCounter(name: string, labelNames: string[]): Counter<string> {
    const existing = this.counters.get(name);
    if (existing) {
      return existing;
    }
    const counter = new Counter({
      name,
      help: `${name}_counter`,
      labelNames,
      registers: [this.registry],
    });
    this.counters.set(name, counter);
    return counter;
  }

  private getOrCreateHistogram(name: string, labelNames: string[]): Histogram<string> {
    const existing = this.histograms.get(name);
    if (existing) {
      return existing;
    }
    const histogram = new Histogram({
      name,
      help: `${name}_histogram`,
      labelNames,
      buckets: DEFAULT_BUCKETS,
      registers: [this.registry],
    });
    this.histograms.set(name, histogram);
    return histogram;
  }
}

export class NoopMetricsService implements IMetrics {
  increment(): void {}
  observe(): void {}
}

@Global()
@Module({
  providers: [
    {
      provide: METRICS,
      useFactory: () => {
        if (process.env.METRICS_DISABLED === "true") {
          return new NoopMetricsService();
        }
        return new PrometheusMetricsService();
      },
    },
  ],
  exports: [METRICS],
})
export class MetricsModule {}
