/**
 * Metrics Collector
 *
 * Collects and exposes Prometheus-compatible metrics via GET /api/monitor/v1/metrics.
 * Tracks: registry request outcomes, monitor cycles by status, new publications,
 * notification deliveries and a cycle duration histogram.
 *
 * Uses simple in-memory counters.
 */

interface MetricCounters {
  [key: string]: number;
}

const COUNTER_HELP: Record<string, string> = {
  registry_requests_total: "Registry HTTP attempts by outcome",
  monitor_cycles_total: "Monitor cycles by final status",
  publications_ingested_total: "New publications persisted",
  notifications_total: "Notification deliveries by channel and status",
};

class MetricsCollector {
  private counters: MetricCounters = {};
  private durations: number[] = [];
  private maxDurationSamples = 1000;

  /** Increment a counter metric */
  increment(name: string, labels: Record<string, string> = {}, by: number = 1): void {
    const key = this.buildKey(name, labels);
    this.counters[key] = (this.counters[key] || 0) + by;
  }

  /** Current value of a counter (0 if never incremented) */
  get(name: string, labels: Record<string, string> = {}): number {
    return this.counters[this.buildKey(name, labels)] || 0;
  }

  /** Record a monitor cycle duration for histogram */
  recordDuration(durationSeconds: number): void {
    this.durations.push(durationSeconds);
    // Keep only the last N samples to bound memory
    if (this.durations.length > this.maxDurationSamples) {
      this.durations = this.durations.slice(-this.maxDurationSamples);
    }
  }

  /**
   * Format all metrics as Prometheus text exposition format.
   * This string is returned by the /metrics endpoint.
   */
  format(): string {
    const lines: string[] = [];

    for (const [name, help] of Object.entries(COUNTER_HELP)) {
      lines.push(`# HELP ${name} ${help}`);
      lines.push(`# TYPE ${name} counter`);
      for (const [key, value] of Object.entries(this.counters)) {
        if (key === name || key.startsWith(`${name}{`)) {
          lines.push(`${key} ${value}`);
        }
      }
      lines.push("");
    }

    // Duration histogram buckets
    lines.push("# HELP monitor_cycle_duration_seconds Monitor cycle duration");
    lines.push("# TYPE monitor_cycle_duration_seconds histogram");
    const buckets = [1, 5, 15, 60, 300];
    for (const le of buckets) {
      const count = this.durations.filter((d) => d <= le).length;
      lines.push(`monitor_cycle_duration_seconds_bucket{le="${le}"} ${count}`);
    }
    lines.push(`monitor_cycle_duration_seconds_bucket{le="+Inf"} ${this.durations.length}`);
    lines.push(`monitor_cycle_duration_seconds_count ${this.durations.length}`);
    const sum = this.durations.reduce((a, b) => a + b, 0);
    lines.push(`monitor_cycle_duration_seconds_sum ${sum.toFixed(2)}`);

    return lines.join("\n");
  }

  reset(): void {
    this.counters = {};
    this.durations = [];
  }

  private buildKey(name: string, labels: Record<string, string>): string {
    if (Object.keys(labels).length === 0) return name;
    const labelStr = Object.entries(labels)
      .map(([k, v]) => `${k}="${v}"`)
      .join(",");
    return `${name}{${labelStr}}`;
  }
}

/** Singleton metrics collector instance */
export const metrics = new MetricsCollector();
