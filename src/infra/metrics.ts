import type { FulfillmentEvent, ReconciliationSummary } from "../domain/types.js";

type LabelSet = Record<string, string>;

function escapeLabelValue(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\n/g, "\\n").replace(/"/g, '\\"');
}

function buildLabelKey(labelNames: string[], labels: LabelSet): string {
  return labelNames.map((name) => `${name}=${labels[name] ?? ""}`).join("|");
}

function parseLabelKey(labelNames: string[], key: string): LabelSet {
  const parts = key.split("|");
  const labels: LabelSet = {};
  for (const [index, name] of labelNames.entries()) {
    const value = parts[index];
    labels[name] = value ? value.slice(name.length + 1) : "";
  }
  return labels;
}

function formatLabels(labels: LabelSet): string {
  const entries = Object.entries(labels);
  if (entries.length === 0) {
    return "";
  }
  const inner = entries.map(([name, value]) => `${name}="${escapeLabelValue(value)}"`).join(",");
  return `{${inner}}`;
}

class CounterMetric {
  private readonly values = new Map<string, number>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
  ) {}

  inc(labels: LabelSet, value = 1): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current = this.values.get(key) ?? 0;
    this.values.set(key, current + value);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} counter`];
    for (const [key, value] of this.values.entries()) {
      const labels = parseLabelKey(this.labelNames, key);
      lines.push(`${this.name}${formatLabels(labels)} ${value}`);
    }
    return lines;
  }
}

class HistogramMetric {
  private readonly values = new Map<string, { count: number; sum: number; buckets: number[] }>();

  constructor(
    private readonly name: string,
    private readonly help: string,
    private readonly labelNames: string[],
    private readonly buckets: number[],
  ) {}

  observe(labels: LabelSet, value: number): void {
    const key = buildLabelKey(this.labelNames, labels);
    const current =
      this.values.get(key) ?? {
        count: 0,
        sum: 0,
        buckets: this.buckets.map(() => 0),
      };
    current.count += 1;
    current.sum += value;
    for (const [index, bucket] of this.buckets.entries()) {
      if (value <= bucket) {
        current.buckets[index] = (current.buckets[index] ?? 0) + 1;
      }
    }
    this.values.set(key, current);
  }

  render(): string[] {
    const lines = [`# HELP ${this.name} ${this.help}`, `# TYPE ${this.name} histogram`];
    for (const [key, stats] of this.values.entries()) {
      const baseLabels = parseLabelKey(this.labelNames, key);
      for (const [index, bucket] of this.buckets.entries()) {
        lines.push(
          `${this.name}_bucket${formatLabels({ ...baseLabels, le: String(bucket) })} ${stats.buckets[index] ?? 0}`,
        );
      }
      lines.push(`${this.name}_bucket${formatLabels({ ...baseLabels, le: "+Inf" })} ${stats.count}`);
      lines.push(`${this.name}_sum${formatLabels(baseLabels)} ${stats.sum}`);
      lines.push(`${this.name}_count${formatLabels(baseLabels)} ${stats.count}`);
    }
    return lines;
  }
}

export type CompletionOutcome = "completed" | "not_pending";

const RECONCILIATION_TRANSITIONS = [
  "synced",
  "marked_missing",
  "still_missing",
  "cleared",
  "deleted",
  "delete_skipped",
  "unknown",
  "failed",
] as const satisfies readonly (keyof ReconciliationSummary)[];

export class FulfillmentMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "fl_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "fl_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly rateLimitRejections = new CounterMetric(
    "fl_http_rate_limited_total",
    "Total number of HTTP requests rejected by rate limiting.",
    ["scope"],
  );
  private readonly completions = new CounterMetric(
    "fl_ledger_completions_total",
    "Completion attempts against the pending ledger by outcome.",
    ["source", "outcome"],
  );
  private readonly fulfillmentRuns = new CounterMetric(
    "fl_fulfillment_runs_total",
    "Fulfillment runs by action and outcome; duplicate means the claim was already taken.",
    ["action", "outcome"],
  );
  private readonly sideEffects = new CounterMetric(
    "fl_fulfillment_side_effects_total",
    "Fulfillment side effects by effect and status.",
    ["effect", "status"],
  );
  private readonly reconciliationTransitions = new CounterMetric(
    "fl_reconciliation_transitions_total",
    "Credential reconciliation observations and transitions.",
    ["transition"],
  );
  private readonly events = new CounterMetric(
    "fl_events_total",
    "Total number of published events by type.",
    ["event_type"],
  );

  recordHttpRequest(method: string, route: string, statusCode: number, durationSeconds: number): void {
    this.httpRequests.inc({
      method: method.toUpperCase(),
      route,
      status_code: String(statusCode),
    });
    this.httpDuration.observe(
      {
        method: method.toUpperCase(),
        route,
      },
      durationSeconds,
    );
  }

  recordRateLimitRejection(scope: string): void {
    this.rateLimitRejections.inc({ scope });
  }

  recordCompletion(source: "webhook" | "manual", outcome: CompletionOutcome): void {
    this.completions.inc({ source, outcome });
  }

  recordPublishedEvent(event: FulfillmentEvent): void {
    this.events.inc({ event_type: event.type });

    switch (event.type) {
      case "fulfillment.started":
      case "gift.completed":
        break;
      case "reconciliation.completed":
        for (const transition of RECONCILIATION_TRANSITIONS) {
          const count = event.data[transition];
          if (count > 0) {
            this.reconciliationTransitions.inc({ transition }, count);
          }
        }
        break;
      default:
        this.fulfillmentRuns.inc({ action: event.data.action, outcome: event.data.outcome });
        for (const effect of event.data.effects) {
          this.sideEffects.inc({ effect: effect.effect, status: effect.status });
        }
    }
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.rateLimitRejections.render(),
      ...this.completions.render(),
      ...this.fulfillmentRuns.render(),
      ...this.sideEffects.render(),
      ...this.reconciliationTransitions.render(),
      ...this.events.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
