import type { TransactionStatus } from "../domain/types.js";

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

export type StatusChangeSource = "initiation" | "webhook" | "worker";

export type WebhookOutcome =
  | "applied"
  | "pending"
  | "duplicate"
  | "unknown_reference"
  | "gateway_unavailable"
  | "authentication_failed";

export type WorkerPollOutcome =
  | "resolved"
  | "pending"
  | "gateway_unavailable"
  | "exhausted"
  | "already_terminal"
  | "missing"
  | "lease_lost"
  | "error";

export class PaymentMetricsRegistry {
  private readonly httpRequests = new CounterMetric(
    "payments_http_requests_total",
    "Total number of HTTP requests handled by route, method, and status code.",
    ["method", "route", "status_code"],
  );
  private readonly httpDuration = new HistogramMetric(
    "payments_http_request_duration_seconds",
    "HTTP request duration in seconds by route and method.",
    ["method", "route"],
    [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1, 2, 5],
  );
  private readonly statusTransitions = new CounterMetric(
    "payments_transaction_status_total",
    "Total number of transaction status transitions by resulting status and source.",
    ["status", "source"],
  );
  private readonly duplicateResolutions = new CounterMetric(
    "payments_duplicate_resolutions_total",
    "Total number of resolutions ignored because the transaction was already terminal.",
    ["source"],
  );
  private readonly webhookOutcomes = new CounterMetric(
    "payments_webhook_notifications_total",
    "Total number of gateway notifications by outcome.",
    ["outcome"],
  );
  private readonly workerPolls = new CounterMetric(
    "payments_reconciliation_polls_total",
    "Total number of reconciliation polls by outcome.",
    ["outcome"],
  );
  private readonly gatewayDuration = new HistogramMetric(
    "payments_gateway_call_duration_seconds",
    "Gateway call duration in seconds by gateway, operation, and outcome.",
    ["gateway", "operation", "outcome"],
    [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
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

  recordStatusTransition(status: TransactionStatus, source: StatusChangeSource): void {
    this.statusTransitions.inc({ status, source });
  }

  recordDuplicateResolution(source: StatusChangeSource): void {
    this.duplicateResolutions.inc({ source });
  }

  recordWebhookOutcome(outcome: WebhookOutcome): void {
    this.webhookOutcomes.inc({ outcome });
  }

  recordWorkerPoll(outcome: WorkerPollOutcome): void {
    this.workerPolls.inc({ outcome });
  }

  recordGatewayCall(gateway: string, operation: "initiate" | "verify", outcome: "ok" | "error", durationSeconds: number): void {
    this.gatewayDuration.observe({ gateway, operation, outcome }, durationSeconds);
  }

  renderPrometheus(): string {
    const lines = [
      ...this.httpRequests.render(),
      ...this.httpDuration.render(),
      ...this.statusTransitions.render(),
      ...this.duplicateResolutions.render(),
      ...this.webhookOutcomes.render(),
      ...this.workerPolls.render(),
      ...this.gatewayDuration.render(),
    ];
    return `${lines.join("\n")}\n`;
  }
}
