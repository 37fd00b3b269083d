// src/libs/metrics.ts
// In-Process-Metriken im Prometheus-Textformat (/metrics).

type Labels = Record<string, string | number | boolean | undefined>;

type HistogramBucket = {
  le: number;
  count: number;
};

type HistogramState = {
  count: number;
  sum: number;
  buckets: HistogramBucket[];
};

const counters = new Map<string, number>();
const histograms = new Map<string, HistogramState>();

const REQUEST_DURATION_BUCKETS = [
  0.005,
  0.01,
  0.025,
  0.05,
  0.1,
  0.25,
  0.5,
  1,
  2.5,
  5,
  10,
];

const COUNTER_HELP: Record<string, string> = {
  http_requests_total: "Total number of HTTP requests",
  otp_issued_total: "OTP issuance attempts by channel and result",
  otp_verify_total: "OTP verification attempts by channel and result",
  passkey_ceremony_total: "Completed passkey ceremonies by purpose and result",
  push_auth_total: "Push approval transitions by result",
  recovery_total: "Account recovery steps by step and result",
  housekeeping_swept_total: "Documents changed by housekeeping sweepers",
};

function escapeLabel(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/\"/g, '\\\"').replace(/\n/g, "\\n");
}

function labelKey(labels?: Labels): string {
  if (!labels) return "";

  const parts = Object.entries(labels)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=${String(v)}`);

  return parts.join(",");
}

function labelText(labels?: Labels): string {
  if (!labels) return "";

  const parts = Object.entries(labels)
    .filter(([, value]) => value !== undefined)
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([k, v]) => `${k}=\"${escapeLabel(String(v))}\"`);

  if (parts.length === 0) return "";
  return `{${parts.join(",")}}`;
}

function counterKey(name: string, labels?: Labels): string {
  const key = labelKey(labels);
  return key ? `${name}|${key}` : name;
}

function histogramKey(name: string, labels?: Labels): string {
  const key = labelKey(labels);
  return key ? `${name}|${key}` : name;
}

export function incCounter(name: string, labels?: Labels, by = 1) {
  const key = counterKey(name, labels);
  counters.set(key, (counters.get(key) ?? 0) + by);
}

export function observeHistogram(
  name: string,
  value: number,
  labels?: Labels,
  buckets: number[] = REQUEST_DURATION_BUCKETS,
) {
  const key = histogramKey(name, labels);

  let state = histograms.get(key);
  if (!state) {
    state = {
      count: 0,
      sum: 0,
      buckets: buckets.map((le) => ({ le, count: 0 })),
    };
    histograms.set(key, state);
  }

  state.count += 1;
  state.sum += value;

  for (const bucket of state.buckets) {
    if (value <= bucket.le) {
      bucket.count += 1;
    }
  }
}

export function recordHttpRequest(
  method: string,
  route: string,
  statusCode: number,
  durationSeconds: number,
) {
  const labels = {
    method,
    route,
    status: statusCode,
  };

  incCounter("http_requests_total", labels, 1);
  observeHistogram("http_request_duration_seconds", durationSeconds, { method, route });
}

export function recordOtpIssued(channel: string, result: "ok" | "decoy" | "rate_limited") {
  incCounter("otp_issued_total", { channel, result });
}

export function recordOtpVerify(channel: string, result: string) {
  incCounter("otp_verify_total", { channel, result });
}

export function recordPasskeyCeremony(purpose: string, result: string) {
  incCounter("passkey_ceremony_total", { purpose, result });
}

export function recordPushAuth(result: string) {
  incCounter("push_auth_total", { result });
}

export function recordRecovery(step: string, result: string) {
  incCounter("recovery_total", { step, result });
}

export function recordSweep(job: string, changed: number) {
  incCounter("housekeeping_swept_total", { job }, changed);
}

function parseCounterKey(key: string): { name: string; labels?: Labels } {
  const [name, raw] = key.split("|", 2);
  if (!raw) return { name };

  const labels: Labels = {};
  for (const part of raw.split(",")) {
    const [k, v] = part.split("=", 2);
    labels[k] = v;
  }
  return { name, labels };
}

/** Nur fuer Tests: Zaehlerstand lesen. */
export function readCounter(name: string, labels?: Labels): number {
  return counters.get(counterKey(name, labels)) ?? 0;
}

function parseHistogramKey(key: string): { name: string; labels?: Labels } {
  return parseCounterKey(key);
}

export function renderPrometheusMetrics(): string {
  const lines: string[] = [];

  const byName = new Map<string, string[]>();
  for (const [key, value] of counters.entries()) {
    const { name, labels } = parseCounterKey(key);
    const series = byName.get(name) ?? [];
    series.push(`${name}${labelText(labels)} ${value}`);
    byName.set(name, series);
  }

  for (const [name, series] of [...byName.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    lines.push(`# HELP ${name} ${COUNTER_HELP[name] ?? name}`);
    lines.push(`# TYPE ${name} counter`);
    lines.push(...series);
  }

  lines.push("# HELP http_request_duration_seconds HTTP request duration in seconds");
  lines.push("# TYPE http_request_duration_seconds histogram");

  for (const [key, state] of histograms.entries()) {
    const { name, labels } = parseHistogramKey(key);

    for (const bucket of state.buckets) {
      const bucketLabels: Labels = {
        ...(labels ?? {}),
        le: bucket.le,
      };
      lines.push(`${name}_bucket${labelText(bucketLabels)} ${bucket.count}`);
    }

    const infLabels: Labels = {
      ...(labels ?? {}),
      le: "+Inf",
    };
    lines.push(`${name}_bucket${labelText(infLabels)} ${state.count}`);
    lines.push(`${name}_sum${labelText(labels)} ${state.sum}`);
    lines.push(`${name}_count${labelText(labels)} ${state.count}`);
  }

  if (lines.length === 0) {
    return "\n";
  }

  return `${lines.join("\n")}\n`;
}
