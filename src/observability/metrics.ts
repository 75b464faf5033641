type Labels = Record<string, string>;

interface Series {
  name: string;
  labels: Labels;
}

interface HistogramSeries extends Series {
  values: number[];
}

// In-process counters and histograms for the agent loop. Nothing is pushed
// anywhere; callers read a snapshot or the Prometheus text export.
export class MetricsCollector {
  private counters = new Map<string, Series & { value: number }>();
  private histograms = new Map<string, HistogramSeries>();
  private readonly maxSamples = 1000;

  incrementCounter(name: string, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    const existing = this.counters.get(key);
    if (existing) existing.value += 1;
    else this.counters.set(key, { name, labels, value: 1 });
  }

  recordHistogram(name: string, value: number, labels: Labels = {}): void {
    const key = seriesKey(name, labels);
    const series = this.histograms.get(key) ?? { name, labels, values: [] };
    series.values.push(value);
    // keep only recent samples
    if (series.values.length > this.maxSamples) series.values = series.values.slice(-this.maxSamples);
    this.histograms.set(key, series);
  }

  counter(name: string, labels: Labels = {}): number {
    return this.counters.get(seriesKey(name, labels))?.value ?? 0;
  }

  samples(name: string, labels: Labels = {}): number[] {
    return [...(this.histograms.get(seriesKey(name, labels))?.values ?? [])];
  }

  exportPrometheusMetrics(): string {
    const lines: string[] = [];
    const counterNames = new Set([...this.counters.values()].map(s => s.name));
    for (const name of [...counterNames].sort()) {
      lines.push(`# TYPE ${name} counter`);
      for (const s of this.counters.values()) {
        if (s.name === name) lines.push(`${name}${labelText(s.labels)} ${s.value}`);
      }
    }
    const histogramNames = new Set([...this.histograms.values()].map(s => s.name));
    for (const name of [...histogramNames].sort()) {
      lines.push(`# TYPE ${name} summary`);
      for (const s of this.histograms.values()) {
        if (s.name !== name) continue;
        const sum = s.values.reduce((a, b) => a + b, 0);
        lines.push(`${name}_sum${labelText(s.labels)} ${sum}`);
        lines.push(`${name}_count${labelText(s.labels)} ${s.values.length}`);
      }
    }
    return lines.join('\n');
  }

  reset(): void {
    this.counters.clear();
    this.histograms.clear();
  }
}

function seriesKey(name: string, labels: Labels): string {
  const sorted = Object.keys(labels).sort().map(k => [k, labels[k]]);
  return `${name}:${JSON.stringify(sorted)}`;
}

function labelText(labels: Labels): string {
  const parts = Object.keys(labels).sort().map(k => `${k}="${labels[k]}"`);
  return parts.length ? `{${parts.join(',')}}` : '';
}
