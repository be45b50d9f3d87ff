
export type MetricType = 'counter' | 'gauge';

export interface MetricDefinition {
    name: string;
    help: string;
    type: MetricType;
    labels?: string[];
}

interface MetricEntry extends MetricDefinition {
    values: Map<string, number>;
}

export interface MetricSnapshot {
    type: MetricType;
    help: string;
    values: Record<string, number>;
}

export class MetricsRegistry {
    private metrics = new Map<string, MetricEntry>();

    registerCounter(name: string, help: string, labels: string[] = []) {
        if (this.metrics.has(name)) return;
        this.metrics.set(name, { name, type: 'counter', help, labels, values: new Map<string, number>() });
    }

    registerGauge(name: string, help: string, labels: string[] = []) {
        if (this.metrics.has(name)) return;
        this.metrics.set(name, { name, type: 'gauge', help, labels, values: new Map<string, number>() });
    }

    increment(name: string, labels: Record<string, string> = {}, value: number = 1) {
        const metric = this.metrics.get(name);
        if (!metric || metric.type !== 'counter') return;

        const key = this.getLabelKey(labels);
        const current = metric.values.get(key) || 0;
        metric.values.set(key, current + value);
    }

    set(name: string, value: number, labels: Record<string, string> = {}) {
        const metric = this.metrics.get(name);
        if (!metric || metric.type !== 'gauge') return;

        const key = this.getLabelKey(labels);
        metric.values.set(key, value);
    }

    /** Current value for one label set, 0 when never recorded */
    get(name: string, labels: Record<string, string> = {}): number {
        return this.metrics.get(name)?.values.get(this.getLabelKey(labels)) ?? 0;
    }

    getMetrics(): Record<string, MetricSnapshot> {
        const out: Record<string, MetricSnapshot> = {};
        for (const [name, metric] of this.metrics) {
            out[name] = { type: metric.type, help: metric.help, values: Object.fromEntries(metric.values) };
        }
        return out;
    }

    /** One `name{labels} value` line per recorded series */
    summary(): string[] {
        const lines: string[] = [];
        for (const [name, metric] of this.metrics) {
            for (const [key, value] of metric.values) {
                lines.push(key ? `${name}{${key}} ${value}` : `${name} ${value}`);
            }
        }
        return lines;
    }

    private getLabelKey(labels: Record<string, string>): string {
        return Object.entries(labels).sort().map(([k, v]) => `${k}=${v}`).join(',');
    }
}

export const globalMetrics = new MetricsRegistry();
