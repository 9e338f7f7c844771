import { MetricDescriptor, MetricSample } from '../collectors/Collector';

/**
 * PrometheusExporter
 * * Transformation Engine.
 * * Renders descriptors and gauge samples in the Prometheus text exposition format.
 */
export class PrometheusExporter {

    /**
     * Renders every descriptor with its samples into one payload.
     * Descriptors are written in the given order, samples in emission order.
     * A descriptor without samples still gets its HELP and TYPE lines.
     *
     * @returns A string ready to be served on a `/metrics` endpoint.
     */
    public static export(descriptors: readonly MetricDescriptor[], samples: readonly MetricSample[]): string {
        const byName = new Map<string, MetricSample[]>();
        for (const sample of samples) {
            const bucket = byName.get(sample.descriptor.name);
            if (bucket) {
                bucket.push(sample);
            } else {
                byName.set(sample.descriptor.name, [sample]);
            }
        }

        let output = '';
        const written = new Set<string>();

        for (const def of descriptors) {
            if (written.has(def.name)) continue;
            written.add(def.name);

            // 1. Add HELP and TYPE headers
            output += `# HELP ${def.name} ${PrometheusExporter.escapeHelp(def.help)}\n`;
            output += `# TYPE ${def.name} gauge\n`;

            // 2. One line per sample
            // junos_interface_up{target="edge-1",name="ge-0/0/0",description="",mac=""} 1
            for (const sample of byName.get(def.name) ?? []) {
                output += `${def.name}${PrometheusExporter.formatLabels(def.labelNames, sample.labelValues)} ${PrometheusExporter.formatValue(sample.value)}\n`;
            }
        }

        return output;
    }

    private static formatLabels(names: readonly string[], values: readonly string[]): string {
        if (names.length === 0) return '';
        const parts = names.map((name, i) => `${name}="${PrometheusExporter.escapeLabelValue(values[i] ?? '')}"`);
        return `{${parts.join(',')}}`;
    }

    public static escapeLabelValue(value: string): string {
        return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, '\\n');
    }

    public static escapeHelp(help: string): string {
        return help.replace(/\\/g, '\\\\').replace(/\n/g, '\\n');
    }

    public static formatValue(value: number): string {
        if (Number.isNaN(value)) return 'NaN';
        if (value === Infinity) return '+Inf';
        if (value === -Infinity) return '-Inf';
        return String(value);
    }
}
