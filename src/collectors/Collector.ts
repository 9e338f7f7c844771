/**
 * Collector.ts
 * Metric descriptors, samples and the collector contract shared by every domain.
 */

const METRIC_NAME = /^[a-zA-Z_:][a-zA-Z0-9_:]*$/;
const LABEL_NAME = /^[a-zA-Z_][a-zA-Z0-9_]*$/;

/**
 * Fixed identity of a metric: name, help text and ordered label names.
 * Every label set starts with `target`.
 */
export class MetricDescriptor {
    constructor(
        public readonly name: string,
        public readonly help: string,
        public readonly labelNames: readonly string[]
    ) {
        if (!METRIC_NAME.test(name)) {
            throw new Error(`Invalid metric name "${name}"`);
        }
        const invalid = labelNames.find(label => !LABEL_NAME.test(label));
        if (invalid !== undefined) {
            throw new Error(`Invalid label name "${invalid}" on metric ${name}`);
        }
    }
}

/**
 * One point-in-time gauge value with concrete label values.
 */
export interface MetricSample {
    readonly descriptor: MetricDescriptor;
    readonly value: number;
    readonly labelValues: readonly string[];
}

/**
 * Receives the samples a collector produces.
 */
export type MetricSink = (sample: MetricSample) => void;

/**
 * Builds a gauge sample. A label value count that does not match the
 * descriptor is a programming error and throws.
 */
export function gauge(descriptor: MetricDescriptor, value: number, labelValues: readonly string[]): MetricSample {
    if (labelValues.length !== descriptor.labelNames.length) {
        throw new Error(
            `Metric ${descriptor.name} expects ${descriptor.labelNames.length} label values, got ${labelValues.length}`
        );
    }
    return { descriptor, value, labelValues: [...labelValues] };
}

/**
 * Domain collector contract.
 * @template D The datasource capability the collector pulls records from.
 */
export interface Collector<D> {
    /** Short domain name used in logs. */
    readonly name: string;

    describe(): MetricDescriptor[];

    /**
     * Pulls records from the datasource once and emits samples for them.
     * @param labelValues Values already bound by the caller, `target` first.
     */
    collect(datasource: D, sink: MetricSink, labelValues: readonly string[]): Promise<void>;
}
