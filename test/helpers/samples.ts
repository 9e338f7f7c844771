import { Collector, MetricSample } from '../../src/collectors/Collector';

export interface FlatSample {
    name: string;
    value: number;
    labels: Record<string, string>;
}

export function flatten(sample: MetricSample): FlatSample {
    const labels: Record<string, string> = {};
    sample.descriptor.labelNames.forEach((label, i) => {
        labels[label] = sample.labelValues[i];
    });
    return { name: sample.descriptor.name, value: sample.value, labels };
}

export async function collectSamples<D>(collector: Collector<D>, datasource: D, target = 'edge-1'): Promise<FlatSample[]> {
    const samples: MetricSample[] = [];
    await collector.collect(datasource, sample => samples.push(sample), [target]);
    return samples.map(flatten);
}
