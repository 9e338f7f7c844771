import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

/**
 * One temperature sensor, unique by name.
 */
export interface EnvironmentItem {
    readonly name: string;
    readonly temperature: number;
}

export interface EnvironmentItemsDatasource {
    environmentItems(): Promise<EnvironmentItem[]>;
}

const temperaturesDesc = new MetricDescriptor(
    'junos_environment_item_temp',
    'Temperature of the air flowing past the component (degrees C)',
    ['target', 'item']
);

export class EnvironmentCollector implements Collector<EnvironmentItemsDatasource> {
    public readonly name = 'environment';

    public describe(): MetricDescriptor[] {
        return [temperaturesDesc];
    }

    public async collect(datasource: EnvironmentItemsDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const items = await datasource.environmentItems();

        for (const item of items) {
            sink(gauge(temperaturesDesc, item.temperature, [...labelValues, item.name]));
        }
    }
}
