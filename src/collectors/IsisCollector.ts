import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

const prefix = 'junos_isis_';

export interface IsisAdjacencies {
    readonly up: number;
    readonly total: number;
}

export interface IsisAdjacenciesDatasource {
    isisAdjacencies(): Promise<IsisAdjacencies>;
}

const l = ['target'];

const upCountDesc = new MetricDescriptor(prefix + 'up_count', 'Number of ISIS adjacencies in state Up', l);
const totalCountDesc = new MetricDescriptor(prefix + 'total_count', 'Number of ISIS adjacencies', l);

export class IsisCollector implements Collector<IsisAdjacenciesDatasource> {
    public readonly name = 'isis';

    public describe(): MetricDescriptor[] {
        return [upCountDesc, totalCountDesc];
    }

    public async collect(datasource: IsisAdjacenciesDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const adjacencies = await datasource.isisAdjacencies();

        sink(gauge(upCountDesc, adjacencies.up, labelValues));
        sink(gauge(totalCountDesc, adjacencies.total, labelValues));
    }
}
