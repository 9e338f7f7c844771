import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

export interface OspfArea {
    readonly name: string;
    /** Neighbors in state Full */
    readonly neighbors: number;
}

export interface OspfAreasDatasource {
    ospfAreas(): Promise<OspfArea[]>;
}

const neighborsDesc = new MetricDescriptor('junos_ospf3_neighbors', 'Number of OSPFv3 neighbors that are up', ['target', 'area']);

export class OspfCollector implements Collector<OspfAreasDatasource> {
    public readonly name = 'ospf';

    public describe(): MetricDescriptor[] {
        return [neighborsDesc];
    }

    public async collect(datasource: OspfAreasDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const areas = await datasource.ospfAreas();

        for (const area of areas) {
            sink(gauge(neighborsDesc, area.neighbors, [...labelValues, area.name]));
        }
    }
}
