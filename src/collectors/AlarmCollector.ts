import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

const prefix = 'junos_alarms_';

/**
 * Unresolved alarms summed over the system and chassis alarm lists.
 */
export interface AlarmCounter {
    /** Alarms of class "Major" */
    readonly redCount: number;
    /** Alarms of class "Minor" */
    readonly yellowCount: number;
}

export interface AlarmCounterDatasource {
    alarmCounter(): Promise<AlarmCounter>;
}

const l = ['target'];

const redCountDesc = new MetricDescriptor(prefix + 'red_count', 'Number of red (major) alarms not filtered out', l);
const yellowCountDesc = new MetricDescriptor(prefix + 'yellow_count', 'Number of yellow (minor) alarms not filtered out', l);

export class AlarmCollector implements Collector<AlarmCounterDatasource> {
    public readonly name = 'alarm';

    public describe(): MetricDescriptor[] {
        return [redCountDesc, yellowCountDesc];
    }

    public async collect(datasource: AlarmCounterDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const counter = await datasource.alarmCounter();

        sink(gauge(redCountDesc, counter.redCount, labelValues));
        sink(gauge(yellowCountDesc, counter.yellowCount, labelValues));
    }
}
