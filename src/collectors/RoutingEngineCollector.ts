import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

const prefix = 'junos_route_engine_';

/**
 * Control-plane health snapshot of the (first) routing engine.
 */
export interface RouteEngineStats {
    readonly temperature: number;
    readonly cpuTemperature: number;
    readonly memoryUtilization: number;
    readonly cpuUser: number;
    readonly cpuBackground: number;
    readonly cpuSystem: number;
    readonly cpuInterrupt: number;
    readonly cpuIdle: number;
    readonly loadAverageOne: number;
    readonly loadAverageFive: number;
    readonly loadAverageFifteen: number;
}

export interface RouteEngineStatsDatasource {
    routeEngineStats(): Promise<RouteEngineStats>;
}

const l = ['target'];

const temperatureDesc = new MetricDescriptor(prefix + 'temp', 'Temperature of the air flowing past the Routing Engine (degrees C)', l);
const memoryUtilizationDesc = new MetricDescriptor(prefix + 'memory_utilization', 'Percentage of Routing Engine memory being used', l);
const cpuTemperatureDesc = new MetricDescriptor(prefix + 'cpu_temp', 'Temperature of the CPU (degrees C)', l);
const cpuUserDesc = new MetricDescriptor(prefix + 'cpu_user_percent', 'Percentage of CPU time being used by user processes', l);
const cpuBackgroundDesc = new MetricDescriptor(prefix + 'cpu_background_percent', 'Percentage of CPU time being used by background processes', l);
const cpuSystemDesc = new MetricDescriptor(prefix + 'cpu_system_percent', 'Percentage of CPU time being used by kernel processes', l);
const cpuInterruptDesc = new MetricDescriptor(prefix + 'cpu_interrupt_percent', 'Percentage of CPU time being used by interrupts', l);
const cpuIdleDesc = new MetricDescriptor(prefix + 'cpu_idle_percent', 'Percentage of CPU time that is idle', l);
const loadAverageOneDesc = new MetricDescriptor(prefix + 'load_average_one', 'Routing engine load average over the last 1 minute', l);
const loadAverageFiveDesc = new MetricDescriptor(prefix + 'load_average_five', 'Routing engine load average over the last 5 minutes', l);
const loadAverageFifteenDesc = new MetricDescriptor(prefix + 'load_average_fifteen', 'Routing engine load average over the last 15 minutes', l);

export class RoutingEngineCollector implements Collector<RouteEngineStatsDatasource> {
    public readonly name = 'routing_engine';

    public describe(): MetricDescriptor[] {
        return [
            temperatureDesc,
            memoryUtilizationDesc,
            cpuTemperatureDesc,
            cpuUserDesc,
            cpuBackgroundDesc,
            cpuSystemDesc,
            cpuInterruptDesc,
            cpuIdleDesc,
            loadAverageOneDesc,
            loadAverageFiveDesc,
            loadAverageFifteenDesc
        ];
    }

    public async collect(datasource: RouteEngineStatsDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const r = await datasource.routeEngineStats();

        sink(gauge(temperatureDesc, r.temperature, labelValues));
        sink(gauge(memoryUtilizationDesc, r.memoryUtilization, labelValues));
        sink(gauge(cpuTemperatureDesc, r.cpuTemperature, labelValues));
        sink(gauge(cpuUserDesc, r.cpuUser, labelValues));
        sink(gauge(cpuBackgroundDesc, r.cpuBackground, labelValues));
        sink(gauge(cpuSystemDesc, r.cpuSystem, labelValues));
        sink(gauge(cpuInterruptDesc, r.cpuInterrupt, labelValues));
        sink(gauge(cpuIdleDesc, r.cpuIdle, labelValues));
        sink(gauge(loadAverageOneDesc, r.loadAverageOne, labelValues));
        sink(gauge(loadAverageFiveDesc, r.loadAverageFive, labelValues));
        sink(gauge(loadAverageFifteenDesc, r.loadAverageFifteen, labelValues));
    }
}
