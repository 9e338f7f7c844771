import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

const prefix = 'junos_route_';

/**
 * Routes one protocol contributes to a table.
 */
export interface ProtocolRouteCount {
    readonly name: string;
    readonly routes: number;
    readonly activeRoutes: number;
}

export interface RoutingTable {
    readonly name: string;
    readonly maxRoutes: number;
    readonly activeRoutes: number;
    readonly totalRoutes: number;
    /** In the order the device reports them */
    readonly protocols: readonly ProtocolRouteCount[];
}

export interface RoutingTablesDatasource {
    routingTables(): Promise<RoutingTable[]>;
}

const tableLabels = ['target', 'table'];
const protocolLabels = ['target', 'table', 'protocol'];

const totalRoutesDesc = new MetricDescriptor(prefix + 'table_total_count', 'Number of routes in the table', tableLabels);
const activeRoutesDesc = new MetricDescriptor(prefix + 'table_active_count', 'Number of active routes in the table', tableLabels);
const maxRoutesDesc = new MetricDescriptor(prefix + 'table_max_count', 'Number of destinations in the table', tableLabels);
const protocolRoutesDesc = new MetricDescriptor(prefix + 'protocol_routes_count', 'Number of routes by protocol', protocolLabels);
const protocolActiveRoutesDesc = new MetricDescriptor(
    prefix + 'protocol_active_routes_count',
    'Number of active routes by protocol',
    protocolLabels
);

export class RouteCollector implements Collector<RoutingTablesDatasource> {
    public readonly name = 'routes';

    public describe(): MetricDescriptor[] {
        return [totalRoutesDesc, activeRoutesDesc, maxRoutesDesc, protocolRoutesDesc, protocolActiveRoutesDesc];
    }

    public async collect(datasource: RoutingTablesDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const tables = await datasource.routingTables();

        for (const table of tables) {
            const lv = [...labelValues, table.name];
            sink(gauge(totalRoutesDesc, table.totalRoutes, lv));
            sink(gauge(activeRoutesDesc, table.activeRoutes, lv));
            sink(gauge(maxRoutesDesc, table.maxRoutes, lv));

            for (const proto of table.protocols) {
                const plv = [...lv, proto.name];
                sink(gauge(protocolRoutesDesc, proto.routes, plv));
                sink(gauge(protocolActiveRoutesDesc, proto.activeRoutes, plv));
            }
        }
    }
}
