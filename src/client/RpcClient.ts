import { AlarmFilter } from './AlarmFilter';
import {
    AlarmEnvelope,
    BgpEnvelope,
    EnvironmentEnvelope,
    InterfaceDiagnosticsEnvelope,
    InterfaceEnvelope,
    IsisEnvelope,
    Ospf3Envelope,
    RouteEnvelope,
    RoutingEngineEnvelope
} from './RpcEnvelopes';
import { RemoteCommandChannel } from '../core/CommandChannel';
import { TransportError, describeError, isExporterError } from '../core/ExporterError';
import { EnvelopeSchema, decodeEnvelope } from '../core/XmlEnvelope';
import { AlarmCounter, AlarmCounterDatasource } from '../collectors/AlarmCollector';
import { BgpSession, BgpSessionsDatasource } from '../collectors/BgpCollector';
import { EnvironmentItem, EnvironmentItemsDatasource } from '../collectors/EnvironmentCollector';
import {
    InterfaceDiagnostics,
    InterfaceDiagnosticsDatasource
} from '../collectors/InterfaceDiagnosticsCollector';
import { InterfaceStats, InterfaceStatsDatasource } from '../collectors/InterfaceCollector';
import { IsisAdjacencies, IsisAdjacenciesDatasource } from '../collectors/IsisCollector';
import { OspfArea, OspfAreasDatasource } from '../collectors/OspfCollector';
import { RoutingTable, RoutingTablesDatasource } from '../collectors/RouteCollector';
import { RouteEngineStats, RouteEngineStatsDatasource } from '../collectors/RoutingEngineCollector';
import { Logger } from '../types';
import { parseDecimal } from '../utils/Helpers';

export interface RpcClientOptions {
    /**
     * Log every command and its raw reply at debug level (default: false).
     */
    debug?: boolean;
    /**
     * Alarms whose description or type match this pattern are not counted.
     * Pass a compiled `AlarmFilter` to share one instance between clients.
     */
    alarmFilter?: string | AlarmFilter | null;
    /**
     * Destination of log lines (default: console).
     */
    logger?: Logger;
}

/**
 * Every datasource capability the collectors depend on.
 */
export type JunosDatasource = AlarmCounterDatasource &
    InterfaceStatsDatasource &
    BgpSessionsDatasource &
    OspfAreasDatasource &
    IsisAdjacenciesDatasource &
    RoutingTablesDatasource &
    RouteEngineStatsDatasource &
    EnvironmentItemsDatasource &
    InterfaceDiagnosticsDatasource;

export const XML_DIRECTIVE = ' | display xml';

const ALARM_COMMANDS = ['show system alarms', 'show chassis alarms'];

/**
 * RpcClient
 * * Issues one fixed CLI command per telemetry domain over the bound channel,
 * decodes the XML reply into its envelope and maps it into domain records.
 * * Transport and decode failures reject the whole call; nothing partial is returned.
 *
 * @example
 * const channel = new SshChannel({ host: 'edge-1', username: 'exporter', privateKey });
 * await channel.connect();
 * const client = new RpcClient(channel, { alarmFilter: 'Management Ethernet' });
 * const sessions = await client.bgpSessions();
 */
export class RpcClient implements JunosDatasource {
    private readonly debug: boolean;
    private readonly alarmFilter: AlarmFilter | null;
    private readonly logger: Logger;

    /**
     * @throws ConfigError when `alarmFilter` is not a valid pattern.
     */
    constructor(private readonly channel: RemoteCommandChannel, options: RpcClientOptions = {}) {
        this.debug = options.debug ?? false;
        this.logger = options.logger ?? console;

        const filter = options.alarmFilter;
        this.alarmFilter = typeof filter === 'string' || filter === undefined ? AlarmFilter.compile(filter) : filter;
    }

    public get host(): string {
        return this.channel.host;
    }

    public async alarmCounter(): Promise<AlarmCounter> {
        let red = 0;
        let yellow = 0;

        for (const cmd of ALARM_COMMANDS) {
            const info = await this.runCommandAndParse(cmd, AlarmEnvelope);

            for (const d of info['alarm-detail']) {
                if (this.shouldFilterAlarm(d['alarm-description'], d['alarm-type'])) {
                    continue;
                }

                if (d['alarm-class'] === 'Major') {
                    red++;
                } else if (d['alarm-class'] === 'Minor') {
                    yellow++;
                }
            }
        }

        return { redCount: red, yellowCount: yellow };
    }

    private shouldFilterAlarm(description: string, type: string): boolean {
        if (!this.alarmFilter) return false;
        return this.alarmFilter.matches({ description, type });
    }

    public async interfaceStats(): Promise<InterfaceStats[]> {
        const info = await this.runCommandAndParse('show interfaces statistics detail', InterfaceEnvelope);

        const stats: InterfaceStats[] = [];
        for (const phy of info['physical-interface']) {
            const adminStatus = phy['admin-status'] === 'up';
            const operStatus = phy['oper-status'] === 'up';

            stats.push({
                isPhysical: true,
                name: phy['name'],
                description: phy['description'],
                mac: phy['current-physical-address'],
                adminStatus,
                operStatus,
                errorStatus: adminStatus !== operStatus,
                receiveBytes: phy['traffic-statistics']['input-bytes'],
                receiveErrors: phy['input-error-list']['input-errors'],
                receiveDrops: phy['input-error-list']['input-drops'],
                transmitBytes: phy['traffic-statistics']['output-bytes'],
                transmitErrors: phy['output-error-list']['output-errors'],
                transmitDrops: phy['output-error-list']['output-drops']
            });

            for (const log of phy['logical-interface']) {
                stats.push({
                    isPhysical: false,
                    name: log['name'],
                    description: log['description'],
                    mac: phy['current-physical-address'],
                    adminStatus: false,
                    operStatus: false,
                    errorStatus: false,
                    receiveBytes: log['traffic-statistics']['input-bytes'],
                    receiveErrors: 0,
                    receiveDrops: 0,
                    transmitBytes: log['traffic-statistics']['output-bytes'],
                    transmitErrors: 0,
                    transmitDrops: 0
                });
            }
        }

        return stats;
    }

    public async bgpSessions(): Promise<BgpSession[]> {
        const info = await this.runCommandAndParse('show bgp summary', BgpEnvelope);

        return info['bgp-peer'].map(peer => {
            // Peers with several RIBs (e.g. inet + inet6) report the first one
            const rib = peer['bgp-rib'][0];

            return {
                ip: peer['peer-address'],
                up: peer['peer-state'] === 'Established',
                asn: peer['peer-as'],
                flaps: peer['flap-count'],
                inputMessages: peer['input-messages'],
                outputMessages: peer['output-messages'],
                acceptedPrefixes: rib ? rib['accepted-prefix-count'] : 0,
                activePrefixes: rib ? rib['active-prefix-count'] : 0,
                receivedPrefixes: rib ? rib['received-prefix-count'] : 0,
                rejectedPrefixes: rib ? rib['suppressed-prefix-count'] : 0
            };
        });
    }

    public async ospfAreas(): Promise<OspfArea[]> {
        const info = await this.runCommandAndParse('show ospf3 overview', Ospf3Envelope);

        return info['ospf-overview']['ospf-area-overview'].map(area => ({
            name: area['ospf-area'],
            neighbors: area['ospf-nbr-overview']['ospf-nbr-up-count']
        }));
    }

    public async isisAdjacencies(): Promise<IsisAdjacencies> {
        const info = await this.runCommandAndParse('show isis adjacency', IsisEnvelope);

        let up = 0;
        let total = 0;
        for (const adjacency of info['isis-adjacency']) {
            if (adjacency['adjacency-state'] === 'Up') {
                up++;
            }
            total++;
        }

        return { up, total };
    }

    public async routingTables(): Promise<RoutingTable[]> {
        const info = await this.runCommandAndParse('show route summary', RouteEnvelope);

        return info['route-table'].map(table => ({
            name: table['table-name'],
            maxRoutes: table['destination-count'],
            activeRoutes: table['active-route-count'],
            totalRoutes: table['total-route-count'],
            protocols: table['protocols'].map(proto => ({
                name: proto['protocol-name'],
                routes: proto['protocol-route-count'],
                activeRoutes: proto['active-route-count']
            }))
        }));
    }

    public async routeEngineStats(): Promise<RouteEngineStats> {
        const info = await this.runCommandAndParse('show chassis routing-engine', RoutingEngineEnvelope);

        // The envelope guarantees at least one entry; dual-RE chassis report the first
        const [re] = info['route-engine'];

        return {
            temperature: re['temperature'],
            cpuTemperature: re['cpu-temperature'],
            memoryUtilization: re['memory-buffer-utilization'],
            cpuUser: re['cpu-user'],
            cpuBackground: re['cpu-background'],
            cpuSystem: re['cpu-system'],
            cpuInterrupt: re['cpu-interrupt'],
            cpuIdle: re['cpu-idle'],
            loadAverageOne: re['load-average-one'],
            loadAverageFive: re['load-average-five'],
            loadAverageFifteen: re['load-average-fifteen']
        };
    }

    public async environmentItems(): Promise<EnvironmentItem[]> {
        const info = await this.runCommandAndParse('show chassis environment', EnvironmentEnvelope);

        // Sensors can be listed more than once; the later reading wins
        const temperatures = new Map<string, number>();
        for (const item of info['environment-item']) {
            const temperature = item['temperature'];
            if (temperature) {
                temperatures.set(item['name'], temperature['@_celsius']);
            }
        }

        return Array.from(temperatures, ([name, temperature]) => ({ name, temperature }));
    }

    public async interfaceDiagnostics(): Promise<InterfaceDiagnostics[]> {
        const info = await this.runCommandAndParse('show interfaces diagnostics optics', InterfaceDiagnosticsEnvelope);

        const diagnostics: InterfaceDiagnostics[] = [];
        for (const phy of info['physical-interface']) {
            // A missing block reads as all zeros; only N/A excludes the interface
            const diag = phy['optics-diagnostics'];
            if (diag['optic-diagnostics-not-available'] === 'N/A') {
                continue;
            }

            const common = {
                name: phy['name'],
                laserBiasCurrent: diag['laser-bias-current'],
                laserOutputPower: diag['laser-output-power'],
                laserOutputPowerDbm: parseDecimal(diag['laser-output-power-dbm']) ?? 0,
                moduleTemperature: diag['module-temperature']
            };

            if (diag['module-voltage'] > 0) {
                diagnostics.push({
                    ...common,
                    rxSource: 'average',
                    moduleVoltage: diag['module-voltage'],
                    rxSignalAvgOpticalPower: diag['rx-signal-avg-optical-power'],
                    rxSignalAvgOpticalPowerDbm: parseDecimal(diag['rx-signal-avg-optical-power-dbm']) ?? 0,
                    laserRxOpticalPower: 0,
                    laserRxOpticalPowerDbm: 0
                });
            } else {
                diagnostics.push({
                    ...common,
                    rxSource: 'laser',
                    moduleVoltage: 0,
                    rxSignalAvgOpticalPower: 0,
                    rxSignalAvgOpticalPowerDbm: 0,
                    laserRxOpticalPower: diag['laser-rx-optical-power'],
                    laserRxOpticalPowerDbm: parseDecimal(diag['laser-rx-optical-power-dbm']) ?? 0
                });
            }
        }

        return diagnostics;
    }

    /**
     * Sends `<cmd> | display xml` over the channel and decodes the reply.
     * Channel failures that are not already typed are wrapped in a TransportError.
     */
    private async runCommandAndParse<T>(cmd: string, schema: EnvelopeSchema<T>): Promise<T> {
        const command = cmd + XML_DIRECTIVE;

        if (this.debug) {
            this.logger.debug(`[RpcClient] Running command on ${this.host}: ${command}`);
        }

        let raw: Buffer;
        try {
            raw = await this.channel.runCommand(command);
        } catch (error) {
            if (isExporterError(error) && error.isTransport) throw error;
            throw new TransportError(this.host, describeError(error), command, error);
        }

        if (this.debug) {
            this.logger.debug(`[RpcClient] Output for ${this.host}: ${raw.toString('utf8')}`);
        }

        return decodeEnvelope(raw, schema, command);
    }
}
