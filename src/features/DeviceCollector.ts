import { PrometheusExporter } from './PrometheusExporter';
import { JunosDatasource, RpcClient } from '../client/RpcClient';
import { AlarmFilter } from '../client/AlarmFilter';
import { AlarmCollector } from '../collectors/AlarmCollector';
import { BgpCollector } from '../collectors/BgpCollector';
import { Collector, MetricDescriptor, MetricSample, gauge } from '../collectors/Collector';
import { EnvironmentCollector } from '../collectors/EnvironmentCollector';
import { InterfaceCollector } from '../collectors/InterfaceCollector';
import { InterfaceDiagnosticsCollector } from '../collectors/InterfaceDiagnosticsCollector';
import { IsisCollector } from '../collectors/IsisCollector';
import { OspfCollector } from '../collectors/OspfCollector';
import { RouteCollector } from '../collectors/RouteCollector';
import { RoutingEngineCollector } from '../collectors/RoutingEngineCollector';
import { ChannelFactory, RemoteCommandChannel } from '../core/CommandChannel';
import { DEFAULT_FEATURES, ExporterConfig } from '../core/ExporterConfig';
import { describeError } from '../core/ExporterError';
import { SshChannel } from '../core/SshChannel';
import { Feature, Logger } from '../types';
import { boolToGauge } from '../utils/Helpers';

export interface DeviceCollectorOptions {
    /** Devices to scrape, each gets its own channel */
    targets: readonly string[];
    /** Opens a connected channel for a target */
    channelFactory: ChannelFactory;
    /** Enabled domains; unspecified ones keep their defaults */
    features?: Partial<Record<Feature, boolean>>;
    alarmFilter?: AlarmFilter | null;
    debug?: boolean;
    logger?: Logger;
}

/**
 * A domain that failed on one target during a scrape.
 */
export interface CollectorFailure {
    feature: Feature;
    error: string;
}

/**
 * Outcome of one scrape on one target.
 */
export interface TargetResult {
    target: string;
    /** True when the channel could be opened */
    up: boolean;
    durationSeconds: number;
    failures: CollectorFailure[];
    samples: MetricSample[];
}

const upDesc = new MetricDescriptor('junos_up', 'Scrape of target was successful', ['target']);
const durationDesc = new MetricDescriptor(
    'junos_collector_duration_seconds',
    'Duration of a collector scrape for one target',
    ['target']
);

const COLLECTORS: ReadonlyArray<readonly [Feature, Collector<JunosDatasource>]> = [
    ['interfaces', new InterfaceCollector()],
    ['alarm', new AlarmCollector()],
    ['bgp', new BgpCollector()],
    ['ospf', new OspfCollector()],
    ['isis', new IsisCollector()],
    ['routes', new RouteCollector()],
    ['routing_engine', new RoutingEngineCollector()],
    ['environment', new EnvironmentCollector()],
    ['interface_diagnostics', new InterfaceDiagnosticsCollector()]
];

/**
 * **DeviceCollector**
 *
 * Scrapes a fleet of devices. Every target is collected concurrently over its
 * own channel; inside a target the enabled collectors run one after another,
 * so a channel never has more than one command in flight.
 *
 * A failing domain is logged and left out of that target's samples. A target
 * whose channel cannot be opened reports `junos_up 0`.
 *
 * @example
 * const collector = DeviceCollector.fromConfig(loadConfig());
 * const payload = await collector.render();
 */
export class DeviceCollector {
    private readonly targets: readonly string[];
    private readonly channelFactory: ChannelFactory;
    private readonly collectors: ReadonlyArray<readonly [Feature, Collector<JunosDatasource>]>;
    private readonly alarmFilter: AlarmFilter | null;
    private readonly debug: boolean;
    private readonly logger: Logger;

    constructor(options: DeviceCollectorOptions) {
        const features = { ...DEFAULT_FEATURES, ...options.features };

        this.targets = [...options.targets];
        this.channelFactory = options.channelFactory;
        this.collectors = COLLECTORS.filter(([feature]) => features[feature]);
        this.alarmFilter = options.alarmFilter ?? null;
        this.debug = options.debug ?? false;
        this.logger = options.logger ?? console;
    }

    /**
     * Builds a collector that connects to every configured target over SSH.
     */
    public static fromConfig(config: ExporterConfig, logger?: Logger): DeviceCollector {
        return new DeviceCollector({
            targets: config.targets,
            channelFactory: SshChannel.factory({
                username: config.ssh.username,
                password: config.ssh.password,
                privateKey: config.ssh.privateKey,
                port: config.ssh.port,
                timeout: config.ssh.timeout
            }),
            features: config.features,
            alarmFilter: config.alarmFilter,
            debug: config.debug,
            logger
        });
    }

    /**
     * Descriptors of the self-metrics followed by those of every enabled collector.
     */
    public describe(): MetricDescriptor[] {
        const descriptors = [upDesc, durationDesc];
        for (const [, collector] of this.collectors) {
            descriptors.push(...collector.describe());
        }
        return descriptors;
    }

    /**
     * Scrapes all targets. Results are in target order.
     */
    public async scrape(): Promise<TargetResult[]> {
        if (this.debug) {
            this.logger.debug(`[DeviceCollector] Scraping ${this.targets.length} targets...`);
        }

        const outcomes = await Promise.allSettled(this.targets.map(target => this.collectTarget(target)));

        return outcomes.map((outcome, index) => {
            if (outcome.status === 'fulfilled') {
                return outcome.value;
            }

            // collectTarget handles its own failures; this covers anything it let through
            const target = this.targets[index];
            this.logger.error(`[DeviceCollector] ${target}: scrape failed: ${describeError(outcome.reason)}`);
            return {
                target,
                up: false,
                durationSeconds: 0,
                failures: [],
                samples: [gauge(upDesc, 0, [target]), gauge(durationDesc, 0, [target])]
            };
        });
    }

    /**
     * Scrapes all targets and renders the Prometheus text payload.
     */
    public async render(): Promise<string> {
        const results = await this.scrape();
        const samples = results.flatMap(result => result.samples);
        return PrometheusExporter.export(this.describe(), samples);
    }

    private async collectTarget(target: string): Promise<TargetResult> {
        const start = Date.now();
        const samples: MetricSample[] = [];
        const failures: CollectorFailure[] = [];
        let channel: RemoteCommandChannel | null = null;
        let up = false;

        try {
            channel = await this.channelFactory(target);
            up = true;

            const client = new RpcClient(channel, {
                debug: this.debug,
                alarmFilter: this.alarmFilter,
                logger: this.logger
            });

            for (const [feature, collector] of this.collectors) {
                // Buffered so that a failing domain contributes nothing
                const buffered: MetricSample[] = [];
                try {
                    await collector.collect(client, sample => buffered.push(sample), [target]);
                    samples.push(...buffered);
                } catch (error) {
                    failures.push({ feature, error: describeError(error) });
                    this.logger.error(`[DeviceCollector] ${target}: ${collector.name} collection failed: ${describeError(error)}`);
                }
            }
        } catch (error) {
            this.logger.error(`[DeviceCollector] ${target}: connection failed: ${describeError(error)}`);
        } finally {
            if (channel) channel.close();
        }

        const durationSeconds = (Date.now() - start) / 1000;
        samples.push(gauge(upDesc, boolToGauge(up), [target]));
        samples.push(gauge(durationDesc, durationSeconds, [target]));

        return { target, up, durationSeconds, failures, samples };
    }
}
