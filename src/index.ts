/**
 * junos-exporter-core
 * ==========================================
 * Collection core of a Prometheus exporter for Junos devices.
 *
 * Runs fixed CLI commands with `| display xml` over SSH, decodes the replies
 * into domain records and turns them into gauge samples for nine telemetry
 * domains: interfaces, alarms, BGP, OSPFv3, IS-IS, routing tables, routing
 * engine, chassis environment and optics diagnostics.
 *
 * @packageDocumentation
 */

// ===============================================
// 1. ENTRY POINTS
// ===============================================

/**
 * Scrapes a fleet of targets concurrently and renders the exposition payload.
 */
export { DeviceCollector, DeviceCollectorOptions, TargetResult, CollectorFailure } from './features/DeviceCollector';

/**
 * Issues the domain commands over a bound channel and maps replies into records.
 */
export { RpcClient, RpcClientOptions, JunosDatasource, XML_DIRECTIVE } from './client/RpcClient';

/**
 * Resolves settings from the environment (`.env` included) and explicit options.
 */
export { loadConfig, ExporterOptions, ExporterConfig, SshSettings, DEFAULT_FEATURES } from './core/ExporterConfig';

// ===============================================
// 2. TRANSPORT
// ===============================================

export { RemoteCommandChannel, ChannelFactory } from './core/CommandChannel';
export { SshChannel, SshChannelOptions } from './core/SshChannel';

// ===============================================
// 3. COLLECTORS
// ===============================================

export { Collector, MetricDescriptor, MetricSample, MetricSink, gauge } from './collectors/Collector';
export { AlarmCollector, AlarmCounter, AlarmCounterDatasource } from './collectors/AlarmCollector';
export { BgpCollector, BgpSession, BgpSessionsDatasource } from './collectors/BgpCollector';
export { EnvironmentCollector, EnvironmentItem, EnvironmentItemsDatasource } from './collectors/EnvironmentCollector';
export { InterfaceCollector, InterfaceStats, InterfaceStatsDatasource } from './collectors/InterfaceCollector';
export {
    InterfaceDiagnosticsCollector,
    InterfaceDiagnostics,
    InterfaceDiagnosticsDatasource,
    RxPowerSource
} from './collectors/InterfaceDiagnosticsCollector';
export { IsisCollector, IsisAdjacencies, IsisAdjacenciesDatasource } from './collectors/IsisCollector';
export { OspfCollector, OspfArea, OspfAreasDatasource } from './collectors/OspfCollector';
export { RouteCollector, RoutingTable, ProtocolRouteCount, RoutingTablesDatasource } from './collectors/RouteCollector';
export {
    RoutingEngineCollector,
    RouteEngineStats,
    RouteEngineStatsDatasource
} from './collectors/RoutingEngineCollector';

// ===============================================
// 4. FEATURES & UTILITIES
// ===============================================

/**
 * Prometheus text exposition renderer.
 */
export { PrometheusExporter } from './features/PrometheusExporter';

export { AlarmFilter, FilterableAlarm } from './client/AlarmFilter';
export { decodeEnvelope, EnvelopeSchema } from './core/XmlEnvelope';

// ===============================================
// 5. TYPES & ERRORS
// ===============================================

export {
    ExporterError,
    ExporterErrorKind,
    TransportError,
    DecodeError,
    ConfigError,
    isExporterError,
    describeError
} from './core/ExporterError';

export { Feature, Logger, ALL_FEATURES } from './types';
