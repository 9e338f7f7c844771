import { z } from 'zod';
import {
    attributeNum,
    group,
    list,
    num,
    optionalGroup,
    section,
    text
} from '../core/XmlEnvelope';

/**
 * RpcEnvelopes.ts
 * Reply structure of every command the client issues, spelled with the
 * vendor's XML tag names. Mapping into domain records happens in RpcClient.
 */

function child(value: unknown, key: string): unknown {
    return value !== null && typeof value === 'object' ? Reflect.get(value, key) : undefined;
}

/**
 * Wraps a domain's information element into a document schema rooted at
 * `rpc-reply`; decoding yields the information element's contents.
 */
function envelope<S extends z.ZodRawShape>(repeated: string[], information: string, fields: S) {
    const shape = z.preprocess(
        doc => child(child(doc, 'rpc-reply'), information),
        section(fields, `rpc-reply/${information}`)
    );

    return { repeated: new Set(repeated), shape };
}

// --- Alarms (show system alarms / show chassis alarms) ---

const alarmDetail = group({
    'alarm-class': text(),
    'alarm-description': text(),
    'alarm-type': text()
});

export const AlarmEnvelope = envelope(['alarm-detail'], 'alarm-information', {
    'alarm-detail': list(alarmDetail)
});

export type AlarmDetails = z.output<typeof alarmDetail>;

// --- Interfaces (show interfaces statistics detail) ---

const trafficStatistics = group({
    'input-bytes': num(),
    'output-bytes': num()
});

const logicalInterface = group({
    'name': text(),
    'description': text(),
    'traffic-statistics': trafficStatistics
});

const physicalInterface = group({
    'name': text(),
    'admin-status': text(),
    'oper-status': text(),
    'description': text(),
    'current-physical-address': text(),
    'traffic-statistics': trafficStatistics,
    'input-error-list': group({
        'input-errors': num(),
        'input-drops': num()
    }),
    'output-error-list': group({
        'output-errors': num(),
        'output-drops': num()
    }),
    'logical-interface': list(logicalInterface)
});

export const InterfaceEnvelope = envelope(['physical-interface', 'logical-interface'], 'interface-information', {
    'physical-interface': list(physicalInterface)
});

// --- BGP (show bgp summary) ---

const bgpRib = group({
    'accepted-prefix-count': num(),
    'active-prefix-count': num(),
    'received-prefix-count': num(),
    'suppressed-prefix-count': num()
});

const bgpPeer = group({
    'peer-address': text(),
    'peer-state': text(),
    'peer-as': text(),
    'flap-count': num(),
    'input-messages': num(),
    'output-messages': num(),
    'bgp-rib': list(bgpRib)
});

export const BgpEnvelope = envelope(['bgp-peer', 'bgp-rib'], 'bgp-information', {
    'bgp-peer': list(bgpPeer)
});

// --- OSPFv3 (show ospf3 overview) ---

const ospfArea = group({
    'ospf-area': text(),
    'ospf-nbr-overview': group({
        'ospf-nbr-up-count': num()
    })
});

export const Ospf3Envelope = envelope(['ospf-area-overview'], 'ospf3-overview-information', {
    'ospf-overview': group({
        'ospf-area-overview': list(ospfArea)
    })
});

// --- IS-IS (show isis adjacency) ---

export const IsisEnvelope = envelope(['isis-adjacency'], 'isis-adjacency-information', {
    'isis-adjacency': list(group({
        'adjacency-state': text()
    }))
});

// --- Routing tables (show route summary) ---

const routeProtocol = group({
    'protocol-name': text(),
    'protocol-route-count': num(),
    'active-route-count': num()
});

const routeTable = group({
    'table-name': text(),
    'destination-count': num(),
    'total-route-count': num(),
    'active-route-count': num(),
    'protocols': list(routeProtocol)
});

export const RouteEnvelope = envelope(['route-table', 'protocols'], 'route-summary-information', {
    'route-table': list(routeTable)
});

// --- Routing engine (show chassis routing-engine) ---

const routeEngine = group({
    'temperature': attributeNum('celsius'),
    'cpu-temperature': attributeNum('celsius'),
    'memory-buffer-utilization': num(),
    'cpu-user': num(),
    'cpu-background': num(),
    'cpu-system': num(),
    'cpu-interrupt': num(),
    'cpu-idle': num(),
    'load-average-one': num(),
    'load-average-five': num(),
    'load-average-fifteen': num()
});

export const RoutingEngineEnvelope = envelope(['route-engine'], 'route-engine-information', {
    'route-engine': list(routeEngine).refine(engines => engines.length > 0, 'expected at least one route-engine')
});

// --- Environment (show chassis environment) ---

export const EnvironmentEnvelope = envelope(['environment-item'], 'environment-information', {
    'environment-item': list(group({
        'name': text(),
        'temperature': optionalGroup({
            '@_celsius': num()
        })
    }))
});

// --- Optics (show interfaces diagnostics optics) ---

const opticsDiagnostics = {
    'optic-diagnostics-not-available': text(),
    'laser-bias-current': num(),
    'laser-output-power': num(),
    'laser-output-power-dbm': text(),
    'module-temperature': attributeNum('celsius'),
    'module-voltage': num(),
    'rx-signal-avg-optical-power': num(),
    'rx-signal-avg-optical-power-dbm': text(),
    'laser-rx-optical-power': num(),
    'laser-rx-optical-power-dbm': text()
};

export const InterfaceDiagnosticsEnvelope = envelope(['physical-interface'], 'interface-information', {
    'physical-interface': list(group({
        'name': text(),
        'optics-diagnostics': group(opticsDiagnostics)
    }))
});
