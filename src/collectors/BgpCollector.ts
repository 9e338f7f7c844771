import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';
import { boolToGauge } from '../utils/Helpers';

const prefix = 'junos_bgp_session_';

/**
 * Summary state of one BGP peer.
 */
export interface BgpSession {
    readonly ip: string;
    readonly up: boolean;
    readonly asn: string;
    readonly flaps: number;
    readonly inputMessages: number;
    readonly outputMessages: number;
    readonly acceptedPrefixes: number;
    readonly activePrefixes: number;
    readonly receivedPrefixes: number;
    readonly rejectedPrefixes: number;
}

export interface BgpSessionsDatasource {
    bgpSessions(): Promise<BgpSession[]>;
}

const l = ['target', 'asn', 'ip'];

const upDesc = new MetricDescriptor(prefix + 'up', 'Session is up (1 = Established)', l);
const receivedPrefixesDesc = new MetricDescriptor(prefix + 'received_prefixes_count', 'Number of received prefixes', l);
const acceptedPrefixesDesc = new MetricDescriptor(prefix + 'accepted_prefixes_count', 'Number of accepted prefixes', l);
const rejectedPrefixesDesc = new MetricDescriptor(prefix + 'rejected_prefixes_count', 'Number of rejected prefixes', l);
const activePrefixesDesc = new MetricDescriptor(prefix + 'active_prefixes_count', 'Number of active prefixes (best route in RIB)', l);
const inputMessagesDesc = new MetricDescriptor(prefix + 'messages_input_count', 'Number of received messages', l);
const outputMessagesDesc = new MetricDescriptor(prefix + 'messages_output_count', 'Number of transmitted messages', l);
const flapsDesc = new MetricDescriptor(prefix + 'flap_count', 'Number of session flaps', l);

export class BgpCollector implements Collector<BgpSessionsDatasource> {
    public readonly name = 'bgp';

    public describe(): MetricDescriptor[] {
        return [
            upDesc,
            receivedPrefixesDesc,
            acceptedPrefixesDesc,
            rejectedPrefixesDesc,
            activePrefixesDesc,
            inputMessagesDesc,
            outputMessagesDesc,
            flapsDesc
        ];
    }

    public async collect(datasource: BgpSessionsDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const sessions = await datasource.bgpSessions();

        for (const s of sessions) {
            const lv = [...labelValues, s.asn, s.ip];
            sink(gauge(upDesc, boolToGauge(s.up), lv));
            sink(gauge(receivedPrefixesDesc, s.receivedPrefixes, lv));
            sink(gauge(acceptedPrefixesDesc, s.acceptedPrefixes, lv));
            sink(gauge(rejectedPrefixesDesc, s.rejectedPrefixes, lv));
            sink(gauge(activePrefixesDesc, s.activePrefixes, lv));
            sink(gauge(inputMessagesDesc, s.inputMessages, lv));
            sink(gauge(outputMessagesDesc, s.outputMessages, lv));
            sink(gauge(flapsDesc, s.flaps, lv));
        }
    }
}
