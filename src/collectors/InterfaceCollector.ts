import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';
import { boolToGauge } from '../utils/Helpers';

const prefix = 'junos_interface_';

/**
 * Counters and status of one interface. Logical (sub-)interfaces only carry
 * name, description, hardware address and byte counters; their status and
 * error fields stay at their defaults.
 */
export interface InterfaceStats {
    readonly name: string;
    readonly description: string;
    readonly mac: string;
    readonly isPhysical: boolean;
    readonly adminStatus: boolean;
    readonly operStatus: boolean;
    readonly errorStatus: boolean;
    readonly receiveBytes: number;
    readonly receiveErrors: number;
    readonly receiveDrops: number;
    readonly transmitBytes: number;
    readonly transmitErrors: number;
    readonly transmitDrops: number;
}

export interface InterfaceStatsDatasource {
    interfaceStats(): Promise<InterfaceStats[]>;
}

const l = ['target', 'name', 'description', 'mac'];

const receiveBytesDesc = new MetricDescriptor(prefix + 'receive_bytes', 'Received data in bytes', l);
const receiveErrorsDesc = new MetricDescriptor(prefix + 'receive_errors', 'Number of errors caused by incoming packets', l);
const receiveDropsDesc = new MetricDescriptor(prefix + 'receive_drops', 'Number of dropped incoming packets', l);
const transmitBytesDesc = new MetricDescriptor(prefix + 'transmit_bytes', 'Transmitted data in bytes', l);
const transmitErrorsDesc = new MetricDescriptor(prefix + 'transmit_errors', 'Number of errors caused by outgoing packets', l);
const transmitDropsDesc = new MetricDescriptor(prefix + 'transmit_drops', 'Number of dropped outgoing packets', l);
const adminStatusDesc = new MetricDescriptor(prefix + 'admin_up', 'Admin operational status', l);
const operStatusDesc = new MetricDescriptor(prefix + 'up', 'Interface operational status', l);
const errorStatusDesc = new MetricDescriptor(prefix + 'error_status', 'Admin and operational status differ', l);

export class InterfaceCollector implements Collector<InterfaceStatsDatasource> {
    public readonly name = 'interfaces';

    public describe(): MetricDescriptor[] {
        return [
            receiveBytesDesc,
            receiveErrorsDesc,
            receiveDropsDesc,
            transmitBytesDesc,
            transmitDropsDesc,
            transmitErrorsDesc,
            adminStatusDesc,
            operStatusDesc,
            errorStatusDesc
        ];
    }

    public async collect(datasource: InterfaceStatsDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const stats = await datasource.interfaceStats();

        for (const s of stats) {
            this.collectForInterface(s, sink, labelValues);
        }
    }

    private collectForInterface(s: InterfaceStats, sink: MetricSink, labelValues: readonly string[]): void {
        const lv = [...labelValues, s.name, s.description, s.mac];
        sink(gauge(receiveBytesDesc, s.receiveBytes, lv));
        sink(gauge(transmitBytesDesc, s.transmitBytes, lv));

        if (s.isPhysical) {
            sink(gauge(adminStatusDesc, boolToGauge(s.adminStatus), lv));
            sink(gauge(operStatusDesc, boolToGauge(s.operStatus), lv));
            sink(gauge(errorStatusDesc, boolToGauge(s.errorStatus), lv));
            sink(gauge(transmitErrorsDesc, s.transmitErrors, lv));
            sink(gauge(transmitDropsDesc, s.transmitDrops, lv));
            sink(gauge(receiveErrorsDesc, s.receiveErrors, lv));
            sink(gauge(receiveDropsDesc, s.receiveDrops, lv));
        }
    }
}
