import { Collector, MetricDescriptor, MetricSink, gauge } from './Collector';

const prefix = 'junos_interface_diagnostics_';

/**
 * Which receive power reading a transceiver reports. Modules that report a
 * supply voltage report the average RX signal power, the others the laser RX
 * power; the fields of the other reading stay at 0.
 */
export type RxPowerSource = 'average' | 'laser';

/**
 * Optical transceiver health of one interface.
 */
export interface InterfaceDiagnostics {
    readonly name: string;
    readonly laserBiasCurrent: number;
    readonly laserOutputPower: number;
    /** 0 when the device prints a non-numeric value */
    readonly laserOutputPowerDbm: number;
    readonly moduleTemperature: number;
    readonly rxSource: RxPowerSource;
    readonly moduleVoltage: number;
    readonly rxSignalAvgOpticalPower: number;
    readonly rxSignalAvgOpticalPowerDbm: number;
    readonly laserRxOpticalPower: number;
    readonly laserRxOpticalPowerDbm: number;
}

export interface InterfaceDiagnosticsDatasource {
    interfaceDiagnostics(): Promise<InterfaceDiagnostics[]>;
}

const l = ['target', 'name'];

const laserBiasCurrentDesc = new MetricDescriptor(prefix + 'laser_bias', 'Laser bias current (mA)', l);
const laserOutputPowerDesc = new MetricDescriptor(prefix + 'laser_output', 'Laser output power (mW)', l);
const laserOutputPowerDbmDesc = new MetricDescriptor(prefix + 'laser_output_dbm', 'Laser output power (dBm)', l);
const moduleTemperatureDesc = new MetricDescriptor(prefix + 'temp', 'Module temperature (degrees C)', l);
const moduleVoltageDesc = new MetricDescriptor(prefix + 'voltage', 'Module supply voltage (V)', l);
const rxSignalAvgOpticalPowerDesc = new MetricDescriptor(prefix + 'rx_signal_avg', 'Receiver signal average optical power (mW)', l);
const rxSignalAvgOpticalPowerDbmDesc = new MetricDescriptor(prefix + 'rx_signal_avg_dbm', 'Receiver signal average optical power (dBm)', l);
const laserRxOpticalPowerDesc = new MetricDescriptor(prefix + 'laser_rx', 'Laser receiver optical power (mW)', l);
const laserRxOpticalPowerDbmDesc = new MetricDescriptor(prefix + 'laser_rx_dbm', 'Laser receiver optical power (dBm)', l);

export class InterfaceDiagnosticsCollector implements Collector<InterfaceDiagnosticsDatasource> {
    public readonly name = 'interface_diagnostics';

    public describe(): MetricDescriptor[] {
        return [
            laserBiasCurrentDesc,
            laserOutputPowerDesc,
            laserOutputPowerDbmDesc,
            moduleTemperatureDesc,
            moduleVoltageDesc,
            rxSignalAvgOpticalPowerDesc,
            rxSignalAvgOpticalPowerDbmDesc,
            laserRxOpticalPowerDesc,
            laserRxOpticalPowerDbmDesc
        ];
    }

    public async collect(datasource: InterfaceDiagnosticsDatasource, sink: MetricSink, labelValues: readonly string[]): Promise<void> {
        const diagnostics = await datasource.interfaceDiagnostics();

        for (const d of diagnostics) {
            const lv = [...labelValues, d.name];
            sink(gauge(laserBiasCurrentDesc, d.laserBiasCurrent, lv));
            sink(gauge(laserOutputPowerDesc, d.laserOutputPower, lv));
            sink(gauge(laserOutputPowerDbmDesc, d.laserOutputPowerDbm, lv));
            sink(gauge(moduleTemperatureDesc, d.moduleTemperature, lv));

            if (d.rxSource === 'average') {
                sink(gauge(moduleVoltageDesc, d.moduleVoltage, lv));
                sink(gauge(rxSignalAvgOpticalPowerDesc, d.rxSignalAvgOpticalPower, lv));
                sink(gauge(rxSignalAvgOpticalPowerDbmDesc, d.rxSignalAvgOpticalPowerDbm, lv));
            } else {
                sink(gauge(laserRxOpticalPowerDesc, d.laserRxOpticalPower, lv));
                sink(gauge(laserRxOpticalPowerDbmDesc, d.laserRxOpticalPowerDbm, lv));
            }
        }
    }
}
