import { AlarmFilter } from '../src/client/AlarmFilter';
import { RpcClient } from '../src/client/RpcClient';
import { ConfigError, DecodeError, TransportError } from '../src/core/ExporterError';
import { FakeChannel, deviceReplies, fixture, silentLogger } from './helpers/FakeChannel';

function clientWith(overrides: Record<string, string | Error> = {}, alarmFilter?: string): { client: RpcClient; channel: FakeChannel } {
    const channel = new FakeChannel('edge-1', { ...deviceReplies(), ...overrides });
    return { client: new RpcClient(channel, { alarmFilter }), channel };
}

describe('RpcClient', () => {
    describe('commands', () => {
        it('appends the XML directive to every command', async () => {
            const { client, channel } = clientWith();

            await client.isisAdjacencies();

            expect(channel.commands).toEqual(['show isis adjacency | display xml']);
        });

        it('logs commands and replies in debug mode', async () => {
            const channel = new FakeChannel('edge-1', deviceReplies());
            const logger = silentLogger();
            const client = new RpcClient(channel, { debug: true, logger });

            await client.ospfAreas();

            expect(logger.debug).toHaveBeenCalledTimes(2);
            expect(logger.debug).toHaveBeenNthCalledWith(1, '[RpcClient] Running command on edge-1: show ospf3 overview | display xml');
        });
    });

    describe('alarmCounter', () => {
        it('counts Major as red and Minor as yellow across system and chassis alarms', async () => {
            const { client, channel } = clientWith();

            await expect(client.alarmCounter()).resolves.toEqual({ redCount: 2, yellowCount: 1 });
            expect(channel.commands).toEqual([
                'show system alarms | display xml',
                'show chassis alarms | display xml'
            ]);
        });

        it('skips alarms whose description matches the filter', async () => {
            const { client } = clientWith({}, 'Management Ethernet');

            await expect(client.alarmCounter()).resolves.toEqual({ redCount: 1, yellowCount: 1 });
        });

        it('skips alarms whose type matches the filter', async () => {
            const { client } = clientWith({}, '^Boot$');

            await expect(client.alarmCounter()).resolves.toEqual({ redCount: 2, yellowCount: 0 });
        });

        it('accepts a precompiled filter', async () => {
            const channel = new FakeChannel('edge-1', deviceReplies());
            const client = new RpcClient(channel, { alarmFilter: AlarmFilter.compile('Rescue|Autorecovery') });

            await expect(client.alarmCounter()).resolves.toEqual({ redCount: 1, yellowCount: 0 });
        });

        it('reports zero when there are no active alarms', async () => {
            const { client } = clientWith({
                'show system alarms': fixture('no-alarms.xml'),
                'show chassis alarms': fixture('no-alarms.xml')
            });

            await expect(client.alarmCounter()).resolves.toEqual({ redCount: 0, yellowCount: 0 });
        });

        it('rejects an invalid filter pattern at construction', () => {
            const channel = new FakeChannel('edge-1', deviceReplies());

            expect(() => new RpcClient(channel, { alarmFilter: '(' })).toThrow(ConfigError);
        });
    });

    describe('interfaceStats', () => {
        it('lists each physical interface followed by its logical interfaces', async () => {
            const { client } = clientWith();

            const stats = await client.interfaceStats();

            expect(stats.map(s => s.name)).toEqual(['ge-0/0/0', 'ge-0/0/0.0', 'ge-0/0/1']);
            expect(stats[0]).toEqual({
                isPhysical: true,
                name: 'ge-0/0/0',
                description: 'uplink-core',
                mac: '00:11:22:33:44:55',
                adminStatus: true,
                operStatus: true,
                errorStatus: false,
                receiveBytes: 1000,
                receiveErrors: 3,
                receiveDrops: 4,
                transmitBytes: 2000,
                transmitErrors: 5,
                transmitDrops: 6
            });
        });

        it('gives logical interfaces the parent address and byte counters only', async () => {
            const { client } = clientWith();

            const [, logical] = await client.interfaceStats();

            expect(logical).toEqual({
                isPhysical: false,
                name: 'ge-0/0/0.0',
                description: 'transit',
                mac: '00:11:22:33:44:55',
                adminStatus: false,
                operStatus: false,
                errorStatus: false,
                receiveBytes: 700,
                receiveErrors: 0,
                receiveDrops: 0,
                transmitBytes: 800,
                transmitErrors: 0,
                transmitDrops: 0
            });
        });

        it('flags an error status when admin and oper status differ', async () => {
            const { client } = clientWith();

            const stats = await client.interfaceStats();

            expect(stats[2]).toMatchObject({
                description: '',
                adminStatus: true,
                operStatus: false,
                errorStatus: true,
                receiveErrors: 0,
                transmitDrops: 0
            });
        });
    });

    describe('interfaceStats error status', () => {
        it('is false when admin and oper are both not up, even if spelled differently', async () => {
            const reply =
                '<rpc-reply><interface-information><physical-interface>' +
                '<name>ge-0/0/5</name><admin-status>down</admin-status><oper-status>lowerlayerdown</oper-status>' +
                '</physical-interface></interface-information></rpc-reply>';
            const { client } = clientWith({ 'show interfaces statistics detail': reply });

            const [stats] = await client.interfaceStats();

            expect(stats).toMatchObject({ adminStatus: false, operStatus: false, errorStatus: false });
        });
    });

    describe('bgpSessions', () => {
        it('maps peers using the first RIB for prefix counters', async () => {
            const { client } = clientWith();

            const sessions = await client.bgpSessions();

            expect(sessions).toEqual([
                {
                    ip: '192.0.2.1',
                    up: true,
                    asn: '64512',
                    flaps: 2,
                    inputMessages: 100,
                    outputMessages: 90,
                    acceptedPrefixes: 10,
                    activePrefixes: 8,
                    receivedPrefixes: 12,
                    rejectedPrefixes: 1
                },
                {
                    ip: '192.0.2.2',
                    up: false,
                    asn: '64513',
                    flaps: 5,
                    inputMessages: 0,
                    outputMessages: 0,
                    acceptedPrefixes: 0,
                    activePrefixes: 0,
                    receivedPrefixes: 0,
                    rejectedPrefixes: 0
                }
            ]);
        });
    });

    describe('ospfAreas', () => {
        it('reports the up neighbor count per area', async () => {
            const { client } = clientWith();

            await expect(client.ospfAreas()).resolves.toEqual([
                { name: '0.0.0.0', neighbors: 3 },
                { name: '0.0.0.1', neighbors: 0 }
            ]);
        });
    });

    describe('isisAdjacencies', () => {
        it('counts adjacencies in state Up against the total', async () => {
            const { client } = clientWith();

            await expect(client.isisAdjacencies()).resolves.toEqual({ up: 2, total: 3 });
        });
    });

    describe('routingTables', () => {
        it('keeps tables and protocols in device order', async () => {
            const { client } = clientWith();

            const tables = await client.routingTables();

            expect(tables).toEqual([
                {
                    name: 'inet.0',
                    maxRoutes: 20,
                    activeRoutes: 18,
                    totalRoutes: 25,
                    protocols: [
                        { name: 'Direct', routes: 4, activeRoutes: 4 },
                        { name: 'Local', routes: 4, activeRoutes: 4 },
                        { name: 'BGP', routes: 17, activeRoutes: 10 }
                    ]
                },
                {
                    name: 'inet6.0',
                    maxRoutes: 3,
                    activeRoutes: 3,
                    totalRoutes: 3,
                    protocols: [{ name: 'Direct', routes: 3, activeRoutes: 3 }]
                }
            ]);
        });
    });

    describe('routeEngineStats', () => {
        it('reads the first routing engine and its celsius attributes', async () => {
            const { client } = clientWith();

            await expect(client.routeEngineStats()).resolves.toEqual({
                temperature: 39,
                cpuTemperature: 45,
                memoryUtilization: 34,
                cpuUser: 5,
                cpuBackground: 0,
                cpuSystem: 3,
                cpuInterrupt: 1,
                cpuIdle: 91,
                loadAverageOne: 0.12,
                loadAverageFive: 0.25,
                loadAverageFifteen: 0.3
            });
        });

        it('fails to decode a reply without any routing engine', async () => {
            const { client } = clientWith({
                'show chassis routing-engine': '<rpc-reply><route-engine-information></route-engine-information></rpc-reply>'
            });

            const error = await client.routeEngineStats().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ issues: ['route-engine: expected at least one route-engine'] });
        });
    });

    describe('environmentItems', () => {
        it('keeps items with a temperature, one per name, the later reading winning', async () => {
            const { client } = clientWith();

            await expect(client.environmentItems()).resolves.toEqual([
                { name: 'Routing Engine 0', temperature: 41 },
                { name: 'FPC 0 CPU', temperature: 50 }
            ]);
        });
    });

    describe('interfaceDiagnostics', () => {
        it('skips only interfaces reporting N/A', async () => {
            const { client } = clientWith();

            const diagnostics = await client.interfaceDiagnostics();

            expect(diagnostics.map(d => d.name)).toEqual(['xe-0/0/0', 'xe-0/0/1', 'ge-0/0/3']);
        });

        it('reports an interface without a diagnostics block as zeros on the laser branch', async () => {
            const { client } = clientWith();

            const diagnostics = await client.interfaceDiagnostics();

            expect(diagnostics[2]).toEqual({
                name: 'ge-0/0/3',
                laserBiasCurrent: 0,
                laserOutputPower: 0,
                laserOutputPowerDbm: 0,
                moduleTemperature: 0,
                rxSource: 'laser',
                moduleVoltage: 0,
                rxSignalAvgOpticalPower: 0,
                rxSignalAvgOpticalPowerDbm: 0,
                laserRxOpticalPower: 0,
                laserRxOpticalPowerDbm: 0
            });
        });

        it('accepts infinite dBm spellings', async () => {
            const reply =
                '<rpc-reply><interface-information><physical-interface><name>xe-0/0/4</name><optics-diagnostics>' +
                '<laser-output-power-dbm>-Inf</laser-output-power-dbm>' +
                '<laser-rx-optical-power-dbm>- Inf</laser-rx-optical-power-dbm>' +
                '</optics-diagnostics></physical-interface></interface-information></rpc-reply>';
            const { client } = clientWith({ 'show interfaces diagnostics optics': reply });

            const [diag] = await client.interfaceDiagnostics();

            expect(diag.laserOutputPowerDbm).toBe(-Infinity);
            expect(diag.laserRxOpticalPowerDbm).toBe(0);
        });

        it('uses the average receive power when the module reports a voltage', async () => {
            const { client } = clientWith();

            const [average] = await client.interfaceDiagnostics();

            expect(average).toEqual({
                name: 'xe-0/0/0',
                laserBiasCurrent: 6.5,
                laserOutputPower: 0.55,
                laserOutputPowerDbm: -2.6,
                moduleTemperature: 35,
                rxSource: 'average',
                moduleVoltage: 3.3,
                rxSignalAvgOpticalPower: 0.45,
                rxSignalAvgOpticalPowerDbm: -3.47,
                laserRxOpticalPower: 0,
                laserRxOpticalPowerDbm: 0
            });
        });

        it('uses the laser receive power otherwise, reading unparsable dBm as 0', async () => {
            const { client } = clientWith();

            const [, laser] = await client.interfaceDiagnostics();

            expect(laser).toEqual({
                name: 'xe-0/0/1',
                laserBiasCurrent: 5,
                laserOutputPower: 0,
                laserOutputPowerDbm: 0,
                moduleTemperature: 30,
                rxSource: 'laser',
                moduleVoltage: 0,
                rxSignalAvgOpticalPower: 0,
                rxSignalAvgOpticalPowerDbm: 0,
                laserRxOpticalPower: 0.3,
                laserRxOpticalPowerDbm: -5.23
            });
        });
    });

    describe('failures', () => {
        it('wraps channel failures in a TransportError carrying host and command', async () => {
            const { client } = clientWith({ 'show bgp summary': new Error('connection reset') });

            const error = await client.bgpSessions().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(TransportError);
            expect(error).toMatchObject({
                host: 'edge-1',
                command: 'show bgp summary | display xml',
                message: 'Transport [edge-1] (show bgp summary | display xml) -> connection reset'
            });
        });

        it('passes TransportErrors from the channel through unchanged', async () => {
            const original = new TransportError('edge-1', 'Command timed out after 30 seconds', 'show bgp summary | display xml');
            const { client } = clientWith({ 'show bgp summary': original });

            await expect(client.bgpSessions()).rejects.toBe(original);
        });

        it('rejects malformed XML with a DecodeError', async () => {
            const { client } = clientWith({ 'show bgp summary': '<rpc-reply><bgp-information>' });

            const error = await client.bgpSessions().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ command: 'show bgp summary | display xml' });
        });

        it('rejects a reply without the information element', async () => {
            const { client } = clientWith({ 'show bgp summary': '<rpc-reply></rpc-reply>' });

            const error = await client.bgpSessions().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ issues: ['<root>: missing <rpc-reply/bgp-information> element'] });
        });

        it('rejects non-numeric counters instead of returning partial records', async () => {
            const reply =
                '<rpc-reply><bgp-information><bgp-peer>' +
                '<peer-address>192.0.2.1</peer-address><flap-count>many</flap-count>' +
                '</bgp-peer></bgp-information></rpc-reply>';
            const { client } = clientWith({ 'show bgp summary': reply });

            const error = await client.bgpSessions().catch((e: unknown) => e);

            expect(error).toBeInstanceOf(DecodeError);
            expect(error).toMatchObject({ issues: ['bgp-peer/0/flap-count: expected a number'] });
        });
    });
});
