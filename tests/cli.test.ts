/**
 * @vitest-environment node
 */
import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { DUMP_CHUNK_SIZE, createCLI } from '../src/cli-lib';
import { MemoryClient } from '../src/client';
import { TcpTransport } from '../src/transport';
import { ConfigurationError, ConnectionError } from '../src/errors';
import { quietLogger, startBridge, type Bridge } from './test-utils';

async function run(...args: string[]): Promise<void> {
    const cli = createCLI();
    cli.parse(['node', 'vmlink', ...args], { run: false });
    await cli.runMatchedCommand();
}

describe('CLI', () => {
    let bridge: Bridge | null = null;
    let log: MockInstance<typeof console.log>;

    beforeEach(() => {
        log = vi.spyOn(console, 'log').mockImplementation(() => { });
        vi.spyOn(console, 'info').mockImplementation(() => { });
    });

    afterEach(async () => {
        vi.restoreAllMocks();
        await bridge?.session.stop();
        bridge = null;
    });

    function tcp(port: number): string[] {
        return ['--transport', 'tcp', '--port', String(port)];
    }

    it('registers the bridge commands', () => {
        const names = createCLI().commands.map((c) => c.name);
        expect(names).toEqual(['serve', 'read', 'write', 'dump']);
    });

    it('prints its version', () => {
        createCLI().parse(['node', 'vmlink', '--version'], { run: false });
        expect(log).toHaveBeenCalledWith(expect.stringContaining('vmlink/0.1.0'));
    });

    it('writes and reads a 32-bit value', async () => {
        bridge = await startBridge();
        const port = bridge.transport.port;

        await run('write', '32', '0x1000', '0xdeadbeef', ...tcp(port));
        await run('read', '32', '0x1000', ...tcp(port));

        expect(bridge.machine.read32(0x1000)).toBe(0xdeadbeef);
        expect(log).toHaveBeenNthCalledWith(1, '0x00001000 <- 0xdeadbeef');
        expect(log).toHaveBeenNthCalledWith(2, '0x00001000: 0xdeadbeef');
    });

    it('handles 64-bit values', async () => {
        bridge = await startBridge();
        const port = bridge.transport.port;

        await run('write', '64', '0x40', '0x0102030405060708', ...tcp(port));
        await run('read', '64', '0x40', ...tcp(port));

        expect(bridge.machine.read64(0x40)).toBe(0x0102030405060708n);
        expect(log).toHaveBeenLastCalledWith('0x00000040: 0x0102030405060708');
    });

    it('dumps a range of memory', async () => {
        bridge = await startBridge();
        Array.from('Hello').forEach((ch, i) => bridge?.machine.write8(0x100 + i, ch.charCodeAt(0)));

        await run('dump', '0x100', '5', ...tcp(bridge.transport.port));

        expect(log).toHaveBeenCalledWith(`00000100  48 65 6c 6c 6f${' '.repeat(33)}  |Hello|`);
    });

    it('dumps a range larger than one request in several batches', async () => {
        bridge = await startBridge();
        const { machine } = bridge;
        machine.write8(0x1000, 0x41);
        machine.write8(0x1001, 0x42);
        machine.write8(0x1000 + DUMP_CHUNK_SIZE, 0x43);
        machine.write8(0x1000 + 19999, 0x5a);

        await run('dump', '0x1000', '20000', ...tcp(bridge.transport.port));

        const lines = String(log.mock.calls[0][0]).split('\n');
        expect(DUMP_CHUNK_SIZE).toBe(13106);
        expect(bridge.records).toHaveLength(2);
        expect(lines).toHaveLength(1250);
        expect(lines[0]).toBe(`00001000  41 42${' 00'.repeat(14)}  |AB${'.'.repeat(14)}|`);
        expect(lines[819]).toBe(`00004330  00 00 43${' 00'.repeat(13)}  |..C${'.'.repeat(13)}|`);
        expect(lines[1249]).toBe(`00005e10  ${'00 '.repeat(15)}5a  |${'.'.repeat(15)}Z|`);
    });

    it('rejects an unsupported width', async () => {
        await expect(run('read', '12', '0')).rejects.toThrow(ConfigurationError);
        await expect(run('read', '12', '0')).rejects.toThrow('width must be 8, 16, 32 or 64, got 12');
    });

    it('rejects a value that does not fit the width', async () => {
        await expect(run('write', '8', '0', '0x100', ...tcp(1))).rejects.toThrow('Value 256 does not fit in 1 byte(s)');
    });

    it('fails when no bridge is listening', async () => {
        bridge = await startBridge();
        const port = bridge.transport.port;
        await bridge.session.stop();

        await expect(run('read', '8', '0', ...tcp(port))).rejects.toThrow(ConnectionError);
    });

    it('serves an in-memory machine until interrupted', async () => {
        const serving = run('serve', '--memory-size', '4096', ...tcp(0));

        let port = 0;
        await vi.waitFor(() => {
            const line = log.mock.calls.map((call) => String(call[0])).find((l) => l.startsWith('vmlink listening on'));
            const match = line?.match(/tcp:\/\/127\.0\.0\.1:(\d+)$/);
            expect(match).toBeTruthy();
            port = Number(match?.[1]);
        });

        const client = new MemoryClient(new TcpTransport({ port }), {}, quietLogger());
        await client.write16(0x10, 0xbeef);
        expect(await client.read16(0x10)).toBe(0xbeef);

        process.emit('SIGINT', 'SIGINT');
        await serving;
        expect(log).toHaveBeenCalledWith('Received SIGINT, shutting down');
    });
});
