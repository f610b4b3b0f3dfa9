import cac from 'cac';
import type { CAC } from 'cac';
import { version } from '../package.json';
import { MemoryClient, RequestBuilder } from './client';
import type { WireValue } from './codec';
import { loadConfig, parseInteger, type VmLinkConfig } from './config';
import { formatAddress, formatValue, hexDump } from './debug';
import { ConfigurationError } from './errors';
import { DEFAULT_MACHINE_SIZE, InMemoryMachine } from './memory/InMemoryMachine';
import { CONSTANTS, bitsToBytes, isBitWidth, type ByteWidth } from './protocol';
import { createSession } from './session';
import { createTransport } from './transport';

/** Reads per `dump` request, so that each batch fits the bridge's single read. */
export const DUMP_CHUNK_SIZE = Math.min(
    CONSTANTS.MAX_BATCH_COUNT,
    Math.floor((CONSTANTS.MAX_SINGLE_READ - CONSTANTS.BATCH_HEADER_SIZE) / CONSTANTS.COMMAND_HEADER_SIZE)
);

/** Option and argument values arrive as strings, or as numbers when they look numeric. */
type Positional = string | number;

interface EndpointOptions {
    config?: string;
    transport?: string;
    host?: string;
    port?: Positional;
    socket?: string;
    debug?: boolean;
}

interface ServeOptions extends EndpointOptions {
    memorySize?: Positional;
}

/**
 * Builds the `vmlink` command line. Parsing and running are left to the
 * caller so tests can drive it with their own argv.
 */
export function createCLI(): CAC {
    const cli = cac('vmlink');

    cli
        .command('serve', 'Serve an in-memory machine over the bridge protocol')
        .option('--memory-size <bytes>', 'Size of the in-memory address space', { default: DEFAULT_MACHINE_SIZE })
        .option('--config <file>', 'YAML or JSON configuration file')
        .option('--transport <kind>', 'auto, tcp or unix')
        .option('--host <host>', 'TCP host')
        .option('--port <port>', 'TCP port')
        .option('--socket <path>', 'Unix socket path')
        .option('--debug', 'Log every request')
        .action(async (options: ServeOptions) => {
            const config = resolveCliConfig(options);
            const machine = new InMemoryMachine({ size: toInteger(options.memorySize ?? DEFAULT_MACHINE_SIZE, 'memory size') });
            const session = createSession(machine, config);

            await session.start();
            console.log(`vmlink listening on ${session.endpoint}`);

            await new Promise<void>((resolve) => {
                const onSignal = (signal: NodeJS.Signals) => {
                    process.off('SIGINT', onSignal);
                    process.off('SIGTERM', onSignal);
                    console.log(`Received ${signal}, shutting down`);
                    resolve();
                };
                process.on('SIGINT', onSignal);
                process.on('SIGTERM', onSignal);
            });
            await session.stop();
        });

    withEndpointOptions(
        cli.command('read <width> <address>', 'Read an 8, 16, 32 or 64-bit value')
    ).action(async (width: Positional, address: Positional, options: EndpointOptions) => {
        const bytes = toByteWidth(width);
        const addr = toInteger(address, 'address');
        const [value] = await clientFor(options).execute(new RequestBuilder().read(bytes, addr));
        console.log(`${formatAddress(addr)}: ${formatValue(value, bytes)}`);
    });

    withEndpointOptions(
        cli.command('write <width> <address> <value>', 'Write an 8, 16, 32 or 64-bit value')
    ).action(async (width: Positional, address: Positional, value: Positional, options: EndpointOptions) => {
        const bytes = toByteWidth(width);
        const addr = toInteger(address, 'address');
        const parsed = toWireValue(value, bytes);
        await clientFor(options).execute(new RequestBuilder().write(bytes, addr, parsed));
        console.log(`${formatAddress(addr)} <- ${formatValue(parsed, bytes)}`);
    });

    withEndpointOptions(
        cli.command('dump <address> <length>', 'Hex dump a range of memory')
    ).action(async (address: Positional, length: Positional, options: EndpointOptions) => {
        const start = toInteger(address, 'address');
        const count = toInteger(length, 'length');
        const client = clientFor(options);

        const data = new Uint8Array(count);
        for (let offset = 0; offset < count; offset += DUMP_CHUNK_SIZE) {
            const chunk = Math.min(DUMP_CHUNK_SIZE, count - offset);
            const builder = new RequestBuilder();
            for (let i = 0; i < chunk; i++) {
                builder.read8(start + offset + i);
            }
            const values = await client.execute(builder);
            values.forEach((v, i) => { data[offset + i] = Number(v); });
        }
        console.log(hexDump(data, 16, start));
    });

    cli.help();
    cli.version(version);
    return cli;
}

function withEndpointOptions(command: ReturnType<CAC['command']>): ReturnType<CAC['command']> {
    return command
        .option('--config <file>', 'YAML or JSON configuration file')
        .option('--transport <kind>', 'auto, tcp or unix')
        .option('--host <host>', 'TCP host')
        .option('--port <port>', 'TCP port')
        .option('--socket <path>', 'Unix socket path')
        .option('--debug', 'Log every exchange');
}

function resolveCliConfig(options: EndpointOptions): VmLinkConfig {
    return loadConfig({
        file: options.config,
        overrides: {
            transport: options.transport,
            host: options.host,
            port: options.port === undefined ? undefined : toInteger(options.port, 'port'),
            socketPath: options.socket,
            debug: options.debug,
        },
    });
}

function clientFor(options: EndpointOptions): MemoryClient {
    const config = resolveCliConfig(options);
    return new MemoryClient(createTransport(config), config);
}

function toInteger(raw: Positional, what: string): number {
    if (typeof raw === 'number') {
        if (!Number.isSafeInteger(raw) || raw < 0) {
            throw new ConfigurationError(`${what} must be a non-negative integer, got ${raw}`);
        }
        return raw;
    }
    return parseInteger(raw, what);
}

function toByteWidth(raw: Positional): ByteWidth {
    const bits = toInteger(raw, 'width');
    if (!isBitWidth(bits)) {
        throw new ConfigurationError(`width must be 8, 16, 32 or 64, got ${raw}`);
    }
    return bitsToBytes(bits);
}

function toWireValue(raw: Positional, width: ByteWidth): WireValue {
    if (width !== 8) {
        return toInteger(raw, 'value');
    }
    const text = String(raw).trim();
    if (!/^(0x[0-9a-f]+|\d+)$/i.test(text)) {
        throw new ConfigurationError(`value must be an integer, got "${raw}"`);
    }
    return BigInt(text);
}
