import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import {
    configFromEnv,
    loadConfig,
    loadConfigFile,
    parseInteger,
    resolveConfig,
} from '../src/config';
import { ConfigurationError } from '../src/errors';

describe('Configuration', () => {
    let testDir: string;

    beforeEach(() => {
        testDir = fs.mkdtempSync(path.join(os.tmpdir(), 'vmlink-config-'));
    });

    afterEach(() => {
        fs.rmSync(testDir, { recursive: true, force: true });
    });

    function writeFile(name: string, content: string): string {
        const file = path.join(testDir, name);
        fs.writeFileSync(file, content);
        return file;
    }

    describe('resolveConfig', () => {
        it('fills in defaults for an empty object', () => {
            expect(resolveConfig({})).toEqual({
                transport: 'auto',
                host: '127.0.0.1',
                port: 28011,
                socketPath: path.join(os.tmpdir(), 'vmlink.sock'),
                maxRequestSize: 650000,
                maxReplySize: 450000,
                readTimeoutMs: 10000,
                requestTimeoutMs: 10000,
                backlog: 4096,
                debug: false,
                logJson: false,
            });
        });

        it('lists every invalid field', () => {
            expect(() => resolveConfig({ port: 70000, transport: 'pipe' })).toThrow(ConfigurationError);
            expect(() => resolveConfig({ port: 70000, transport: 'pipe' })).toThrow(/transport: .*port: /);
        });

        it('rejects unknown keys', () => {
            expect(() => resolveConfig({ prot: 1 })).toThrow(/\(root\): Unrecognized key/);
        });

        it('requires buffers large enough for one command', () => {
            expect(() => resolveConfig({ maxRequestSize: 4 })).toThrow(/maxRequestSize/);
            expect(() => resolveConfig({ maxReplySize: 0 })).toThrow(/maxReplySize/);
            expect(resolveConfig({ maxRequestSize: 5, maxReplySize: 1 })).toMatchObject({ maxRequestSize: 5, maxReplySize: 1 });
        });
    });

    describe('loadConfigFile', () => {
        it('reads YAML', () => {
            const file = writeFile('vmlink.yaml', 'transport: tcp\nport: 4000\ndebug: true\n');
            expect(loadConfigFile(file)).toEqual({ transport: 'tcp', port: 4000, debug: true });
        });

        it('reads JSON', () => {
            const file = writeFile('vmlink.json', '{"socketPath": "/run/vm.sock"}');
            expect(loadConfigFile(file)).toEqual({ socketPath: '/run/vm.sock' });
        });

        it('treats an empty file as no settings', () => {
            expect(loadConfigFile(writeFile('empty.yml', ''))).toEqual({});
        });

        it('rejects a file that is not a mapping', () => {
            const file = writeFile('list.yaml', '- 1\n- 2\n');
            expect(() => loadConfigFile(file)).toThrow(`Config file ${file} must contain a mapping`);
        });

        it('reports unreadable and malformed files', () => {
            expect(() => loadConfigFile(path.join(testDir, 'missing.yaml'))).toThrow(/Cannot read config file/);
            expect(() => loadConfigFile(writeFile('bad.json', '{'))).toThrow(/Cannot parse config file/);
        });
    });

    describe('configFromEnv', () => {
        it('maps VMLINK_* variables', () => {
            expect(configFromEnv({
                VMLINK_TRANSPORT: 'unix',
                VMLINK_HOST: 'localhost',
                VMLINK_PORT: '0x7000',
                VMLINK_SOCKET: '/tmp/test.sock',
                VMLINK_DEBUG: 'true',
            })).toEqual({
                transport: 'unix',
                host: 'localhost',
                port: 0x7000,
                socketPath: '/tmp/test.sock',
                debug: true,
            });
        });

        it('ignores unset variables', () => {
            expect(configFromEnv({})).toEqual({});
        });

        it('rejects a non-numeric port', () => {
            expect(() => configFromEnv({ VMLINK_PORT: 'http' })).toThrow('VMLINK_PORT must be an integer, got "http"');
        });
    });

    describe('loadConfig', () => {
        it('layers file, environment and overrides', () => {
            const file = writeFile('vmlink.yaml', 'port: 4000\nhost: 10.0.0.1\nbacklog: 16\n');

            const config = loadConfig({
                file,
                env: { VMLINK_PORT: '5000', VMLINK_HOST: 'localhost' },
                overrides: { port: 6000, host: undefined },
            });

            expect(config.port).toBe(6000);
            expect(config.host).toBe('localhost');
            expect(config.backlog).toBe(16);
        });

        it('uses defaults without any source', () => {
            expect(loadConfig({ env: {} }).port).toBe(28011);
        });
    });

    describe('parseInteger', () => {
        it('accepts decimal and hexadecimal', () => {
            expect(parseInteger('42', 'n')).toBe(42);
            expect(parseInteger(' 0x1F ', 'n')).toBe(31);
        });

        it('rejects anything else', () => {
            expect(() => parseInteger('-1', 'n')).toThrow(ConfigurationError);
            expect(() => parseInteger('1e3', 'n')).toThrow(ConfigurationError);
            expect(() => parseInteger('', 'n')).toThrow(ConfigurationError);
        });
    });
});
