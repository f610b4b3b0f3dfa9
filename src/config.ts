import fs from 'fs';
import path from 'path';
import * as yaml from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import { CONSTANTS } from './protocol';
import { defaultSocketPath } from './transport/UnixSocketTransport';

/**
 * Zod schema for the bridge configuration. Every field has a default, so an
 * empty object is a valid configuration.
 */
export const ConfigSchema = z.object({
    transport: z.enum(['auto', 'tcp', 'unix']).default('auto'),
    host: z.string().min(1).default(CONSTANTS.DEFAULT_HOST),
    port: z.number().int().min(0).max(65535).default(CONSTANTS.DEFAULT_PORT),
    socketPath: z.string().min(1).default(defaultSocketPath),
    // A request must at least hold one opcode and its address.
    maxRequestSize: z.number().int().min(CONSTANTS.COMMAND_HEADER_SIZE).default(CONSTANTS.MAX_REQUEST_SIZE),
    maxReplySize: z.number().int().min(CONSTANTS.STATUS_SIZE).default(CONSTANTS.MAX_REPLY_SIZE),
    readTimeoutMs: z.number().int().positive().default(CONSTANTS.READ_TIMEOUT_MS),
    requestTimeoutMs: z.number().int().positive().default(CONSTANTS.READ_TIMEOUT_MS),
    backlog: z.number().int().positive().default(CONSTANTS.DEFAULT_BACKLOG),
    debug: z.boolean().default(false),
    logJson: z.boolean().default(false),
}).strict();

export type VmLinkConfig = z.infer<typeof ConfigSchema>;
export type VmLinkConfigInput = z.input<typeof ConfigSchema>;

/**
 * Validates a partial configuration and fills in defaults.
 *
 * @throws {ConfigurationError} listing every invalid field
 */
export function resolveConfig(input: unknown = {}): VmLinkConfig {
    const result = ConfigSchema.safeParse(input);
    if (!result.success) {
        const errorMessages = result.error.issues
            .map(e => `${e.path.length > 0 ? e.path.join('.') : '(root)'}: ${e.message}`)
            .join(', ');
        throw new ConfigurationError(`Invalid configuration: ${errorMessages}`);
    }
    return result.data;
}

/**
 * Reads a configuration file. `.yaml`/`.yml` are parsed as YAML, `.json` as
 * JSON; other extensions are tried as YAML, which also accepts JSON.
 * The result is not validated yet; pass it through `resolveConfig`.
 */
export function loadConfigFile(filePath: string): Record<string, unknown> {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf8');
    } catch (error) {
        throw new ConfigurationError(
            `Cannot read config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    let parsed: unknown;
    try {
        parsed = path.extname(filePath).toLowerCase() === '.json'
            ? JSON.parse(content)
            : yaml.parse(content);
    } catch (error) {
        throw new ConfigurationError(
            `Cannot parse config file ${filePath}: ${error instanceof Error ? error.message : String(error)}`
        );
    }

    if (parsed === null || parsed === undefined) {
        return {};
    }
    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config file ${filePath} must contain a mapping`);
    }
    return parsed;
}

/**
 * Reads `VMLINK_*` overrides from the environment.
 */
export function configFromEnv(env: NodeJS.ProcessEnv = process.env): Record<string, unknown> {
    const out: Record<string, unknown> = {};
    if (env.VMLINK_TRANSPORT) out.transport = env.VMLINK_TRANSPORT;
    if (env.VMLINK_HOST) out.host = env.VMLINK_HOST;
    if (env.VMLINK_PORT) out.port = parseInteger(env.VMLINK_PORT, 'VMLINK_PORT');
    if (env.VMLINK_SOCKET) out.socketPath = env.VMLINK_SOCKET;
    if (env.VMLINK_DEBUG) out.debug = env.VMLINK_DEBUG === '1' || env.VMLINK_DEBUG.toLowerCase() === 'true';
    return out;
}

export interface LoadConfigOptions {
    file?: string;
    env?: NodeJS.ProcessEnv;
    overrides?: Record<string, unknown>;
}

/**
 * Builds the effective configuration: defaults < file < environment <
 * explicit overrides. Overrides set to `undefined` are ignored.
 */
export function loadConfig(options: LoadConfigOptions = {}): VmLinkConfig {
    const merged: Record<string, unknown> = {
        ...(options.file ? loadConfigFile(options.file) : {}),
        ...configFromEnv(options.env ?? process.env),
    };
    for (const [key, value] of Object.entries(options.overrides ?? {})) {
        if (value !== undefined) {
            merged[key] = value;
        }
    }
    return resolveConfig(merged);
}

/**
 * Parses decimal or `0x`-prefixed hexadecimal integers.
 */
export function parseInteger(raw: string, what: string): number {
    const text = raw.trim();
    const value = /^0x[0-9a-f]+$/i.test(text)
        ? parseInt(text.slice(2), 16)
        : /^\d+$/.test(text) ? parseInt(text, 10) : NaN;
    if (!Number.isSafeInteger(value)) {
        throw new ConfigurationError(`${what} must be an integer, got "${raw}"`);
    }
    return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}
