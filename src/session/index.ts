import type { VmLinkConfig } from '../config';
import { createTransport } from '../transport';
import type { MemoryAccess } from '../types';
import { Logger } from '../utils/Logger';
import { SessionLoop } from './SessionLoop';

export { SessionLoop, TRANSIENT_ACCEPT_ERRORS, isTransientAcceptError } from './SessionLoop';
export type { SessionConfig, SessionEvents } from './SessionLoop';

/**
 * Builds a session for a resolved configuration: picks the transport and
 * sets up a logger honouring `debug` and `logJson`.
 */
export function createSession(
    memory: MemoryAccess,
    config: VmLinkConfig,
    platform: NodeJS.Platform = process.platform
): SessionLoop {
    const log = new Logger('vmlink', config.debug);
    log.setJson(config.logJson);
    return new SessionLoop(memory, createTransport(config, platform), config, log.child('session'));
}
