export { MemoryClient } from './MemoryClient';
export type { MemoryClientConfig } from './MemoryClient';
export { RequestBuilder, parseReply } from './RequestBuilder';
