export type { EventSource } from './event-source.js';
export { ViemEventSource, createEvmPublicClient, isTransportError } from './viem-event-source.js';
