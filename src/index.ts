export * from './config/config.js';
export * from './config/config-manager.js';
export * from './core/errors.js';
export * from './core/handshake.js';
export * from './core/packet.js';
export * from './core/varint.js';
export * from './core/types.js';
export * from './core/Orchestrator.js';
export * from './proxy.js';
export * from './transports/Transport.js';
export * from './transports/TcpTransport.js';
export * from './transports/UdpTransport.js';
export * from './protocols/Protocol.js';
export * from './protocols/MinecraftProtocol.js';
export * from './protocols/MinecraftSession.js';
export * from './listeners/MinecraftListener.js';
export * from './listeners/PresenceListener.js';
export * from './network/CommandExecutor.js';
export * from './network/IpOwnershipManager.js';
export * from './network/LivenessProbe.js';
export * from './network/ipv4.js';
export * from './wake/WakeTrigger.js';

export { MetricsRegistry, globalMetrics } from './lib/metrics/MetricsRegistry.js';
export type { MetricSnapshot, MetricType } from './lib/metrics/MetricsRegistry.js';
export { SerialQueue } from './lib/queue/SerialQueue.js';
export { createLogger, silentLogger } from './utils/logger.js';
export type { Logger, LoggerOptions } from './utils/logger.js';
