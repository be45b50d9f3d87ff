import { createConfig, type WakeProxyConfig } from './config/config.js';
import { Orchestrator, type ListenerFactory } from './core/Orchestrator.js';
import { globalMetrics, type MetricsRegistry } from './lib/metrics/MetricsRegistry.js';
import { ProcessCommandExecutor, type CommandExecutor } from './network/CommandExecutor.js';
import { IpOwnershipManager } from './network/IpOwnershipManager.js';
import { PingProbe } from './network/LivenessProbe.js';
import { createLogger, type Logger } from './utils/logger.js';
import { WakeTrigger, type DatagramSender } from './wake/WakeTrigger.js';

export interface WakeProxyDeps {
  executor?: CommandExecutor;
  sender?: DatagramSender;
  listeners?: ListenerFactory;
  logger?: Logger;
  metrics?: MetricsRegistry;
}

export interface WakeProxy {
  orchestrator: Orchestrator;
  address: IpOwnershipManager;
  waker: WakeTrigger;
}

/**
 * Wires the orchestrator to the system network tools.
 */
export function createWakeProxy(config: WakeProxyConfig, deps: WakeProxyDeps = {}): WakeProxy {
  const logger = deps.logger ?? createLogger('wol-proxy', { debug: config.debug });
  const metrics = deps.metrics ?? globalMetrics;
  const executor = deps.executor ?? new ProcessCommandExecutor();

  const address = new IpOwnershipManager(config.gameServerIp, {
    executor,
    prefixLength: config.netCidr,
    logger: logger.child('ip'),
  });
  const waker = new WakeTrigger({ port: config.wolPort, sender: deps.sender, logger: logger.child('wol'), metrics });
  // The probe must finish within one poll interval.
  const probe = new PingProbe(config.gameServerIp, executor, config.pingIntervalSec, logger.child('probe'));

  const orchestrator = new Orchestrator({
    config,
    address,
    probe,
    waker,
    listeners: deps.listeners,
    logger,
    metrics,
  });

  return { orchestrator, address, waker };
}

/**
 * Starts the wake-on-demand proxy.
 * @param config Optional configuration overrides
 * @returns The running orchestrator
 */
export function startWakeProxy(config?: Partial<WakeProxyConfig>, deps?: WakeProxyDeps): Orchestrator {
  const { orchestrator } = createWakeProxy(createConfig(config), deps);
  orchestrator.start();
  return orchestrator;
}
