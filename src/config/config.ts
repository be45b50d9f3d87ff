/**
 * Configuration for the wake-on-demand proxy.
 */
import { isIPv4 } from 'node:net';
import { isValidPrefixLength } from '../network/ipv4.js';
import { WOL_PORT } from '../wake/WakeTrigger.js';

export interface WakeProxyConfig {
  /** IPv4 address of the real game server; the proxy claims it while the server sleeps */
  gameServerIp: string;
  /** Hardware address woken over Wake-on-LAN */
  gameServerMac: string;
  /** Subnet prefix length; null detects it from the interface */
  netCidr: number | null;
  /** Minecraft TCP port */
  mcPort: number;
  /** Server-list MOTD while the server sleeps */
  mcMotdIdle: string;
  /** Server-list MOTD once a wake has been sent */
  mcMotdStarting: string;
  /** Version label shown beside the MOTD */
  mcVersionLabel: string;
  /** Disconnect reason shown to a player who tried to join */
  mcDisconnectMessage: string;
  /** UDP ports whose traffic counts as a discovery probe (Satisfactory server browser) */
  presencePorts: number[];
  /** Seconds between reachability probes */
  pingIntervalSec: number;
  /** Consecutive failed probes before the proxy takes over */
  pingFailThreshold: number;
  /** Destination port of magic packets */
  wolPort: number;
  /** Whether to enable debug logging */
  debug: boolean;
}

/**
 * Default configuration.
 */
export const defaultConfig: WakeProxyConfig = {
  gameServerIp: '',
  gameServerMac: '',
  netCidr: null,
  mcPort: 25565,
  mcMotdIdle: 'Join to start Server',
  mcMotdStarting: 'Starting...',
  mcVersionLabel: 'Offline',
  mcDisconnectMessage: 'Server is starting please try again in 60 seconds',
  presencePorts: [15000, 15777, 7777],
  pingIntervalSec: 3,
  pingFailThreshold: 10,
  wolPort: WOL_PORT,
  debug: false,
};

/**
 * Creates a configuration by merging user provided options with defaults.
 */
export function createConfig(overrides?: Partial<WakeProxyConfig>): WakeProxyConfig {
  return {
    ...defaultConfig,
    ...overrides,
  };
}

function isPort(value: unknown): boolean {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 && value <= 65535;
}

const MAC_ADDRESS = /^[0-9a-fA-F]{2}([:-][0-9a-fA-F]{2}){5}$/;

/**
 * Returns true, or a message naming every problem found.
 */
export function validateConfig(config: WakeProxyConfig): true | string {
  const problems: string[] = [];

  if (!isIPv4(config.gameServerIp)) {
    problems.push(`gameServerIp must be an IPv4 address (got '${config.gameServerIp}')`);
  }
  if (!MAC_ADDRESS.test(config.gameServerMac)) {
    problems.push(`gameServerMac must look like AA:BB:CC:DD:EE:FF (got '${config.gameServerMac}')`);
  }
  if (config.netCidr !== null && !isValidPrefixLength(config.netCidr)) {
    problems.push(`netCidr must be between 0 and 32 or null (got ${config.netCidr})`);
  }
  if (!isPort(config.mcPort)) {
    problems.push(`mcPort must be a port number (got ${config.mcPort})`);
  }
  if (!Array.isArray(config.presencePorts) || !config.presencePorts.every(isPort)) {
    problems.push('presencePorts must be a list of port numbers');
  } else {
    const repeated = config.presencePorts.filter((port, i, ports) => ports.indexOf(port) !== i);
    if (repeated.length > 0) {
      problems.push(`presencePorts must not repeat a port (got ${[...new Set(repeated)].join(', ')} more than once)`);
    }
  }
  if (!(config.pingIntervalSec > 0)) {
    problems.push(`pingIntervalSec must be positive (got ${config.pingIntervalSec})`);
  }
  if (!Number.isInteger(config.pingFailThreshold) || config.pingFailThreshold < 1) {
    problems.push(`pingFailThreshold must be an integer >= 1 (got ${config.pingFailThreshold})`);
  }
  if (!isPort(config.wolPort)) {
    problems.push(`wolPort must be a port number (got ${config.wolPort})`);
  }

  return problems.length === 0 ? true : problems.join('; ');
}
