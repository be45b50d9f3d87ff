#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';
import { defaultConfig, validateConfig, type WakeProxyConfig } from '../config/config.js';
import { ConfigManager } from '../config/config-manager.js';
import { errorMessage } from '../core/errors.js';
import { globalMetrics } from '../lib/metrics/MetricsRegistry.js';
import { createWakeProxy } from '../proxy.js';
import { createLogger } from '../utils/logger.js';

const DEFAULT_CONFIG_FILE = process.env.WOL_PROXY_CONFIG || 'wol-proxy.yaml';
const CONFIG_RETRY_MS = 5000;

type GlobalOptions = {
    config: string;
    debug?: boolean;
};

const program = new Command()
    .name('wol-proxy')
    .description('Stands in for a sleeping game server and wakes it over Wake-on-LAN')
    .option('-c, --config <path>', 'YAML configuration file', DEFAULT_CONFIG_FILE)
    .option('-d, --debug', 'verbose logging');

function configManager(options: GlobalOptions): ConfigManager<WakeProxyConfig> {
    return new ConfigManager({
        fileName: options.config,
        defaultConfig,
        validator: validateConfig,
        logger: createLogger('config', { debug: options.debug }),
    });
}

function withDebug(config: WakeProxyConfig, options: GlobalOptions): WakeProxyConfig {
    return options.debug ? { ...config, debug: true } : config;
}

program
    .command('run', { isDefault: true })
    .description('run the proxy until interrupted')
    .action(async () => {
        const options = program.opts<GlobalOptions>();
        const log = createLogger('wol-proxy', { debug: options.debug });
        const shutdown = new AbortController();

        let config: WakeProxyConfig;
        const onEarlySignal = () => shutdown.abort();
        process.once('SIGINT', onEarlySignal);
        process.once('SIGTERM', onEarlySignal);
        try {
            config = withDebug(await configManager(options).waitUntilValid(CONFIG_RETRY_MS, shutdown.signal), options);
        } catch (error) {
            if (shutdown.signal.aborted) return;
            throw error;
        } finally {
            process.off('SIGINT', onEarlySignal);
            process.off('SIGTERM', onEarlySignal);
        }

        log.info('--- Wake-on-LAN game proxy ---');
        const { orchestrator } = createWakeProxy(config);
        orchestrator.start();

        const stop = async (signal: NodeJS.Signals) => {
            log.info(`Received ${signal}, releasing ${config.gameServerIp}`);
            try {
                await orchestrator.stop();
            } catch (error) {
                log.error(`Shutdown failed: ${errorMessage(error)}`);
                process.exitCode = 1;
            }
            for (const line of globalMetrics.summary()) {
                log.info(line);
            }
        };
        process.once('SIGINT', (signal) => void stop(signal));
        process.once('SIGTERM', (signal) => void stop(signal));
    });

program
    .command('detect')
    .description('print the interface, prefix length and broadcast addresses for the target')
    .action(async () => {
        const options = program.opts<GlobalOptions>();
        const config = withDebug(await configManager(options).load(), options);
        const { address } = createWakeProxy(config);
        const binding = await address.detectBinding();
        console.log(`Interface:  ${binding.iface}`);
        console.log(`CIDR:       /${binding.prefixLength}`);
        console.log(`Broadcasts: ${(await address.broadcastAddresses()).join(', ')}`);
    });

program
    .command('wake')
    .description('send Wake-on-LAN magic packets once')
    .action(async () => {
        const options = program.opts<GlobalOptions>();
        const config = withDebug(await configManager(options).load(), options);
        const log = createLogger('wol-proxy', { debug: options.debug });
        const { address, waker } = createWakeProxy(config);

        let broadcasts: string[] = [];
        try {
            broadcasts = await address.broadcastAddresses();
        } catch (error) {
            log.warn(`Failed to determine broadcast addresses: ${errorMessage(error)}`);
        }
        const reports = await waker.wake(config.gameServerMac, broadcasts);
        if (!reports.some((report) => report.sent)) {
            process.exitCode = 1;
        }
    });

try {
    await program.parseAsync(process.argv);
} catch (error) {
    console.error(`wol-proxy: ${errorMessage(error)}`);
    process.exit(1);
}
