#!/usr/bin/env node
import { Command } from 'commander';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { loadConfig, writeExampleConfig, type ServerConfig } from './core/config.js';
import { logger, setLogLevel } from './core/logger.js';
import { formatError } from './core/utils.js';
import { createScanServer, SERVER_NAME, SERVER_VERSION } from './server/index.js';
import { AdmissionLedger } from './task/admissionLedger.js';
import { TaskScheduler } from './task/scheduler.js';
import { openTaskStore, type TaskStore } from './task/taskStore.js';

const DAY_MS = 24 * 60 * 60 * 1000;

interface CliOptions {
    config?: string;
    init?: boolean;
}

async function start(config: ServerConfig) {
    setLogLevel(config.logLevel);
    logger.info('server: starting', {
        pid: process.pid,
        version: SERVER_VERSION,
        nmapPath: config.nmapPath,
        stateFile: config.stateFile,
        maxConcurrentTasks: config.maxConcurrentTasks,
        syncTimeoutSeconds: config.syncTimeoutSeconds
    });

    const { store, reconciled } = await openTaskStore(config.stateFile);
    if (reconciled.interrupted.length > 0) {
        logger.warn('server: marked interrupted tasks as failed', { ids: reconciled.interrupted });
    }
    if (config.retentionDays > 0) {
        const pruned = await store.prune(config.retentionDays * DAY_MS);
        if (pruned > 0) {
            logger.info('server: pruned expired tasks', { pruned, retentionDays: config.retentionDays });
        }
    }

    const ledger = new AdmissionLedger(config.maxConcurrentTasks);
    ledger.on('changed', (snapshot) => logger.debug('ledger: running tasks changed', snapshot));
    const scheduler = new TaskScheduler({
        store,
        ledger,
        maxConcurrentTasks: config.maxConcurrentTasks,
        executionTimeoutMs: config.executionTimeoutSeconds * 1000,
        defaultWaitMs: config.syncTimeoutSeconds * 1000
    });

    const server = createScanServer({
        scheduler,
        nmapPath: config.nmapPath,
        syncTimeoutSeconds: config.syncTimeoutSeconds,
        waitBounds: config.waitBounds
    });
    registerShutdownHandlers(scheduler, store);

    await server.connect(new StdioServerTransport());
    logger.info('server: ready', { name: SERVER_NAME, pid: process.pid });
}

let shuttingDown = false;

async function handleShutdown(scheduler: TaskScheduler, store: TaskStore, reason: string) {
    if (shuttingDown) {
        return;
    }
    shuttingDown = true;
    try {
        await scheduler.shutdown(reason);
    } finally {
        await store.close();
    }
}

function registerShutdownHandlers(scheduler: TaskScheduler, store: TaskStore) {
    const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];
    for (const signal of signals) {
        process.once(signal, () => {
            handleShutdown(scheduler, store, `Server stopped (${signal}).`)
                .catch((error) => logger.error('server: shutdown did not complete cleanly', formatError(error)))
                .finally(() => process.exit(0));
        });
    }
}

const program = new Command()
    .name(SERVER_NAME)
    .description('MCP server running nmap scans as supervised, persisted tasks')
    .version(SERVER_VERSION)
    .option('-c, --config <path>', 'config file (default: ./scan-server.config.json when present)')
    .option('--init', 'write scan-server.config.example.json to the working directory and exit')
    .action(async (options: CliOptions) => {
        if (options.init) {
            const target = await writeExampleConfig(process.cwd());
            logger.info('server: wrote example config', { target });
            return;
        }
        await start(await loadConfig({ configPath: options.config }));
    });

program.parseAsync(process.argv).catch((error) => {
    logger.error('server: failed to start', formatError(error));
    process.exit(1);
});
