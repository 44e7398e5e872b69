import fs from 'node:fs/promises';
import fsSync from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import writeFileAtomic from 'write-file-atomic';
import { ConfigError } from './errors.js';
import { logger } from './logger.js';
import { formatError, readNumberEnv, readStringEnv } from './utils.js';

export const DEFAULT_CONFIG_FILE = 'scan-server.config.json';
export const EXAMPLE_CONFIG_FILE = 'scan-server.config.example.json';

/** Largest whole number of seconds whose milliseconds still fit a Node timer (2^31-1 ms). */
export const MAX_TIMER_SECONDS = 2_147_483;

const timerSeconds = z.number().int().positive().max(MAX_TIMER_SECONDS);

const waitBoundSchema = z
    .object({
        min: timerSeconds,
        max: timerSeconds
    })
    .refine((bound) => bound.min <= bound.max, { message: 'min must not exceed max' });

const configSchema = z
    .object({
        nmapPath: z.string().min(1).default('nmap'),
        stateFile: z.string().min(1).default('scan_tasks.db'),
        maxConcurrentTasks: z.number().int().positive().default(10),
        syncTimeoutSeconds: timerSeconds.default(30),
        executionTimeoutSeconds: timerSeconds.default(3600),
        retentionDays: z.number().int().nonnegative().default(30),
        logLevel: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
        waitBounds: z
            .object({
                quick: waitBoundSchema.default({ min: 5, max: 300 }),
                full: waitBoundSchema.default({ min: 5, max: 600 }),
                custom: waitBoundSchema.default({ min: 5, max: 600 })
            })
            .default({})
    })
    .strict();

export type ServerConfig = z.infer<typeof configSchema>;
export type ScanWaitBounds = ServerConfig['waitBounds'];

export interface LoadConfigOptions {
    /** Explicit config file; must exist when given. */
    configPath?: string;
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

/**
 * Resolve configuration from defaults, an optional JSON file and the
 * environment, in increasing precedence.
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<ServerConfig> {
    const cwd = options.cwd ?? process.cwd();
    const env = options.env ?? process.env;
    let fileValues: Record<string, unknown> = {};
    let baseDir = cwd;

    const explicitPath = options.configPath ? path.resolve(cwd, options.configPath) : undefined;
    const defaultPath = path.join(cwd, DEFAULT_CONFIG_FILE);
    const configFile = explicitPath ?? (fsSync.existsSync(defaultPath) ? defaultPath : undefined);

    if (configFile) {
        fileValues = await readConfigFile(configFile);
        baseDir = path.dirname(configFile);
        logger.info('config: loaded config file', { configFile });
    } else {
        logger.info('config: no config file found, using defaults and environment');
    }

    const merged = { ...fileValues, ...readEnvOverrides(env) };
    const parsed = configSchema.safeParse(merged);
    if (!parsed.success) {
        throw new ConfigError(
            `Invalid configuration${configFile ? ` in ${configFile}` : ''}`,
            parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        );
    }
    return { ...parsed.data, stateFile: path.resolve(baseDir, parsed.data.stateFile) };
}

async function readConfigFile(configFile: string): Promise<Record<string, unknown>> {
    let raw: string;
    try {
        raw = await fs.readFile(configFile, 'utf8');
    } catch (error) {
        if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
            throw new ConfigError(`Config file does not exist: ${configFile}`);
        }
        throw error;
    }
    let data: unknown;
    try {
        data = JSON.parse(raw);
    } catch (error) {
        throw new ConfigError(`Config file is not valid JSON: ${configFile} (${formatError(error)})`);
    }
    const record = z.record(z.unknown()).safeParse(data);
    if (!record.success) {
        throw new ConfigError(`Config file must contain a JSON object: ${configFile}`);
    }
    return record.data;
}

function readEnvOverrides(env: NodeJS.ProcessEnv): Record<string, unknown> {
    const overrides: Record<string, unknown> = {
        nmapPath: readStringEnv(env, 'NMAP_PATH'),
        stateFile: readStringEnv(env, 'SCAN_STATE_FILE'),
        maxConcurrentTasks: readNumberEnv(env, 'SCAN_MAX_CONCURRENT'),
        syncTimeoutSeconds: readNumberEnv(env, 'SCAN_SYNC_TIMEOUT'),
        executionTimeoutSeconds: readNumberEnv(env, 'SCAN_EXEC_TIMEOUT'),
        retentionDays: readNumberEnv(env, 'SCAN_RETENTION_DAYS'),
        logLevel: readStringEnv(env, 'SCAN_LOG_LEVEL')
    };
    return Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
}

export function exampleConfig(): ServerConfig {
    return configSchema.parse({});
}

export async function writeExampleConfig(targetDir: string) {
    const target = path.join(targetDir, EXAMPLE_CONFIG_FILE);
    await writeFileAtomic(target, `${JSON.stringify(exampleConfig(), null, 2)}\n`, { encoding: 'utf8' });
    return target;
}
