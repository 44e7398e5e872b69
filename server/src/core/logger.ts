export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const levelPrefix: Record<LogLevel, string> = {
    debug: '[debug]',
    info: '[info]',
    warn: '[warn]',
    error: '[error]'
};

const levelRank: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40
};

let minimumLevel: LogLevel = 'info';

export function setLogLevel(level: LogLevel) {
    minimumLevel = level;
}

export function getLogLevel(): LogLevel {
    return minimumLevel;
}

function write(level: LogLevel, message: string, details?: unknown) {
    if (levelRank[level] < levelRank[minimumLevel]) {
        return;
    }
    const payload = details === undefined ? message : `${message} ${stringify(details)}`;
    // stdout carries MCP JSON-RPC frames; every diagnostic line goes to stderr.
    process.stderr.write(`[scan-server] ${levelPrefix[level]} ${payload}\n`);
}

function stringify(value: unknown) {
    if (value instanceof Error) {
        return `${value.name}: ${value.message}`;
    }
    try {
        return JSON.stringify(value);
    } catch {
        return String(value);
    }
}

export const logger = {
    debug(message: string, details?: unknown) {
        write('debug', message, details);
    },
    info(message: string, details?: unknown) {
        write('info', message, details);
    },
    warn(message: string, details?: unknown) {
        write('warn', message, details);
    },
    error(message: string, details?: unknown) {
        write('error', message, details);
    }
};
