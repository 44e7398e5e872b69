import { logger } from './logger.js';

export function formatError(error: unknown) {
    return error instanceof Error ? error.message : String(error);
}

/**
 * Split a command line into an argument vector the way a POSIX shell would
 * for quoting and backslash escapes, without expanding anything.
 */
export function tokenizeCommandLine(input: string) {
    const tokens: string[] = [];
    let current = '';
    let inToken = false;
    let quote: '"' | "'" | undefined;
    let escaping = false;
    for (const char of input) {
        if (escaping) {
            current += char;
            escaping = false;
            continue;
        }
        if (quote) {
            if (char === '\\' && quote === '"') {
                escaping = true;
                continue;
            }
            if (char === quote) {
                quote = undefined;
                continue;
            }
            current += char;
            continue;
        }
        if (char === '\\') {
            escaping = true;
            inToken = true;
            continue;
        }
        if (char === '"' || char === "'") {
            quote = char;
            inToken = true;
            continue;
        }
        if (/\s/.test(char)) {
            if (inToken) {
                tokens.push(current);
                current = '';
                inToken = false;
            }
            continue;
        }
        current += char;
        inToken = true;
    }
    if (quote) {
        throw new Error(`Unterminated ${quote} quote in command line.`);
    }
    if (inToken) tokens.push(current);
    return tokens;
}

/**
 * Read a non-negative number from the environment. Blank values fall back
 * silently, unparsable ones fall back with a warning.
 */
export function readNumberEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
    const raw = env[name];
    if (!raw || raw.trim().length === 0) {
        return undefined;
    }
    const parsed = Number(raw);
    if (!Number.isFinite(parsed) || parsed < 0) {
        logger.warn(`config: ignoring ${name}, not a non-negative number`, { value: raw });
        return undefined;
    }
    return parsed;
}

export function readStringEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
    const raw = env[name]?.trim();
    return raw ? raw : undefined;
}
