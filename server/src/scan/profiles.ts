import path from 'node:path';
import { InvalidRequestError } from '../core/errors.js';
import { formatError, tokenizeCommandLine } from '../core/utils.js';
import type { ScanProfile } from '../task/types.js';

export interface ScanRequest {
    profile: ScanProfile;
    target: string;
    command: string[];
}

/** XML report on stdout; the result parser reads nothing else. */
const XML_TO_STDOUT = ['-oX', '-'];

export function buildQuickScan(nmapPath: string, target: string): ScanRequest {
    return {
        profile: 'quick',
        target,
        command: [nmapPath, '-F', '-T4', ...XML_TO_STDOUT, target]
    };
}

export function buildFullScan(nmapPath: string, target: string): ScanRequest {
    return {
        profile: 'full',
        target,
        command: [nmapPath, '-p', '1-65535', '-T4', '-sV', ...XML_TO_STDOUT, target]
    };
}

/**
 * Turn a free-form nmap command line into an argument vector. A leading
 * `nmap` is replaced with the configured binary, and an XML-to-stdout flag is
 * added unless the caller already passed `-oX -`. XML written to a file would
 * never reach the result parser, so such commands are refused.
 */
export function buildCustomScan(nmapPath: string, commandLine: string): ScanRequest {
    let parts: string[];
    try {
        parts = tokenizeCommandLine(commandLine);
    } catch (error) {
        throw new InvalidRequestError(formatError(error));
    }
    if (parts.length > 0 && isNmapInvocation(parts[0], nmapPath)) {
        parts.shift();
    }
    if (parts.length === 0) {
        throw new InvalidRequestError('Custom scan command must include nmap arguments and a target.');
    }
    assertXmlToStdout(parts);
    const args = parts.includes('-oX') || parts.includes('-oX-') ? parts : [...XML_TO_STDOUT, ...parts];
    return {
        profile: 'custom',
        target: parts[parts.length - 1],
        command: [nmapPath, ...args]
    };
}

function isNmapInvocation(token: string, nmapPath: string) {
    if (token === nmapPath) return true;
    const base = path.basename(token).toLowerCase();
    return base === 'nmap' || base === 'nmap.exe';
}

function assertXmlToStdout(parts: readonly string[]) {
    parts.forEach((part, index) => {
        const fileDestination =
            part.startsWith('-oA') ||
            (part === '-oX' && parts[index + 1] !== '-') ||
            (part.startsWith('-oX') && part !== '-oX' && part !== '-oX-');
        if (fileDestination) {
            throw new InvalidRequestError(
                `Custom scans must write XML to stdout: remove "${part}" or use "-oX -" instead of a file destination.`
            );
        }
    });
}
