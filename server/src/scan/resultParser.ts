import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import { ParseError } from '../core/errors.js';
import type { HostRecord, PortRecord, ScanResult } from '../task/types.js';

const FRAGMENT_LIMIT = 200;

const repeatedElements = new Set(['host', 'address', 'hostname', 'port']);

const xmlParser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseAttributeValue: false,
    parseTagValue: false,
    isArray: (name, _jPath, _isLeafNode, isAttribute) => !isAttribute && repeatedElements.has(name)
});

// Self-closing elements without attributes (`<hostnames/>`) parse to ''.
const element = <T extends z.ZodTypeAny>(schema: T) =>
    z.preprocess((value) => (value === '' ? undefined : value), schema.optional());

const addressSchema = z.object({
    '@_addr': z.string(),
    '@_addrtype': z.string().optional()
});

const portSchema = z.object({
    '@_protocol': z.string().optional(),
    '@_portid': z.string().regex(/^\d+$/),
    state: element(z.object({ '@_state': z.string().optional() })),
    service: element(
        z.object({
            '@_name': z.string().optional(),
            '@_product': z.string().optional(),
            '@_version': z.string().optional()
        })
    )
});

const hostSchema = z.object({
    status: element(z.object({ '@_state': z.string().optional() })),
    address: z.array(addressSchema).default([]),
    hostnames: element(
        z.object({
            hostname: z.array(z.object({ '@_name': z.string().optional() })).default([])
        })
    ),
    ports: element(
        z.object({
            port: z.array(portSchema).default([])
        })
    )
});

const reportSchema = z.object({
    nmaprun: z.preprocess(
        (value) => (value === '' ? {} : value),
        z.object({
            '@_args': z.string().optional(),
            host: z.array(hostSchema).default([]),
            runstats: element(
                z.object({
                    finished: element(z.object({ '@_elapsed': z.string().optional() }))
                })
            )
        })
    )
});

type ParsedHost = z.infer<typeof hostSchema>;
type ParsedPort = z.infer<typeof portSchema>;

/**
 * Convert an nmap XML report into a normalized `ScanResult`. Anything that is
 * not well-formed XML rooted at `<nmaprun>` yields a `ParseError` carrying the
 * start of the offending output.
 */
export function parseScanReport(rawOutput: string): ScanResult {
    const text = rawOutput.trim();
    const fragment = text.slice(0, FRAGMENT_LIMIT);
    if (text.length === 0) {
        throw new ParseError('output is empty', fragment);
    }
    const validation = XMLValidator.validate(text);
    if (validation !== true) {
        const { msg, line } = validation.err;
        throw new ParseError(`malformed XML at line ${line}: ${msg}`, fragment);
    }
    const tree: unknown = xmlParser.parse(text);
    const report = reportSchema.safeParse(tree);
    if (!report.success) {
        const issue = report.error.issues[0];
        const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'document root';
        throw new ParseError(`unrecognized report structure at ${where}: ${issue?.message ?? 'invalid'}`, fragment);
    }
    const run = report.data.nmaprun;
    const elapsed = run.runstats?.finished?.['@_elapsed'];
    const args = run['@_args']?.trim();
    return {
        target: args ? args.split(/\s+/).pop() ?? 'unknown' : 'unknown',
        scan_time: elapsed ? `${elapsed}s` : 'unknown',
        hosts: run.host.map(toHostRecord)
    };
}

function toHostRecord(host: ParsedHost): HostRecord {
    const record: HostRecord = {
        address: pickAddress(host.address),
        status: host.status?.['@_state'] ?? 'unknown',
        ports: (host.ports?.port ?? []).map(toPortRecord)
    };
    const hostname = host.hostnames?.hostname.find((entry) => entry['@_name'])?.['@_name'];
    if (hostname) {
        record.hostname = hostname;
    }
    return record;
}

function pickAddress(addresses: z.infer<typeof addressSchema>[]) {
    const byType = (type: string) => addresses.find((entry) => entry['@_addrtype'] === type)?.['@_addr'];
    return byType('ipv4') ?? byType('ipv6') ?? addresses[0]?.['@_addr'] ?? 'unknown';
}

function toPortRecord(port: ParsedPort): PortRecord {
    const record: PortRecord = {
        port: Number(port['@_portid']),
        protocol: port['@_protocol'] ?? 'tcp',
        state: port.state?.['@_state'] ?? 'unknown'
    };
    const service = port.service;
    if (service?.['@_name']) {
        record.service = service['@_name'];
    }
    const version = [service?.['@_product'], service?.['@_version']].filter(Boolean).join(' ').trim();
    if (version) {
        record.version = version;
    }
    return record;
}
