export interface FakePort {
    port: number;
    protocol?: string;
    state?: string;
    service?: string;
    product?: string;
    version?: string;
}

export interface FakeHost {
    address: string;
    addrtype?: string;
    status?: string;
    hostname?: string;
    ports?: FakePort[];
}

export interface FakeReport {
    args?: string;
    elapsed?: string;
    hosts?: FakeHost[];
}

function portXml(port: FakePort) {
    const service = port.service
        ? `<service name="${port.service}"${port.product ? ` product="${port.product}"` : ''}${
              port.version ? ` version="${port.version}"` : ''
          } method="probed" conf="10"/>`
        : '';
    return `<port protocol="${port.protocol ?? 'tcp'}" portid="${port.port}"><state state="${
        port.state ?? 'open'
    }" reason="syn-ack" reason_ttl="64"/>${service}</port>`;
}

function hostXml(host: FakeHost) {
    const hostnames = host.hostname
        ? `<hostnames><hostname name="${host.hostname}" type="PTR"/></hostnames>`
        : '<hostnames/>';
    const ports = (host.ports ?? []).map(portXml).join('');
    return [
        '<host starttime="1700000000" endtime="1700000001">',
        `<status state="${host.status ?? 'up'}" reason="echo-reply" reason_ttl="64"/>`,
        `<address addr="${host.address}" addrtype="${host.addrtype ?? 'ipv4'}"/>`,
        hostnames,
        `<ports><extraports state="closed" count="98"/>${ports}</ports>`,
        '</host>'
    ].join('\n');
}

/** Build a minimal nmap `-oX` report for tests. */
export function nmapReport(report: FakeReport = {}) {
    const args = report.args ?? 'nmap -F -T4 -oX - 127.0.0.1';
    return [
        '<?xml version="1.0" encoding="UTF-8"?>',
        `<nmaprun scanner="nmap" args="${args}" start="1700000000" version="7.94" xmloutputversion="1.05">`,
        '<scaninfo type="syn" protocol="tcp" numservices="100" services="1-100"/>',
        ...(report.hosts ?? []).map(hostXml),
        `<runstats><finished time="1700000002" elapsed="${report.elapsed ?? '1.52'}" exit="success"/>`,
        '<hosts up="1" down="0" total="1"/></runstats>',
        '</nmaprun>'
    ].join('\n');
}
