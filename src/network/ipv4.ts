import { BlockList, isIPv4 } from 'node:net';

export const LIMITED_BROADCAST = '255.255.255.255';

export function isValidPrefixLength(prefixLength: number): boolean {
    return Number.isInteger(prefixLength) && prefixLength >= 0 && prefixLength <= 32;
}

export function ipv4ToInt(address: string): number {
    if (!isIPv4(address)) {
        throw new Error(`Invalid IPv4 address: ${address}`);
    }
    return address.split('.').reduce((acc, octet) => ((acc << 8) | Number(octet)) >>> 0, 0);
}

export function intToIpv4(value: number): string {
    return [24, 16, 8, 0].map((shift) => (value >>> shift) & 0xff).join('.');
}

export function prefixMask(prefixLength: number): number {
    if (!isValidPrefixLength(prefixLength)) {
        throw new Error(`Invalid prefix length: ${prefixLength}`);
    }
    return prefixLength === 0 ? 0 : (0xffffffff << (32 - prefixLength)) >>> 0;
}

/**
 * Directed broadcast address of the subnet containing `address`.
 */
export function subnetBroadcast(address: string, prefixLength: number): string {
    const mask = prefixMask(prefixLength);
    return intToIpv4((ipv4ToInt(address) | ~mask) >>> 0);
}

/**
 * True when `b` lies inside the `/prefixLength` network of `a`.
 */
export function sameSubnet(a: string, b: string, prefixLength: number): boolean {
    if (!isValidPrefixLength(prefixLength) || !isIPv4(a) || !isIPv4(b)) {
        return false;
    }
    const network = intToIpv4((ipv4ToInt(a) & prefixMask(prefixLength)) >>> 0);
    const blockList = new BlockList();
    blockList.addSubnet(network, prefixLength, 'ipv4');
    return blockList.check(b, 'ipv4');
}
