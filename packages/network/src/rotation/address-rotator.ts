import ipaddr from 'ipaddr.js';
import { ConfigurationError } from '../errors.js';

type AddressEntry =
  | { kind: 'single'; address: string }
  | { kind: 'range'; first: bigint; last: bigint; byteLength: number };

function toBigInt(bytes: readonly number[]): bigint {
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

function formatAddress(value: bigint, byteLength: number): string {
  const bytes = new Array<number>(byteLength).fill(0);
  let rest = value;
  for (let index = byteLength - 1; index >= 0; index--) {
    bytes[index] = Number(rest & 0xffn);
    rest >>= 8n;
  }
  return ipaddr.fromByteArray(bytes).toString();
}

/**
 * Host bits set in the CIDR are masked away, so `192.168.0.5/30` is the
 * `192.168.0.4/30` network.
 */
function parseRange(value: string): AddressEntry {
  const [address, prefix] = ipaddr.parseCIDR(value);
  const bytes = address.toByteArray();
  const hostBits = BigInt(bytes.length * 8 - prefix);
  const network = (toBigInt(bytes) >> hostBits) << hostBits;
  const broadcast = network | ((1n << hostBits) - 1n);

  // /31, /32, /127 and /128 have no reserved addresses
  if (hostBits <= 1n) {
    return { kind: 'range', first: network, last: broadcast, byteLength: bytes.length };
  }

  // IPv4 drops network and broadcast, IPv6 drops only the subnet-router anycast
  const last = bytes.length === 4 ? broadcast - 1n : broadcast;
  return { kind: 'range', first: network + 1n, last, byteLength: bytes.length };
}

export function parseSourceAddress(value: string): AddressEntry {
  const trimmed = value.trim();

  try {
    if (trimmed.includes('/')) {
      return parseRange(trimmed);
    }

    if (!ipaddr.isValid(trimmed)) {
      throw new Error(`not an IP address`);
    }

    return { kind: 'single', address: ipaddr.parse(trimmed).toString() };
  } catch (error) {
    throw new ConfigurationError(`Invalid source address "${value}"`, { cause: error });
  }
}

/**
 * Round-robin over source addresses. CIDR entries yield every usable host
 * before moving to the next entry; hosts are produced one at a time, so a
 * /10 costs no more than a single address.
 */
export class AddressRotator {
  private readonly entries: readonly AddressEntry[];
  private entryIndex: number;
  private cursor: bigint | undefined;

  constructor(addresses: readonly string[]) {
    this.entries = addresses.map(parseSourceAddress);
    this.entryIndex = 0;
    this.cursor = undefined;
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  nextAddress(): string | undefined {
    const entry = this.entries[this.entryIndex];
    if (!entry) {
      return undefined;
    }

    if (entry.kind === 'single') {
      this.advanceEntry();
      return entry.address;
    }

    const current = this.cursor ?? entry.first;
    if (current >= entry.last) {
      this.advanceEntry();
    } else {
      this.cursor = current + 1n;
    }

    return formatAddress(current, entry.byteLength);
  }

  private advanceEntry(): void {
    this.entryIndex = (this.entryIndex + 1) % this.entries.length;
    this.cursor = undefined;
  }
}

export type { AddressEntry };
