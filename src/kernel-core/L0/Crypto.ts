// src/kernel-core/L0/Crypto.ts
import { createHash } from 'crypto';

export const GENESIS_HASH = '0000000000000000000000000000000000000000000000000000000000000000';

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical JSON (sorted keys, bigint as decimal string)
export function canonicalize(value: unknown): string {
    if (value === null || value === undefined) return 'null';
    if (typeof value === 'bigint') return JSON.stringify(value.toString());
    if (typeof value !== 'object') return JSON.stringify(value);
    if (Array.isArray(value)) return `[${value.map(canonicalize).join(',')}]`;

    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Digests handed to signers
export function digestOf(value: unknown): Uint8Array {
    return new Uint8Array(createHash('sha256').update(canonicalize(value)).digest());
}

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes).toString('hex');
}
