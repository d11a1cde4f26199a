// src/kernel-core/L0/Crypto.ts
import { createHash, createPublicKey, generateKeyPairSync, sign, verify } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Canonical Serialization (sorted keys, no whitespace)
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (value instanceof Uint8Array) {
        return JSON.stringify(toHex(value));
    }
    if (Array.isArray(value)) {
        return `[${value.map(canonicalize).join(',')}]`;
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Hex Codec
const HEX = /^(?:[0-9a-fA-F]{2})*$/;

export function toHex(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
}

/** Accepts an optional 0x prefix. Returns undefined on malformed input. */
export function fromHex(input: string): Uint8Array | undefined {
    const body = input.startsWith('0x') ? input.slice(2) : input;
    if (!HEX.test(body)) return undefined;
    return new Uint8Array(Buffer.from(body, 'hex'));
}

// 1.4 Digital Signatures (Ed25519)
export type Ed25519PublicKey = string; // Raw 32 bytes, hex encoded
export type Ed25519PrivateKey = string; // PKCS#8 PEM
export type Signature = string; // Hex encoded

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export function generateKeyPair(): KeyPair {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    const jwk = publicKey.export({ format: 'jwk' });
    if (!jwk.x) throw new Error('Ed25519 key export produced no public component');
    return {
        publicKey: Buffer.from(jwk.x, 'base64url').toString('hex'),
        privateKey: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()
    };
}

export function signData(data: string, privateKeyPem: Ed25519PrivateKey): Signature {
    return sign(null, Buffer.from(data), privateKeyPem).toString('hex');
}

export function verifySignature(data: string, signature: Signature, publicKeyHex: Ed25519PublicKey): boolean {
    const raw = fromHex(publicKeyHex);
    const sig = fromHex(signature);
    if (!raw || raw.length !== 32 || !sig || sig.length !== 64) return false;
    try {
        const key = createPublicKey({
            key: { kty: 'OKP', crv: 'Ed25519', x: Buffer.from(raw).toString('base64url') },
            format: 'jwk'
        });
        return verify(null, Buffer.from(data), key, sig);
    } catch (e) {
        return false;
    }
}
