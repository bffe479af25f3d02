// src/kernel-core/L0/Crypto.ts
import { createHash, createPublicKey, generateKeyPairSync, sign, verify } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string | Uint8Array): string {
    return createHash('sha256').update(data).digest('hex');
}

export const ZERO_HASH = '0'.repeat(64);

// 1.2 Canonical serialization: sorted keys, no whitespace
export function canonicalize(value: unknown): string {
    if (value === null || typeof value !== 'object') {
        return JSON.stringify(value) ?? 'null';
    }
    if (Array.isArray(value)) {
        return `[${value.map(canonicalize).join(',')}]`;
    }
    const entries = Object.entries(value)
        .filter(([, v]) => v !== undefined)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([k, v]) => `${JSON.stringify(k)}:${canonicalize(v)}`).join(',')}}`;
}

// 1.3 Digital Signatures (Ed25519)
export type Ed25519PublicKey = string; // Hex encoded raw 32 bytes
export type Ed25519PrivateKey = string; // PKCS#8 PEM
export type Signature = string; // Hex encoded

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export function generateKeyPair(): KeyPair {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    const jwk = publicKey.export({ format: 'jwk' });
    if (!jwk.x) throw new Error('Crypto Error: Ed25519 key export produced no public component');
    return {
        publicKey: Buffer.from(jwk.x, 'base64url').toString('hex'),
        privateKey: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()
    };
}

export function signData(data: string, privateKeyPem: Ed25519PrivateKey): Signature {
    return sign(null, Buffer.from(data), privateKeyPem).toString('hex');
}

export function verifySignature(data: string, signature: Signature, publicKeyHex: Ed25519PublicKey): boolean {
    try {
        const key = createPublicKey({
            key: { kty: 'OKP', crv: 'Ed25519', x: Buffer.from(publicKeyHex, 'hex').toString('base64url') },
            format: 'jwk'
        });
        return verify(null, Buffer.from(data), key, Buffer.from(signature, 'hex'));
    } catch {
        // Malformed keys and signatures are simply not valid
        return false;
    }
}
