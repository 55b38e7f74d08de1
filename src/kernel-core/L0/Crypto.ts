// src/kernel-core/L0/Crypto.ts
import { createHash, generateKeyPairSync, sign, verify, randomBytes } from 'crypto';

// 1.1 Hash Function (SHA-256)
export function hash(data: string): string {
    return createHash('sha256').update(data).digest('hex');
}

// 1.2 Digital Signatures (Ed25519, PEM encoded keys)
export type Ed25519PublicKey = string;
export type Ed25519PrivateKey = string;
export type Signature = string; // Hex encoded

export interface KeyPair {
    publicKey: Ed25519PublicKey;
    privateKey: Ed25519PrivateKey;
}

export function generateKeyPair(): KeyPair {
    const { publicKey, privateKey } = generateKeyPairSync('ed25519');
    return {
        publicKey: publicKey.export({ type: 'spki', format: 'pem' }).toString(),
        privateKey: privateKey.export({ type: 'pkcs8', format: 'pem' }).toString()
    };
}

export function signData(data: string, privateKeyPem: Ed25519PrivateKey): Signature {
    return sign(null, Buffer.from(data), privateKeyPem).toString('hex');
}

export function verifySignature(data: string, signature: Signature, publicKeyPem: Ed25519PublicKey): boolean {
    try {
        return verify(null, Buffer.from(data), publicKeyPem, Buffer.from(signature, 'hex'));
    } catch {
        // Malformed key or signature bytes
        return false;
    }
}

/**
 * Returns true when the string parses as an ed25519 public key.
 */
export function isPublicKey(publicKeyPem: string): boolean {
    try {
        verify(null, Buffer.from(''), publicKeyPem, Buffer.alloc(64));
        return true;
    } catch {
        return false;
    }
}

// 1.3 Randomness
export function randomNonce(bytes: number = 16): string {
    return randomBytes(bytes).toString('hex');
}

// 1.4 Canonical Encoding
// Object keys are sorted recursively so equal values always hash equally.
export function canonicalize(value: unknown): string {
    return JSON.stringify(sortKeys(value));
}

function sortKeys(value: unknown): unknown {
    if (Array.isArray(value)) return value.map(sortKeys);
    if (value !== null && typeof value === 'object') {
        const out: Record<string, unknown> = {};
        const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        for (const [key, inner] of entries) {
            out[key] = sortKeys(inner);
        }
        return out;
    }
    return value;
}
