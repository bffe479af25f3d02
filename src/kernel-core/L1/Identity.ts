import { RegistryError, ErrorCode } from '../Errors.js';
import type { Ed25519PublicKey } from '../L0/Crypto.js';

export const IDENTITY_BYTES = 32;

/**
 * An authenticated caller: the raw Ed25519 public key that signed the command.
 * Equality only; no ordering.
 */
export class Identity {
    private constructor(private readonly bytes: Uint8Array) {
        Object.freeze(this);
    }

    static fromBytes(bytes: Uint8Array): Identity {
        if (bytes.length !== IDENTITY_BYTES) {
            throw new RegistryError(ErrorCode.INVALID_FIELD, `Identity must be ${IDENTITY_BYTES} bytes, got ${bytes.length}`);
        }
        return new Identity(Uint8Array.from(bytes));
    }

    static fromHex(hex: string): Identity {
        if (!/^[0-9a-fA-F]{64}$/.test(hex)) {
            throw new RegistryError(ErrorCode.INVALID_FIELD, 'Identity must be 64 hex characters');
        }
        return new Identity(Uint8Array.from(Buffer.from(hex, 'hex')));
    }

    static fromPublicKey(publicKey: Ed25519PublicKey): Identity {
        return Identity.fromHex(publicKey);
    }

    equals(other: Identity): boolean {
        if (other.bytes.length !== this.bytes.length) return false;
        return this.bytes.every((b, i) => b === other.bytes[i]);
    }

    /** Stable key for tables and transport. */
    toHex(): string {
        return Buffer.from(this.bytes).toString('hex');
    }

    toJSON(): string {
        return this.toHex();
    }
}
