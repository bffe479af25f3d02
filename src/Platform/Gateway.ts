import type { RegistryKernel } from '../kernel-core/Kernel.js';
import { Identity } from '../kernel-core/L1/Identity.js';
import { canonicalize, signData, verifySignature } from '../kernel-core/L0/Crypto.js';
import type { Ed25519PrivateKey } from '../kernel-core/L0/Crypto.js';
import { OPERATIONS } from '../kernel-core/L0/Ontology.js';
import type { Operation, RecordId, WriteAction } from '../kernel-core/L0/Ontology.js';
import { ErrorCode, RegistryError, fail } from '../kernel-core/Errors.js';
import type { Result } from '../kernel-core/Errors.js';

/**
 * The wire form of a write: signed by the caller's Ed25519 key, whose raw
 * public key is the caller's registry Identity.
 */
export interface SignedCommand {
    commandId: string;
    publicKey: string; // Hex, 32 bytes
    operation: Operation;
    args: Record<string, unknown>;
    timestamp: string;
    signature: string;
}

export type UnsignedCommand = Omit<SignedCommand, 'signature'>;

export function signingPayload(cmd: UnsignedCommand): string {
    return `${cmd.commandId}:${cmd.publicKey}:${cmd.operation}:${canonicalize(cmd.args)}:${cmd.timestamp}`;
}

export function signCommand(cmd: UnsignedCommand, privateKey: Ed25519PrivateKey): SignedCommand {
    return { ...cmd, signature: signData(signingPayload(cmd), privateKey) };
}

// --- Structural parsing ---

const invalid = (message: string, field?: string): RegistryError =>
    new RegistryError(ErrorCode.INVALID_FIELD, message, field ? { field } : undefined);

const isRecord = (v: unknown): v is Record<string, unknown> =>
    typeof v === 'object' && v !== null && !Array.isArray(v);

const isOperation = (v: unknown): v is Operation =>
    OPERATIONS.some((op) => op === v);

function text(source: Record<string, unknown>, field: string): string {
    const value = source[field];
    if (typeof value !== 'string') throw invalid(`${field} must be a string`, field);
    return value;
}

function recordId(source: Record<string, unknown>, field: string): RecordId {
    const value = source[field];
    if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 1) {
        throw invalid(`${field} must be a positive integer`, field);
    }
    return value;
}

export function parseCommand(input: unknown): SignedCommand {
    if (!isRecord(input)) throw invalid('Command must be an object');
    const operation = input['operation'];
    if (!isOperation(operation)) throw invalid(`Unknown operation ${String(operation)}`, 'operation');
    const args = input['args'];
    if (!isRecord(args)) throw invalid('args must be an object', 'args');

    return {
        commandId: text(input, 'commandId'),
        publicKey: text(input, 'publicKey'),
        operation,
        args,
        timestamp: text(input, 'timestamp'),
        signature: text(input, 'signature')
    };
}

export function toAction(cmd: SignedCommand, caller: Identity): WriteAction {
    const base = { caller: caller.toHex(), commandId: cmd.commandId };
    const { args } = cmd;
    const recordArgs = () => ({
        parasiteName: text(args, 'parasiteName'),
        classification: text(args, 'classification'),
        location: text(args, 'location'),
        metadataHash: text(args, 'metadataHash').toLowerCase()
    });

    switch (cmd.operation) {
        case 'ADD_RECORD':
            return { ...base, operation: 'ADD_RECORD', args: recordArgs() };
        case 'UPDATE_RECORD':
            return { ...base, operation: 'UPDATE_RECORD', args: { existingId: recordId(args, 'existingId'), ...recordArgs() } };
        case 'REGISTER_INSTITUTION':
            return { ...base, operation: 'REGISTER_INSTITUTION', args: { id: text(args, 'id'), name: text(args, 'name') } };
        case 'VERIFY_INSTITUTION':
            return { ...base, operation: 'VERIFY_INSTITUTION', args: { id: text(args, 'id') } };
        case 'SET_MEMBERSHIP':
            return {
                ...base,
                operation: 'SET_MEMBERSHIP',
                args: {
                    researcher: Identity.fromHex(text(args, 'researcher')).toHex(),
                    institutionId: text(args, 'institutionId')
                }
            };
    }
}

/**
 * Authenticates signed commands and hands them to the kernel.
 * A command id is spent once it has been committed.
 */
export class RegistryGateway {
    private seen: Set<string> = new Set();

    constructor(private kernel: RegistryKernel) {
        for (const entry of kernel.Ledger.getHistory()) {
            if (entry.action.commandId) this.seen.add(entry.action.commandId);
        }
    }

    public execute(input: unknown): Result<RecordId | void> {
        let action: WriteAction;
        try {
            const cmd = parseCommand(input);

            if (!verifySignature(signingPayload(cmd), cmd.signature, cmd.publicKey)) {
                throw new RegistryError(ErrorCode.SIGNATURE_INVALID, 'Invalid Signature');
            }
            if (this.seen.has(cmd.commandId)) {
                throw new RegistryError(ErrorCode.REPLAY_DETECTED, `Replay Violation: command ${cmd.commandId} already processed`);
            }

            action = toAction(cmd, Identity.fromPublicKey(cmd.publicKey));
        } catch (e) {
            if (e instanceof RegistryError) {
                console.warn(`[RegistryGateway] Rejected command: ${e.message}`);
                return fail(e);
            }
            throw e;
        }

        const result = this.kernel.execute(action);
        if (result.ok && action.commandId) this.seen.add(action.commandId);
        return result;
    }
}
