import { canonicalize, hash } from '../kernel-core/L0/Crypto.js';
import type { RegistryKernel } from '../kernel-core/Kernel.js';
import type { MetadataHash, RecordId } from '../kernel-core/L0/Ontology.js';

export interface SubmissionFields {
    parasiteName: string;
    classification: string;
    location: string;
}

/** The off-ledger document a record's metadata hash commits to. */
export interface SubmissionMetadata extends SubmissionFields {
    timestamp: string; // ISO-8601
    additionalData: Record<string, unknown>;
}

export interface PreparedSubmission {
    metadata: SubmissionMetadata;
    metadataHash: MetadataHash;
}

export function digestMetadata(metadata: SubmissionMetadata): MetadataHash {
    return hash(canonicalize(metadata));
}

export function prepareSubmission(
    fields: SubmissionFields,
    additionalData: Record<string, unknown> = {},
    now: Date = new Date()
): PreparedSubmission {
    const metadata: SubmissionMetadata = {
        parasiteName: fields.parasiteName,
        classification: fields.classification,
        location: fields.location,
        timestamp: now.toISOString(),
        additionalData
    };
    return { metadata, metadataHash: digestMetadata(metadata) };
}

export type SubmissionCheck =
    | { verified: true; recordId: RecordId; recordedAt: number }
    | { verified: false; recordId: RecordId; reason: 'UNKNOWN_RECORD' | 'HASH_MISMATCH' };

/** Checks a stored record against the metadata document it claims to commit to. */
export function verifySubmission(kernel: RegistryKernel, recordId: RecordId, metadata: SubmissionMetadata): SubmissionCheck {
    const record = kernel.getParasiteRecord(recordId);
    if (!record) return { verified: false, recordId, reason: 'UNKNOWN_RECORD' };
    if (record.metadataHash !== digestMetadata(metadata)) return { verified: false, recordId, reason: 'HASH_MISMATCH' };
    return { verified: true, recordId, recordedAt: record.recordedAt };
}
