// src/kernel-core/L0/Invariants.ts
import type { BlockNumber, ProofKey, ProofRecord } from './Ontology.js';
import type { RegistrySnapshot } from '../L2/ProofStore.js';
import { fromHex } from './Crypto.js';
import { ErrorCode } from '../Errors.js';

export interface InvariantContext {
    snapshot: RegistrySnapshot;
    currentBlock: BlockNumber;
    maxBytesInHash: number;
}

export interface Invariant {
    id: string;
    boundary: string; // The named boundary (e.g. "Ownership Integrity")
    description: string;
    permits: string; // "What would make this permissible?"
    predicate: (key: ProofKey, record: ProofRecord, ctx: InvariantContext) => boolean;
    violation: ErrorCode;
}

export interface Rejection {
    code: ErrorCode;
    invariantId: string;
    boundary: string;
    permissible: string;
    message: string;
}

// I. Ownership Integrity
export const INV_REG_01: Invariant = {
    id: 'INV-REG-01',
    boundary: 'Ownership Integrity',
    description: 'Every present record has a well-defined owner',
    permits: 'Records are only written by claim operations with an authenticated sender.',
    predicate: (_key, record) => typeof record.owner === 'string' && record.owner.length > 0,
    violation: ErrorCode.INTEGRITY_BREACH
};

// II. Temporal Integrity
export const INV_REG_02: Invariant = {
    id: 'INV-REG-02',
    boundary: 'Temporal Integrity',
    description: 'createdAt is a positive block number not ahead of the chain',
    permits: 'Records are created inside a sealed or sealing block.',
    predicate: (_key, record, { currentBlock }) =>
        Number.isSafeInteger(record.createdAt) && record.createdAt > 0 && record.createdAt <= currentBlock,
    violation: ErrorCode.INTEGRITY_BREACH
};

// III. Resource Bounds
export const INV_REG_03: Invariant = {
    id: 'INV-REG-03',
    boundary: 'Resource Bounds',
    description: 'Every key decodes to a proof within MaxBytesInHash',
    permits: 'Proofs longer than the configured bound are rejected at creation.',
    predicate: (key, _record, { maxBytesInHash }) => {
        const bytes = fromHex(key);
        return bytes !== undefined && bytes.length <= maxBytesInHash && key === key.toLowerCase();
    },
    violation: ErrorCode.INTEGRITY_BREACH
};

export const REGISTRY_INVARIANTS: readonly Invariant[] = [INV_REG_01, INV_REG_02, INV_REG_03];

export function checkRegistryInvariants(
    ctx: InvariantContext,
    invariants: readonly Invariant[] = REGISTRY_INVARIANTS
): Rejection[] {
    const rejections: Rejection[] = [];
    for (const [key, record] of Object.entries(ctx.snapshot)) {
        for (const inv of invariants) {
            if (!inv.predicate(key, record, ctx)) {
                rejections.push({
                    code: inv.violation,
                    invariantId: inv.id,
                    boundary: inv.boundary,
                    permissible: inv.permits,
                    message: `${inv.description} (proof ${key})`
                });
            }
        }
    }
    return rejections;
}
