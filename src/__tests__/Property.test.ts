import { describe, test, expect } from '@jest/globals';
import fc from 'fast-check';
import { ClaimService } from '../kernel-core/L4/ClaimService.js';
import { ProofStore } from '../kernel-core/L2/ProofStore.js';
import { toHex } from '../kernel-core/L0/Crypto.js';
import { ErrorCode, isKernelError } from '../kernel-core/Errors.js';
import { ManualClock, RecordingSink } from '../kernel-core/__tests__/fixtures.js';

const ACCOUNTS = ['alice', 'bob', 'carol'];
const PROOFS = [
    new Uint8Array([]),
    new Uint8Array([0x61]),
    new Uint8Array([0x61, 0x62]),
    new Uint8Array([1, 2, 3, 4, 5])
];
const LIMIT = 4;

type Op =
    | { kind: 'create'; sender: number; proof: number }
    | { kind: 'transfer'; sender: number; to: number; proof: number }
    | { kind: 'revoke'; sender: number; proof: number }
    | { kind: 'tick' };

const account = fc.integer({ min: 0, max: ACCOUNTS.length - 1 });
const proof = fc.integer({ min: 0, max: PROOFS.length - 1 });

const opArb: fc.Arbitrary<Op> = fc.oneof(
    fc.record({ kind: fc.constant<'create'>('create'), sender: account, proof }),
    fc.record({ kind: fc.constant<'transfer'>('transfer'), sender: account, to: account, proof }),
    fc.record({ kind: fc.constant<'revoke'>('revoke'), sender: account, proof }),
    fc.record({ kind: fc.constant<'tick'>('tick') })
);

interface ModelRecord { owner: string; createdAt: number }

/** Reference semantics over a plain Map. Returns the rejection code, if any. */
function applyModel(model: Map<string, ModelRecord>, block: number, op: Op): ErrorCode | undefined {
    if (op.kind === 'tick') return undefined;
    const bytes = PROOFS[op.proof] ?? new Uint8Array();
    const key = toHex(bytes);
    const sender = ACCOUNTS[op.sender] ?? '';
    if (bytes.length > LIMIT) return ErrorCode.PROOF_OVERSIZE;

    const existing = model.get(key);
    if (op.kind === 'create') {
        if (existing) return ErrorCode.PROOF_ALREADY_CLAIMED;
        model.set(key, { owner: sender, createdAt: block });
        return undefined;
    }
    if (!existing) return ErrorCode.NO_SUCH_PROOF;
    if (existing.owner !== sender) return ErrorCode.NOT_PROOF_OWNER;
    if (op.kind === 'transfer') {
        model.set(key, { ...existing, owner: ACCOUNTS[op.to] ?? '' });
    } else {
        model.delete(key);
    }
    return undefined;
}

function applyService(service: ClaimService, clock: ManualClock, op: Op): ErrorCode | undefined {
    if (op.kind === 'tick') {
        clock.advance();
        return undefined;
    }
    const bytes = PROOFS[op.proof] ?? new Uint8Array();
    const sender = ACCOUNTS[op.sender] ?? '';
    try {
        switch (op.kind) {
            case 'create': service.createClaim(sender, bytes); break;
            case 'transfer': service.transferClaim(sender, ACCOUNTS[op.to] ?? '', bytes); break;
            case 'revoke': service.revokeClaim(sender, bytes); break;
        }
        return undefined;
    } catch (e) {
        if (isKernelError(e)) return e.code;
        throw e;
    }
}

describe('Registry Properties', () => {
    test('the claim service agrees with a map model on every sequence', () => {
        fc.assert(fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
            const store = new ProofStore();
            const clock = new ManualClock(1);
            const sink = new RecordingSink();
            const service = new ClaimService(store, clock, sink, { maxBytesInHash: LIMIT });
            const model = new Map<string, ModelRecord>();
            let successes = 0;

            for (const op of ops) {
                const before = store.snapshot();
                const eventsBefore = sink.events.length;
                const expected = applyModel(model, clock.now(), op);
                const actual = applyService(service, clock, op);

                expect(actual).toBe(expected);
                if (actual !== undefined) {
                    // Rejections leave no trace.
                    expect(store.snapshot()).toBe(before);
                    expect(sink.events.length).toBe(eventsBefore);
                } else if (op.kind !== 'tick') {
                    successes++;
                    expect(sink.events.length).toBe(eventsBefore + 1);
                }
            }

            expect(store.snapshot()).toEqual(Object.fromEntries(model));
            expect(sink.events.length).toBe(successes);
        }));
    });

    test('every present record has an owner and a past creation block', () => {
        fc.assert(fc.property(fc.array(opArb, { maxLength: 60 }), (ops) => {
            const store = new ProofStore();
            const clock = new ManualClock(1);
            const service = new ClaimService(store, clock, new RecordingSink(), { maxBytesInHash: LIMIT });

            for (const op of ops) applyService(service, clock, op);

            for (const record of Object.values(store.snapshot())) {
                expect(ACCOUNTS).toContain(record.owner);
                expect(record.createdAt).toBeGreaterThanOrEqual(1);
                expect(record.createdAt).toBeLessThanOrEqual(clock.now());
            }
        }));
    });
});
