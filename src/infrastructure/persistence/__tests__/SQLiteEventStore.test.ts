import { describe, test, expect, beforeAll, afterEach } from '@jest/globals';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { SQLiteEventStore } from '../SQLiteEventStore.js';
import { AuditLog } from '../../../kernel-core/L5/Audit.js';
import { bootstrapRegistry } from '../../../Platform/RegistryPlatform.js';
import { signExtrinsic } from '../../../kernel-core/L1/Identity.js';
import { generateKeyPair } from '../../../kernel-core/L0/Crypto.js';
import type { KeyPair } from '../../../kernel-core/L0/Crypto.js';
import type { Extrinsic } from '../../../kernel-core/L0/Ontology.js';

describe('SQLite Event Store', () => {
    let alice: KeyPair;
    const opened: SQLiteEventStore[] = [];
    const dirs: string[] = [];

    function open(dbPath: string): SQLiteEventStore {
        const store = new SQLiteEventStore(dbPath);
        opened.push(store);
        return store;
    }

    beforeAll(() => {
        alice = generateKeyPair();
    });

    afterEach(() => {
        while (opened.length > 0) opened.pop()?.close();
        while (dirs.length > 0) {
            const dir = dirs.pop();
            if (dir) fs.rmSync(dir, { recursive: true, force: true });
        }
    });

    test('round-trips evidence, omitting empty code and reason', async () => {
        const store = open(':memory:');
        const log = new AuditLog(store);
        const extrinsic: Extrinsic = signExtrinsic({ kind: 'createClaim', proof: '616263' }, 0, alice);

        const ok = await log.append({
            blockNumber: 1,
            extrinsic,
            status: 'SUCCESS',
            events: [{ kind: 'ClaimCreated', who: alice.publicKey, proof: new Uint8Array([0x61, 0x62, 0x63]) }]
        });
        const rejected = await log.append({ blockNumber: 2, extrinsic, status: 'REJECT', code: 'PROOF_ALREADY_CLAIMED', reason: 'Proof has already been claimed' });

        expect(await store.getHistory()).toEqual([ok, rejected]);
        expect(await store.getLatest()).toEqual(rejected);
        expect((await store.getHistory())[0]).not.toHaveProperty('code');
        expect(await log.verifyChain()).toBe(true);
    });

    test('an empty store has no tip', async () => {
        const store = open(':memory:');

        expect(await store.getLatest()).toBeNull();
        expect(await store.getHistory()).toEqual([]);
    });

    test('a restarted node replays the persisted ledger', async () => {
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'claims-'));
        dirs.push(dir);
        const dbPath = path.join(dir, 'claims.db');

        const first = await bootstrapRegistry({ maxBytesInHash: 32, eventStore: open(dbPath) });
        first.sequencer.submit(signExtrinsic({ kind: 'createClaim', proof: '616263' }, 0, alice));
        await first.sequencer.produceBlock();
        first.sequencer.submit(signExtrinsic({ kind: 'createClaim', proof: '646566' }, 1, alice));
        await first.sequencer.produceBlock();
        opened.pop()?.close();

        const second = await bootstrapRegistry({ maxBytesInHash: 32, eventStore: open(dbPath) });

        expect(second.replay).toEqual({ entries: 2, applied: 2, height: 2 });
        expect(second.kernel.Lifecycle).toBe('ACTIVE');
        expect(second.kernel.Store.snapshot()).toEqual(first.kernel.Store.snapshot());
        expect(second.kernel.Identity.nextNonce(alice.publicKey)).toBe(2);
        expect(second.sequencer.Height).toBe(2);
    });
});
