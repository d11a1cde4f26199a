import { describe, test, expect } from '@jest/globals';
import { INV_REG_01, INV_REG_02, checkRegistryInvariants } from '../Invariants.js';
import { ErrorCode } from '../../Errors.js';

describe('Registry Invariants', () => {
    const owner = 'a'.repeat(64);

    test('a well-formed registry certifies clean', () => {
        const rejections = checkRegistryInvariants({
            snapshot: {
                '616263': { owner, createdAt: 1 },
                '': { owner, createdAt: 3 }
            },
            currentBlock: 3,
            maxBytesInHash: 4
        });

        expect(rejections).toEqual([]);
    });

    test('an ownerless record breaks ownership integrity', () => {
        const rejections = checkRegistryInvariants({
            snapshot: { '616263': { owner: '', createdAt: 1 } },
            currentBlock: 1,
            maxBytesInHash: 4
        });

        expect(rejections).toEqual([{
            code: ErrorCode.INTEGRITY_BREACH,
            invariantId: 'INV-REG-01',
            boundary: 'Ownership Integrity',
            permissible: INV_REG_01.permits,
            message: 'Every present record has a well-defined owner (proof 616263)'
        }]);
    });

    test('createdAt must be a positive block not ahead of the chain', () => {
        const rejections = checkRegistryInvariants({
            snapshot: {
                '00': { owner, createdAt: 0 },
                '01': { owner, createdAt: 6 },
                '02': { owner, createdAt: 1.5 },
                '03': { owner, createdAt: 5 }
            },
            currentBlock: 5,
            maxBytesInHash: 4
        }, [INV_REG_02]);

        expect(rejections.map(r => r.message)).toEqual([
            'createdAt is a positive block number not ahead of the chain (proof 00)',
            'createdAt is a positive block number not ahead of the chain (proof 01)',
            'createdAt is a positive block number not ahead of the chain (proof 02)'
        ]);
    });

    test('keys must be lowercase hex within the bound', () => {
        const rejections = checkRegistryInvariants({
            snapshot: {
                '0102030405': { owner, createdAt: 1 },
                'ABCD': { owner, createdAt: 1 },
                'xyz': { owner, createdAt: 1 }
            },
            currentBlock: 1,
            maxBytesInHash: 4
        });

        expect(rejections.map(r => r.invariantId)).toEqual(['INV-REG-03', 'INV-REG-03', 'INV-REG-03']);
    });

    test('a record may break several invariants at once', () => {
        const rejections = checkRegistryInvariants({
            snapshot: { 'zz': { owner: '', createdAt: 9 } },
            currentBlock: 1,
            maxBytesInHash: 4
        });

        expect(rejections.map(r => r.invariantId)).toEqual(['INV-REG-01', 'INV-REG-02', 'INV-REG-03']);
    });
});
