/**
 * CLAIM REGISTRY ONTOLOGY
 * The single source of truth for registry primitives.
 */

// --- 1. Identity ---
/** Lowercase hex of a raw 32-byte Ed25519 public key. */
export type AccountId = string;

// --- 2. Logical Time ---
/** Block height assigned by the sequencer. Genesis is 0. */
export type BlockNumber = number;

// --- 3. Proof ---
/** Opaque content fingerprint. Compared by byte equality only. */
export type Proof = Uint8Array;
/** Lowercase hex encoding of a Proof, used as the registry key. */
export type ProofKey = string;

// --- 4. Proof Record ---
export interface ProofRecord {
    owner: AccountId;
    createdAt: BlockNumber;
}

// --- 5. Claim Events ---
export type ClaimEvent =
    | { kind: 'ClaimCreated'; who: AccountId; proof: Proof }
    | { kind: 'ClaimTransfered'; from: AccountId; to: AccountId; proof: Proof }
    | { kind: 'ClaimRevoked'; who: AccountId; proof: Proof };

export type ClaimEventKind = ClaimEvent['kind'];

/** Wire/ledger form of a ClaimEvent: proof bytes as hex. */
export type ClaimEventRecord =
    | { kind: 'ClaimCreated'; who: AccountId; proof: ProofKey }
    | { kind: 'ClaimTransfered'; from: AccountId; to: AccountId; proof: ProofKey }
    | { kind: 'ClaimRevoked'; who: AccountId; proof: ProofKey };

// --- 6. Calls & Extrinsics ---
export type Call =
    | { kind: 'createClaim'; proof: ProofKey }
    | { kind: 'transferClaim'; proof: ProofKey; newOwner: AccountId }
    | { kind: 'revokeClaim'; proof: ProofKey };

export type CallKind = Call['kind'];

export interface Extrinsic {
    signer: AccountId;
    nonce: number;
    call: Call;
    signature: string; // hex
}

// --- Kernel Lifecycle ---
export type KernelState =
    | 'UNINITIALIZED'
    | 'CONSTITUTED'
    | 'ACTIVE'
    | 'SUSPENDED'
    | 'VIOLATED'
    | 'RECOVERED';
