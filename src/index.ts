export * from './kernel-core/Errors.js';
export * from './kernel-core/L0/Ontology.js';
export * from './kernel-core/L0/Guards.js';
export * from './kernel-core/L0/Invariants.js';
export * from './kernel-core/L0/Primitives.js';
export { canonicalize, digestOf, hash, toHex, GENESIS_HASH } from './kernel-core/L0/Crypto.js';
export * from './kernel-core/L1/Roles.js';
export * from './kernel-core/L2/State.js';
export * from './kernel-core/L2/TransitionTable.js';
export * from './kernel-core/L2/Settlement.js';
export * from './kernel-core/L3/Projections.js';
export * from './kernel-core/L5/Audit.js';
export * from './kernel-core/Kernel.js';

export * from './Platform/Ports.js';
export * from './Platform/Errors.js';
export * from './Platform/Config.js';
export * from './Platform/EscrowPlatform.js';

export { InMemoryLedger } from './infrastructure/ledger/InMemoryLedger.js';
export { ManualClock } from './infrastructure/clock/ManualClock.js';
export {
    Ed25519SignatureVerifier, publicKeyOf, randomPrivateKey, signDigest
} from './infrastructure/crypto/Ed25519SignatureVerifier.js';
export { SQLiteEventStore } from './infrastructure/persistence/SQLiteEventStore.js';
