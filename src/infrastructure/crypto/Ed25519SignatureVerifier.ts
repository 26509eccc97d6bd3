import { createHash } from 'crypto';
import * as ed from '@noble/ed25519';
import type { AccountID } from '../../kernel-core/L0/Ontology.js';
import { validAccount } from '../../kernel-core/L0/Guards.js';
import { ErrorCode, reject, success } from '../../kernel-core/Errors.js';
import type { Outcome } from '../../kernel-core/Errors.js';
import type { Hex, SignatureVerifier } from '../../Platform/Ports.js';

// Synchronous signing and verification need a sha512 implementation.
ed.utils.sha512Sync = (...messages: Uint8Array[]): Uint8Array => {
    const h = createHash('sha512');
    for (const message of messages) h.update(message);
    return new Uint8Array(h.digest());
};

/**
 * Ed25519 cannot recover a public key from a signature, so the signer is
 * resolved by trying every registered account key.
 */
export class Ed25519SignatureVerifier implements SignatureVerifier {
    private keys: Map<AccountID, string> = new Map();

    public register(account: AccountID, publicKey: Hex): void {
        if (!validAccount(account)) throw new Error(`Invalid account id: ${account}`);
        const hex = typeof publicKey === 'string' ? publicKey.toLowerCase() : Buffer.from(publicKey).toString('hex');
        if (!/^[0-9a-f]{64}$/.test(hex)) throw new Error(`Public key for ${account} must be 32 bytes of hex`);
        this.keys.set(account, hex);
    }

    public recoverSigner(digest: Hex, signature: Hex): Outcome<AccountID> {
        for (const [account, publicKey] of this.keys) {
            if (this.verify(signature, digest, publicKey)) return success(account);
        }
        return reject(ErrorCode.VERIFICATION_FAILED, 'Signature does not match any registered account');
    }

    private verify(signature: Hex, digest: Hex, publicKey: string): boolean {
        try {
            return ed.sync.verify(signature, digest, publicKey);
        } catch {
            // Malformed signature or point encoding
            return false;
        }
    }
}

/**
 * Signs a digest with a raw 32-byte private key.
 */
export function signDigest(digest: Hex, privateKey: Hex): Uint8Array {
    return ed.sync.sign(digest, privateKey);
}

export function publicKeyOf(privateKey: Hex): Uint8Array {
    return ed.sync.getPublicKey(privateKey);
}

export function randomPrivateKey(): Uint8Array {
    return ed.utils.randomPrivateKey();
}
