import { createPrivateKey, generateKeyPairSync, randomBytes, sign } from 'crypto';
import { RunnerOperation, SignedOperation } from '../../shared/schema';
import { canonicalizeOperation } from './security';

export interface SignerKeyPair {
  publicKeyBase64: string;
  privateKeyBase64: string;
}

export function createSignerKeyPair(): SignerKeyPair {
  const { publicKey, privateKey } = generateKeyPairSync('ed25519');
  const publicDer = publicKey.export({ format: 'der', type: 'spki' });
  const privateDer = privateKey.export({ format: 'der', type: 'pkcs8' });
  return {
    publicKeyBase64: Buffer.from(publicDer).toString('base64'),
    privateKeyBase64: Buffer.from(privateDer).toString('base64'),
  };
}

/**
 * Adds one signer's signature. Pass a `SignedOperation` to co-sign an
 * operation that already carries signatures.
 */
export function signOperation(
  target: RunnerOperation | SignedOperation,
  options: {
    signerId: string;
    privateKeyBase64: string;
    nonce?: string;
  },
): SignedOperation {
  const signed: SignedOperation = 'signatures' in target ? target : { operation: target, signatures: [] };
  const auth = {
    signer_id: options.signerId,
    nonce: options.nonce ?? `nonce-${randomBytes(12).toString('hex')}`,
    algorithm: 'ED25519' as const,
  };
  const privateKey = createPrivateKey({
    key: Buffer.from(options.privateKeyBase64, 'base64'),
    format: 'der',
    type: 'pkcs8',
  });
  const payload = canonicalizeOperation(signed.operation, auth);
  const signature = sign(null, Buffer.from(payload), privateKey).toString('base64');

  return {
    operation: signed.operation,
    signatures: [...signed.signatures, { ...auth, signature }],
  };
}
