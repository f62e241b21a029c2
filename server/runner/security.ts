import { createPublicKey, verify } from 'crypto';
import { OperationSignature, RunnerOperation, SignedOperation } from '../../shared/schema';
import { Authorizer, GrantedAuthorizer } from './auth';
import { AuthorizationError, ValidationError } from './errors';
import { stableStringify } from './hash';
import { RunnerState } from './state';

export interface RunnerSecurityContext {
  state: RunnerState;
  now: number;
}

export interface RunnerSecurity {
  readonly requiresSignature: boolean;
  authorize(signed: SignedOperation, context: RunnerSecurityContext): Authorizer;
}

export interface SignerRegistry {
  getPublicKey(signerId: string): string | undefined;
  registerSigner(signerId: string, publicKey: string): void;
}

export class InMemorySignerRegistry implements SignerRegistry {
  private keys = new Map<string, string>();

  getPublicKey(signerId: string): string | undefined {
    return this.keys.get(signerId);
  }

  registerSigner(signerId: string, publicKey: string): void {
    this.keys.set(signerId, publicKey);
  }
}

export interface SecurityConfig {
  require_signature?: boolean;
  require_nonce?: boolean;
}

/**
 * Verifies ED25519 signatures over a signed operation and grants authority
 * for exactly the signers whose signatures check out.
 */
export class SecurityEngine implements RunnerSecurity {
  constructor(private registry: SignerRegistry, private config: SecurityConfig = {}) {}

  get requiresSignature(): boolean {
    return this.config.require_signature ?? false;
  }

  authorize(signed: SignedOperation, context: RunnerSecurityContext): Authorizer {
    if (this.config.require_signature && signed.signatures.length === 0) {
      throw new AuthorizationError('operation must be signed');
    }

    const signers = new Set<string>();
    for (const auth of signed.signatures) {
      if (auth.algorithm !== 'ED25519') {
        throw new AuthorizationError('unsupported signature algorithm');
      }
      if (signers.has(auth.signer_id)) {
        throw new ValidationError(`duplicate signature for signer: ${auth.signer_id}`);
      }

      const publicKey = this.registry.getPublicKey(auth.signer_id);
      if (!publicKey) {
        throw new AuthorizationError(`unknown signer: ${auth.signer_id}`);
      }
      this.verifySignature(signed.operation, auth, publicKey);

      if (this.config.require_nonce) {
        if (!auth.nonce) {
          throw new ValidationError('nonce is required');
        }
        context.state.registerNonce(auth.signer_id, auth.nonce, context.now);
      }
      signers.add(auth.signer_id);
    }

    return new GrantedAuthorizer(signers);
  }

  private verifySignature(operation: RunnerOperation, auth: OperationSignature, publicKey: string): void {
    const canonical = canonicalizeOperation(operation, auth);
    const signature = Buffer.from(auth.signature, 'base64');
    const ok = verify(null, Buffer.from(canonical), resolvePublicKey(publicKey), signature);
    if (!ok) {
      throw new AuthorizationError(`invalid signature for signer: ${auth.signer_id}`);
    }
  }
}

export function canonicalizeOperation(
  operation: RunnerOperation,
  auth: Pick<OperationSignature, 'signer_id' | 'nonce' | 'algorithm'>,
): string {
  return stableStringify({
    operation,
    auth: { signer_id: auth.signer_id, nonce: auth.nonce, algorithm: auth.algorithm },
  });
}

function resolvePublicKey(publicKey: string) {
  if (publicKey.startsWith('-----BEGIN')) {
    return createPublicKey(publicKey);
  }
  const buffer = Buffer.from(publicKey, 'base64');
  return createPublicKey({ key: buffer, format: 'der', type: 'spki' });
}
