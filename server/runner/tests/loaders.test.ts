import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_STORE_PATH, loadRunnerConfig, parseRunnerConfig } from '../config-loader';
import { ValidationError } from '../errors';
import { loadOperationFile, parseOperation } from '../operation-loader';
import { createSignerKeyPair, signOperation } from '../signing';

describe('parseOperation', () => {
  it('accepts a bare operation', () => {
    expect(parseOperation({ kind: 'ESCROW_RELEASE', depositor: 'dana', escrow_id: 4 })).toEqual({
      kind: 'BARE',
      operation: { kind: 'ESCROW_RELEASE', depositor: 'dana', escrow_id: 4 },
    });
  });

  it('accepts an admin handover', () => {
    expect(parseOperation({ kind: 'SET_ADMIN', admin: 'admin', new_admin: 'nina' })).toEqual({
      kind: 'BARE',
      operation: { kind: 'SET_ADMIN', admin: 'admin', new_admin: 'nina' },
    });
    expect(() => parseOperation({ kind: 'SET_ADMIN', admin: 'admin' })).toThrow('invalid operation');
  });

  it('accepts a signed envelope', () => {
    const keys = createSignerKeyPair();
    const signed = signOperation(
      { kind: 'PAYMENT_CANCEL', payment_id: 3 },
      { signerId: 'sam', privateKeyBase64: keys.privateKeyBase64, nonce: 'n-1' },
    );

    const loaded = parseOperation(JSON.parse(JSON.stringify(signed)));

    expect(loaded).toEqual({ kind: 'SIGNED', signed });
  });

  it('rejects unknown kinds and stray fields', () => {
    expect(() => parseOperation({ kind: 'WITHDRAW_ALL', staker: 'alice' })).toThrow('invalid operation');
    expect(() => parseOperation({ kind: 'STAKE', staker: 'alice', amount: 10, memo: 'x' })).toThrow(ValidationError);
    expect(() => parseOperation({ kind: 'STAKE', staker: 'alice', amount: 1.5 })).toThrow(ValidationError);
  });

  it('rejects a malformed signature list', () => {
    expect(() =>
      parseOperation({ operation: { kind: 'PAYMENT_EXECUTE', payment_id: 1 }, signatures: [{ signer_id: 'sam' }] }),
    ).toThrow('invalid signed operation');
  });

  it('leaves per-request mint problems to the engine', () => {
    const loaded = parseOperation({
      kind: 'BATCH_MINT',
      admin: 'admin',
      requests: [{ recipient: '', amount: -3 }],
    });
    expect(loaded.kind).toBe('BARE');
  });
});

describe('runner configuration', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'settlement-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', async () => {
    const loaded = await loadRunnerConfig(join(dir, 'absent.json'));

    expect(loaded.store_path).toBe(DEFAULT_STORE_PATH);
    expect(loaded.log_level).toBe('info');
    expect(loaded.security).toEqual({ require_signature: false, require_nonce: true });
  });

  it('registers configured signers', async () => {
    const keys = createSignerKeyPair();
    const file = join(dir, 'runner.json');
    await writeFile(
      file,
      JSON.stringify({
        store_path: 'var/state.json',
        log_level: 'warn',
        security: { require_signature: true, signers: [{ signer_id: 'admin', public_key: keys.publicKeyBase64 }] },
      }),
      'utf8',
    );

    const loaded = await loadRunnerConfig(file);

    expect(loaded.store_path).toBe('var/state.json');
    expect(loaded.log_level).toBe('warn');
    expect(loaded.security).toEqual({ require_signature: true, require_nonce: true });
    expect(loaded.registry.getPublicKey('admin')).toBe(keys.publicKeyBase64);
  });

  it('rejects unknown settings and duplicate signers', () => {
    expect(() => parseRunnerConfig({ log_level: 'verbose' })).toThrow('invalid runner configuration');
    expect(() => parseRunnerConfig({ retries: 3 })).toThrow(ValidationError);
    expect(() =>
      parseRunnerConfig({
        security: {
          signers: [
            { signer_id: 'a', public_key: 'k1' },
            { signer_id: 'a', public_key: 'k2' },
          ],
        },
      }),
    ).toThrow('duplicate signer entry: a');
  });

  it('surfaces unreadable JSON', async () => {
    const file = join(dir, 'broken.json');
    await writeFile(file, '{ not json', 'utf8');
    await expect(loadRunnerConfig(file)).rejects.toThrow(SyntaxError);
  });

  it('reads operation files', async () => {
    const file = join(dir, 'op.json');
    await writeFile(file, JSON.stringify({ kind: 'UNSTAKE', staker: 'alice', amount: 5 }), 'utf8');
    expect(await loadOperationFile(file)).toEqual({
      kind: 'BARE',
      operation: { kind: 'UNSTAKE', staker: 'alice', amount: 5 },
    });
  });
});
