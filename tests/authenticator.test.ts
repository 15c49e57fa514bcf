import { describe, it, expect } from 'vitest';
import { Authenticator, candidateKeyPaths } from '../src/authenticator.js';
import { TransportError } from '../src/errors.js';
import { FakeSession, RecordingLogger, ScriptedPrompter } from './helpers.js';

const HOME = '/home/tester';
const RSA = '/home/tester/.ssh/id_rsa';
const ED25519 = '/home/tester/.ssh/id_ed25519';
const ECDSA = '/home/tester/.ssh/id_ecdsa';

function setup(existing: string[], answers: string[], homeDir: string | undefined = HOME) {
  const session = new FakeSession();
  const prompter = new ScriptedPrompter(answers);
  const logger = new RecordingLogger();
  const authenticator = new Authenticator(prompter, {
    homeDir,
    logger,
    fileExists: (p) => existing.includes(p),
  });
  return { session, prompter, logger, authenticator };
}

describe('candidateKeyPaths', () => {
  it('lists keys in fixed priority order', () => {
    expect(candidateKeyPaths(HOME)).toEqual([RSA, ED25519, ECDSA]);
  });

  it('returns nothing without a home directory', () => {
    expect(candidateKeyPaths(undefined)).toEqual([]);
  });
});

describe('Authenticator', () => {
  it('goes straight to password when no key file exists', async () => {
    const { session, prompter, authenticator } = setup([], ['hunter2']);
    session.outcomes = [{ kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: true, method: 'password' });
    expect(prompter.asked).toEqual(['🔑 Password']);
    expect(session.authCalls).toEqual([
      { method: 'password', username: 'alice', password: 'hunter2' },
    ]);
  });

  it('skips key attempts when the home directory is unknown', async () => {
    const { session, authenticator } = setup([RSA], ['pw'], undefined);
    session.outcomes = [{ kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: true, method: 'password' });
    expect(session.authCalls.map((c) => c.method)).toEqual(['password']);
  });

  it('stops at the first key that works without a passphrase', async () => {
    const { session, prompter, logger, authenticator } = setup([RSA, ED25519], []);
    session.outcomes = [{ kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: true, method: 'publickey', keyPath: RSA });
    expect(session.authCalls).toEqual([
      { method: 'publickey', username: 'alice', keyPath: RSA, passphrase: undefined },
    ]);
    expect(prompter.asked).toEqual([]);
    expect(logger.lines).toEqual([
      `info: 🔑 Trying SSH key: ${RSA}`,
      'success: Authenticated with SSH key (no passphrase)',
    ]);
  });

  it('prompts once for a passphrase and stops when it works', async () => {
    const { session, prompter, authenticator } = setup([RSA, ED25519], ['secret']);
    session.outcomes = [{ kind: 'rejected' }, { kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: true, method: 'publickey-passphrase', keyPath: RSA });
    expect(prompter.asked).toEqual(['🔑 SSH key passphrase']);
    expect(session.authCalls).toEqual([
      { method: 'publickey', username: 'alice', keyPath: RSA, passphrase: undefined },
      { method: 'publickey', username: 'alice', keyPath: RSA, passphrase: 'secret' },
    ]);
  });

  it('moves to the next existing key after both attempts fail', async () => {
    const { session, prompter, authenticator } = setup([RSA, ECDSA], ['wrong', 'unused-pass']);
    session.outcomes = [{ kind: 'rejected' }, { kind: 'rejected' }, { kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: true, method: 'publickey', keyPath: ECDSA });
    expect(prompter.asked).toEqual(['🔑 SSH key passphrase']);
    expect(session.authCalls.map((c) => c.keyPath)).toEqual([RSA, RSA, ECDSA]);
  });

  it('falls back to password after every key is rejected', async () => {
    const { session, prompter, authenticator } = setup([ED25519], ['pp', 'pw']);
    session.outcomes = [{ kind: 'rejected' }, { kind: 'rejected' }, { kind: 'succeeded' }];

    const result = await authenticator.authenticate(session, 'bob');

    expect(result).toEqual({ authenticated: true, method: 'password' });
    expect(prompter.asked).toEqual(['🔑 SSH key passphrase', '🔑 Password']);
  });

  it('fails without retrying when the password is rejected', async () => {
    const { session, prompter, logger, authenticator } = setup([], ['bad']);
    session.outcomes = [{ kind: 'rejected' }];

    const result = await authenticator.authenticate(session, 'alice');

    expect(result).toEqual({ authenticated: false });
    expect(prompter.asked).toEqual(['🔑 Password']);
    expect(session.authCalls).toHaveLength(1);
    expect(logger.lines).toContain('error: Password authentication failed');
  });

  it('aborts on a transport error during key authentication', async () => {
    const { session, prompter, authenticator } = setup([RSA, ED25519], []);
    session.outcomes = [{ kind: 'transport-error', error: new Error('connection reset') }];

    await expect(authenticator.authenticate(session, 'alice')).rejects.toThrow(TransportError);
    expect(session.authCalls).toHaveLength(1);
    expect(prompter.asked).toEqual([]);
  });

  it('aborts on a transport error during password authentication', async () => {
    const { session, authenticator } = setup([], ['pw']);
    session.outcomes = [{ kind: 'transport-error', error: new Error('connection reset') }];

    await expect(authenticator.authenticate(session, 'alice')).rejects.toThrow(
      'Authentication aborted: connection reset'
    );
  });

  it('logs the rejection reason at debug level', async () => {
    const { session, logger, authenticator } = setup([RSA], ['pp']);
    session.outcomes = [
      { kind: 'rejected', reason: 'Encrypted private key detected' },
      { kind: 'succeeded' },
    ];

    await authenticator.authenticate(session, 'alice');

    expect(logger.lines).toContain('debug: publickey rejected: Encrypted private key detected');
  });
});
