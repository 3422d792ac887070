import { describe, it, expect } from 'vitest';
import { redactCommand } from './redact';

describe('redactCommand', () => {
  it('masks the value following a passphrase flag', () => {
    expect(redactCommand(['borg', 'init', '--encryption-passphrase', 'test-secret', '/repo'])).toBe(
      'borg init --encryption-passphrase [REDACTED] /repo'
    );
    expect(redactCommand(['tool', '-p', 'test-secret'])).toBe('tool -p [REDACTED]');
    expect(redactCommand(['tool', '--passphrase', 'test-secret', '--verbose'])).toBe(
      'tool --passphrase [REDACTED] --verbose'
    );
  });

  it('masks the archive part of a repository::archive argument', () => {
    expect(redactCommand(['borg', 'create', '/srv/repo::host-2024-01-01', '/home'])).toBe(
      'borg create /srv/repo::[ARCHIVE] /home'
    );
  });

  it('leaves a trailing flag without a value untouched', () => {
    expect(redactCommand(['tool', '-p'])).toBe('tool -p');
  });
});
