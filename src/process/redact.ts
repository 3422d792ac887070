const SECRET_FLAGS = new Set(['--encryption-passphrase', '--passphrase', '-p']);

/**
 * Renders a command for the log with passphrase values and archive names
 * masked.
 */
export function redactCommand(command: readonly string[]): string {
  const out: string[] = [];
  for (let i = 0; i < command.length; i++) {
    const arg = command[i];
    if (SECRET_FLAGS.has(arg) && i + 1 < command.length) {
      out.push(arg, '[REDACTED]');
      i++;
      continue;
    }
    const parts = arg.split('::');
    if (parts.length === 2) {
      out.push(`${parts[0]}::[ARCHIVE]`);
      continue;
    }
    out.push(arg);
  }
  return out.join(' ');
}
