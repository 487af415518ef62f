type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

/**
 * Splits `argv` into a command and its `--key=value` / `--key value`
 * options. A bare `--flag` reads as `'true'`.
 */
export function parseArgs(argv: readonly string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    // Split on the first '=' only; passwords may contain more
    const body = arg.slice(2);
    const separatorIndex = body.indexOf('=');
    const key = separatorIndex === -1 ? body : body.slice(0, separatorIndex);
    const maybeValue = separatorIndex === -1 ? undefined : body.slice(separatorIndex + 1);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

export function normalizeCommand(command?: string): string {
  if (!command || command === 'help' || command === '--help' || command === '-h') {
    return 'help';
  }

  return command;
}

export type { ParsedArgs };
