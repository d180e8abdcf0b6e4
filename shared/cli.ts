import { config as loadDotenv } from 'dotenv';
import { ZodError, type ZodType, type ZodTypeDef } from 'zod';

export class CLIError extends Error {}

export function requireValue(argv: string[], index: number, flag: string): string {
  const value = argv[index];
  if (!value || value.startsWith('--')) {
    throw new CLIError(`Missing value for ${flag}`);
  }
  return value;
}

export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function loadEnvironment(): void {
  loadDotenv();
}

export function parseConfig<T>(schema: ZodType<T, ZodTypeDef, unknown>, input: unknown): T {
  try {
    return schema.parse(input);
  } catch (error) {
    if (error instanceof ZodError) {
      const details = error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
      throw new CLIError(`Invalid configuration (${details.join('; ')})`);
    }
    throw error;
  }
}

/**
 * Runs a CLI entry point. The resolved number becomes the process exit code; a thrown
 * error prints a short message and exits with 1.
 */
export function runMain(main: () => Promise<number>): void {
  void (async () => {
    try {
      process.exitCode = await main();
    } catch (error) {
      if (error instanceof CLIError) {
        console.error(`Error: ${error.message}`);
        console.error('Use --help to see available options.');
      } else {
        console.error('Unexpected error:', error);
      }
      process.exit(1);
    }
  })();
}

export interface ParsedFlags {
  /** Flag values keyed by the environment variable each flag overrides. */
  values: Record<string, string>;
  showHelp: boolean;
}

/**
 * Reads `--flag value` pairs. `flags` maps each accepted flag to the environment variable
 * it overrides, so the result can be layered over `process.env` and validated once.
 */
export function parseFlags(argv: string[], flags: Readonly<Record<string, string | undefined>>): ParsedFlags {
  const values: Record<string, string> = {};
  let showHelp = false;

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (!token.startsWith('--')) {
      throw new CLIError(`Unexpected argument: ${token}`);
    }
    const key = token.slice(2);
    if (key === 'help') {
      showHelp = true;
      continue;
    }
    const target = flags[key];
    if (!target) {
      throw new CLIError(`Unknown flag: --${key}`);
    }
    values[target] = requireValue(argv, ++i, token);
  }

  return { values, showHelp };
}
