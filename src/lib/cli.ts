import { errorMessage } from './errors.js';

export interface ParsedArgs {
  positional: string[];
  flags: Record<string, string>;
}

/** `--key value` pairs become flags; a `--key` with no value is `'true'`. */
export function parseArgs(args: readonly string[]): ParsedArgs {
  const positional: string[] = [];
  const flags: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === undefined) continue;
    if (arg.startsWith('--')) {
      const key = arg.slice(2);
      const next: string | undefined = args[i + 1];
      if (next !== undefined && !next.startsWith('--')) {
        flags[key] = next;
        i++;
      } else {
        flags[key] = 'true';
      }
    } else {
      positional.push(arg);
    }
  }
  return { positional, flags };
}

/** `--model a,b` → `['a', 'b']`; absent flag → undefined (use config). */
export function modelsFlag(flags: Record<string, string>): string[] | undefined {
  const raw = flags.model;
  if (!raw || raw === 'true') return undefined;
  const models = raw.split(',').map((m) => m.trim()).filter(Boolean);
  return models.length > 0 ? models : undefined;
}

export function numberFlag(flags: Record<string, string>, key: string): number | undefined {
  const raw = flags[key];
  if (raw === undefined) return undefined;
  const n = Number(raw);
  if (!Number.isFinite(n)) throw new Error(`--${key} expects a number, got "${raw}"`);
  return n;
}

export function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

export function usage(line: string): never {
  console.error(`Usage: ${line}`);
  process.exit(1);
}

/** Run a command's async body; errors print their message and exit 1. */
export function runMain(main: () => Promise<void>): void {
  main().catch((err: unknown) => {
    console.error(`❌ ${errorMessage(err)}`);
    process.exit(1);
  });
}
