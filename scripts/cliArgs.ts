export interface CliArgs {
  string(name: string): string | undefined;
  number(name: string, fallback: number): number;
  flag(name: string): boolean;
}

/**
 * Read `--name value`, `--name=value` and bare `--flag` options. A token
 * that is followed by another `--` option, or by nothing, is a flag.
 */
export function readArgs(argv: readonly string[] = process.argv.slice(2)): CliArgs {
  const values = new Map<string, string>();
  const flags = new Set<string>();

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    if (token === undefined || !token.startsWith("--")) continue;

    const body = token.slice(2);
    const eq = body.indexOf("=");
    if (eq !== -1) {
      values.set(body.slice(0, eq), body.slice(eq + 1));
      continue;
    }

    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      flags.add(body);
    } else {
      values.set(body, next);
      i++;
    }
  }

  return {
    string: (name) => values.get(name),
    number: (name, fallback) => {
      const raw = values.get(name);
      if (raw === undefined || raw.trim() === "") return fallback;
      const n = Number(raw);
      return Number.isFinite(n) ? n : fallback;
    },
    flag: (name) => flags.has(name),
  };
}
