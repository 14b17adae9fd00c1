export interface ParsedArgs {
    command: string | null;
    positionals: string[];
    /** Values following each `--name`, in order. A bare flag maps to an empty list. */
    options: Map<string, string[]>;
}

export class UsageError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'UsageError';
    }
}

// Never take values, so `--force ./photos` keeps the directory positional
const BOOLEAN_FLAGS = new Set(['force', 'help']);

export function parseArgs(argv: string[]): ParsedArgs {
    const positionals: string[] = [];
    const options = new Map<string, string[]>();
    let current: string[] | null = null;

    for (const token of argv) {
        if (token.startsWith('--') && token.length > 2) {
            const body = token.slice(2);
            const eq = body.indexOf('=');
            const name = eq === -1 ? body : body.slice(0, eq);
            const values = options.get(name) ?? [];
            options.set(name, values);
            if (eq === -1) {
                current = BOOLEAN_FLAGS.has(name) ? null : values;
            } else {
                values.push(body.slice(eq + 1));
                current = null;
            }
        } else if (current && (positionals.length > 0 || current.length === 0)) {
            // Before the command an option takes one value, so `--db x.db stats` keeps its command
            current.push(token);
        } else {
            positionals.push(token);
        }
    }

    const [command = null, ...rest] = positionals;
    return { command, positionals: rest, options };
}

export const hasFlag = (args: ParsedArgs, name: string) => args.options.has(name);

export function getList(args: ParsedArgs, name: string): string[] {
    return args.options.get(name) ?? [];
}

export function getString(args: ParsedArgs, name: string): string | undefined {
    const values = args.options.get(name);
    if (!values) return undefined;
    if (values.length !== 1) throw new UsageError(`--${name} expects exactly one value`);
    return values[0];
}

export function getInteger(args: ParsedArgs, name: string): number | undefined {
    const value = getString(args, name);
    if (value === undefined) return undefined;
    if (!/^-?\d+$/.test(value)) throw new UsageError(`--${name} must be an integer, got '${value}'`);
    return Number(value);
}

export function requirePositional(args: ParsedArgs, label: string): string {
    const [value] = args.positionals;
    if (value === undefined) throw new UsageError(`Missing <${label}>`);
    return value;
}
