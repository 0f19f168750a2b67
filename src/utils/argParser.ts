import { InputError } from './errorHandler.js';

export interface OptionSpec {
    /** alias (with dashes) -> option name, for options that take a value */
    valued: Record<string, string>;
    /** alias (with dashes) -> flag name */
    flags: Record<string, string>;
}

export interface ParsedArgs {
    positionals: string[];
    values: Record<string, string[]>;
    flags: Set<string>;
}

export function parseArgs(argv: string[], options: OptionSpec): ParsedArgs {
    const parsed: ParsedArgs = { positionals: [], values: {}, flags: new Set() };

    for (let i = 0; i < argv.length; i++) {
        const a = argv[i];

        if (a === '--') {
            parsed.positionals.push(...argv.slice(i + 1));
            break;
        }
        if (!a.startsWith('-') || a === '-') {
            parsed.positionals.push(a);
            continue;
        }

        const eq = a.indexOf('=');
        const alias = a.startsWith('--') && eq > 0 ? a.slice(0, eq) : a;
        const inline = a.startsWith('--') && eq > 0 ? a.slice(eq + 1) : undefined;

        const flag = options.flags[alias];
        if (flag) {
            if (inline !== undefined) throw new InputError(`Option ${alias} does not take a value`);
            parsed.flags.add(flag);
            continue;
        }

        const name = options.valued[alias];
        if (!name) throw new InputError(`Unknown option: ${alias}`);

        let value = inline;
        if (value === undefined) {
            const next = argv[i + 1];
            if (next === undefined || next.startsWith('-')) {
                throw new InputError(`Option ${alias} requires a value`);
            }
            value = next;
            i++;
        }
        (parsed.values[name] ??= []).push(value);
    }

    return parsed;
}

export function getOption(args: ParsedArgs, name: string): string | undefined {
    const values = args.values[name];
    return values ? values[values.length - 1] : undefined;
}

export function getOptionList(args: ParsedArgs, name: string): string[] {
    return (args.values[name] ?? []).flatMap(value => value.split(',')).map(v => v.trim()).filter(Boolean);
}

export function parsePositiveInt(value: string | undefined, label: string): number {
    const n = value === undefined ? NaN : Number(value);
    if (!Number.isInteger(n) || n < 1) {
        throw new InputError(`${label} must be a positive integer, got "${value ?? ''}"`);
    }
    return n;
}
