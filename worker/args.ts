import type { SubstitutionMode } from '@/types';

export interface ExtractCommand {
    command: 'extract';
    input: string;
    output?: string;
    includeRaw: boolean;
    minLength?: number;
    maxLength?: number;
    excludeLayers?: string[];
    onlyCjk: boolean;
    verbose: boolean;
}

export interface TranslateCommand {
    command: 'translate';
    input: string;
    table: string;
    output?: string;
    font?: string;
    mode?: SubstitutionMode;
    fontReduction?: number;
    attributes: boolean;
    verbose: boolean;
}

export type CliCommand = ExtractCommand | TranslateCommand | { command: 'help' };

export const USAGE = `Usage:
  extract <file|dir> [--output texts.xlsx] [--include-raw] [--only-cjk]
          [--min-length n] [--max-length n] [--exclude-layers A,B] [--verbose]
  translate <file|dir> --table table.xlsx|table.csv [--output dir] [--font name]
            [--replace] [--font-reduction n] [--attributes] [--verbose]`;

export class UsageError extends Error {}

interface CommandOptions {
    values: readonly string[];
    switches: readonly string[];
}

const OPTIONS: Record<'extract' | 'translate', CommandOptions> = {
    extract: {
        values: ['--output', '--min-length', '--max-length', '--exclude-layers'],
        switches: ['--include-raw', '--only-cjk', '--verbose']
    },
    translate: {
        values: ['--output', '--table', '--font', '--font-reduction'],
        switches: ['--replace', '--attributes', '--verbose']
    }
};

function takeValue(argv: string[], i: number, flag: string): string {
    const value = argv[i + 1];
    if (value === undefined || value.startsWith('--')) {
        throw new UsageError(`${flag} needs a value`);
    }
    return value;
}

function readNumber(flags: Map<string, string>, flag: string, integer = false): number | undefined {
    const raw = flags.get(flag);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    if (!Number.isFinite(value) || (integer && !Number.isInteger(value))) {
        throw new UsageError(`${flag} must be ${integer ? 'an integer' : 'a number'}, got "${raw}"`);
    }
    return value;
}

export function parseArgs(argv: string[]): CliCommand {
    const [command, ...rest] = argv;
    if (!command || command === '--help' || command === '-h' || command === 'help') {
        return { command: 'help' };
    }
    if (command !== 'extract' && command !== 'translate') {
        throw new UsageError(`Unknown command "${command}"`);
    }

    const { values, switches: known } = OPTIONS[command];
    const positional: string[] = [];
    const flags = new Map<string, string>();
    const switches = new Set<string>();

    for (let i = 0; i < rest.length; i++) {
        const arg = rest[i];
        if (values.includes(arg)) {
            flags.set(arg, takeValue(rest, i, arg));
            i++;
        } else if (known.includes(arg)) {
            switches.add(arg);
        } else if (arg.startsWith('--')) {
            throw new UsageError(`Unknown option "${arg}" for ${command}`);
        } else {
            positional.push(arg);
        }
    }

    const input = positional[0];
    if (!input) {
        throw new UsageError(`${command} needs an input file or directory`);
    }

    if (command === 'extract') {
        const layers = flags.get('--exclude-layers');
        return {
            command,
            input,
            output: flags.get('--output'),
            includeRaw: switches.has('--include-raw'),
            minLength: readNumber(flags, '--min-length', true),
            maxLength: readNumber(flags, '--max-length', true),
            excludeLayers: layers?.split(',').map(layer => layer.trim()).filter(layer => layer.length > 0),
            onlyCjk: switches.has('--only-cjk'),
            verbose: switches.has('--verbose')
        };
    }

    const table = flags.get('--table');
    if (!table) {
        throw new UsageError('translate needs --table');
    }

    return {
        command,
        input,
        table,
        output: flags.get('--output'),
        font: flags.get('--font'),
        mode: switches.has('--replace') ? 'replace' : undefined,
        fontReduction: readNumber(flags, '--font-reduction'),
        attributes: switches.has('--attributes'),
        verbose: switches.has('--verbose')
    };
}
