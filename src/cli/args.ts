/**
 * @file Front-end argument parsing
 *
 * Both pickers take the same shape of command line:
 *
 *   <prog> [--list] [--help] [--version] [--root <dir>] [query...] [-- args...]
 *
 * Everything after the first `--` is handed untouched to whatever the
 * picker resolves.
 *
 * @module
 */

export interface PickerArgs {
    query: string[];
    passthrough: string[];
    list: boolean;
    help: boolean;
    version: boolean;
    root: string | null;
    errors: string[];
}

/**
 * Split argv into picker options, query words and passthrough arguments.
 */
export function pickerArgs_parse(argv: readonly string[]): PickerArgs {
    const parsed: PickerArgs = {
        query: [],
        passthrough: [],
        list: false,
        help: false,
        version: false,
        root: null,
        errors: [],
    };

    const separator: number = argv.indexOf('--');
    const own: readonly string[] = separator === -1 ? argv : argv.slice(0, separator);
    parsed.passthrough = separator === -1 ? [] : argv.slice(separator + 1);

    for (let i = 0; i < own.length; i++) {
        const arg: string = own[i];
        if (arg === '--list' || arg === '-l') {
            parsed.list = true;
        } else if (arg === '--help' || arg === '-h') {
            parsed.help = true;
        } else if (arg === '--version' || arg === '-V') {
            parsed.version = true;
        } else if (arg === '--root') {
            if (i + 1 < own.length) {
                parsed.root = own[++i];
            } else {
                parsed.errors.push('--root requires a directory');
            }
        } else if (arg.startsWith('--root=')) {
            parsed.root = arg.slice('--root='.length);
        } else if (arg.startsWith('-') && arg.length > 1) {
            parsed.errors.push(`unknown option: ${arg}`);
        } else {
            parsed.query.push(arg);
        }
    }

    return parsed;
}

/**
 * Query words joined into one search string.
 */
export function query_join(words: readonly string[]): string {
    return words.join(' ').trim();
}
