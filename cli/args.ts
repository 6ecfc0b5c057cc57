/**
 * Command line argument parsing.
 */

export interface ParsedArgs {
	command: string;
	args: string[];
	options: Record<string, string | string[] | boolean>;
}

/**
 * Parse command line arguments.
 * `--key value` and `-k value` take every following non-flag token as values;
 * a flag followed by another flag (or nothing) is boolean.
 */
export function parseArgs(argv: string[]): ParsedArgs {
	const args = argv.slice(2);
	const command = args[0] ?? "help";
	const restArgs: string[] = [];
	const options: Record<string, string | string[] | boolean> = {};

	let i = 1;
	while (i < args.length) {
		const arg = args[i];
		i++;
		if (arg === undefined || arg === "") continue;

		if (!arg.startsWith("-")) {
			restArgs.push(arg);
			continue;
		}

		const key = arg.startsWith("--") ? arg.slice(2) : arg.slice(1);
		const values: string[] = [];
		let next = args[i];
		while (next !== undefined && next !== "" && !next.startsWith("-")) {
			values.push(next);
			i++;
			next = args[i];
		}

		if (values.length === 0) {
			options[key] = true;
		} else {
			options[key] = values.length === 1 && values[0] !== undefined ? values[0] : values;
		}
	}

	return { command, args: restArgs, options };
}

/**
 * Read a single string option; arrays yield their last value.
 */
export function getStringOption(
	options: ParsedArgs["options"],
	key: string,
): string | undefined {
	const value = options[key];
	if (typeof value === "string") return value;
	if (Array.isArray(value)) return value[value.length - 1];
	return undefined;
}

export function getBooleanOption(options: ParsedArgs["options"], key: string): boolean {
	return options[key] === true;
}
