import { parseDocument } from 'yaml';
import type { EnvironmentField, EnvironmentValues } from '../env/types';
import { EmptyOutputError, TemplateMalformedError } from '../errors';

/**
 * Keys rewritten wherever they appear, and the field that supplies each.
 */
export const RECOGNISED_KEYS = {
	POSTGRES_USER: 'databaseUser',
	POSTGRES_PASSWORD: 'databasePassword',
	DATABASE_USERNAME: 'databaseUsername',
	DATABASE_PASSWORD: 'databaseSecret',
	RABBITMQ_DEFAULT_USER: 'brokerUser',
	RABBITMQ_DEFAULT_PASS: 'brokerPassword',
	CELERY_BROKER_URL: 'brokerUrl',
	SECRET_KEY: 'secretKey',
	FORCED_ALIGNMENT_SECRET_KEY: 'forcedAlignmentSecretKey',
	DJANGO_ALLOWED_HOSTS: 'allowedHosts',
	DEBUG: 'debug',
} as const satisfies Record<string, EnvironmentField>;

/**
 * Keys that belong to the target service's environment block only.
 * Inserted when missing.
 */
export const DERIVED_KEYS = {
	AWS_ACCESS_KEY_ID: 'storageAccessKey',
	AWS_SECRET_ACCESS_KEY: 'storageSecretKey',
	AWS_S3_ENDPOINT_URL: 'storageEndpoint',
} as const satisfies Record<string, EnvironmentField>;

type RecognisedKey = keyof typeof RECOGNISED_KEYS;
type DerivedKey = keyof typeof DERIVED_KEYS;

const DERIVED_ORDER: readonly DerivedKey[] = [
	'AWS_ACCESS_KEY_ID',
	'AWS_SECRET_ACCESS_KEY',
	'AWS_S3_ENDPOINT_URL',
];

export type TemplaterState =
	| 'Outside'
	| 'InTargetService'
	| 'InTargetEnvironmentBlock'
	| 'InsertedDone';

export interface RenderResult {
	document: string;
	/** Derived keys added to the target environment block, in order */
	inserted: DerivedKey[];
	/** Number of lines rewritten per key */
	substituted: Partial<Record<RecognisedKey | DerivedKey, number>>;
}

type BlockStyle = 'mapping' | 'list';

interface MappingLine {
	kind: 'mapping';
	indent: string;
	quote: string;
	key: string;
	/** Everything between the key and the value, e.g. `: ` */
	separator: string;
	value: string;
}

interface ListEntryLine {
	kind: 'list';
	indent: string;
	marker: string;
	quote: string;
	key: string;
	value: string;
}

interface OtherLine {
	kind: 'other';
	indent: string;
}

type ParsedLine = MappingLine | ListEntryLine | OtherLine;

const MAPPING_LINE =
	/^([ \t]*)(["']?)([^\s:#"'{}[\],&*!|>%@`-][^:#"']*?)\2(\s*:)(\s+|$)(.*)$/;
const LIST_ENTRY = /^([ \t]*)(-[ \t]+)(["']?)([A-Za-z_][A-Za-z0-9_]*)=(.*?)\3[ \t]*$/;
/** `- KEY`, taking its value from the host environment */
const BARE_LIST_ENTRY = /^([ \t]*)(-[ \t]+)(["']?)([A-Za-z_][A-Za-z0-9_]*)\3[ \t]*$/;
const BLOCK_SCALAR = /^[|>](?:[1-9][+-]?|[+-][1-9]?)?(?:[ \t]+#.*)?$/;
const RESERVED_WORDS = /^(?:y|yes|n|no|true|false|on|off|null|~)$/i;

function leadingWhitespace(line: string): string {
	return /^[ \t]*/.exec(line)?.[0] ?? '';
}

function isTransparent(line: string): boolean {
	const content = line.trim();
	return content === '' || content.startsWith('#');
}

function parseLine(line: string): ParsedLine {
	const list = LIST_ENTRY.exec(line);
	if (list) {
		const [, indent, marker, quote, key, value] = list;
		return { kind: 'list', indent, marker, quote, key, value };
	}

	const mapping = MAPPING_LINE.exec(line);
	if (mapping) {
		const [, indent, quote, key, colon, space, value] = mapping;
		return {
			kind: 'mapping',
			indent,
			quote,
			key,
			separator: colon + (space || ' '),
			value,
		};
	}

	return { kind: 'other', indent: leadingWhitespace(line) };
}

function parseEnvironmentLine(raw: string): ParsedLine {
	const line = parseLine(raw);
	if (line.kind !== 'other') return line;

	const bare = BARE_LIST_ENTRY.exec(raw);
	if (!bare) return line;
	const [, indent, marker, quote, key] = bare;
	return { kind: 'list', indent, marker, quote, key, value: '' };
}

function opensBlockScalar(line: ParsedLine): boolean {
	return line.kind === 'mapping' && BLOCK_SCALAR.test(line.value.trim());
}

function isPlainSafe(value: string): boolean {
	return (
		/^[^\s'"#&*!|>%@`{}[\],?:-][^\s'"{}[\],#]*$/.test(value) &&
		!value.endsWith(':') &&
		!RESERVED_WORDS.test(value)
	);
}

function doubleQuote(value: string): string {
	return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

function requote(value: string, quote: string): string {
	if (quote === "'") {
		return `'${value.replace(/'/g, "''")}'`;
	}
	return doubleQuote(value);
}

function formatMapping(line: MappingLine, value: string): string {
	const formatted = isPlainSafe(value) ? value : doubleQuote(value);
	return `${line.indent}${line.quote}${line.key}${line.quote}${line.separator}${formatted}`;
}

function formatListEntry(
	indent: string,
	marker: string,
	quote: string,
	key: string,
	value: string,
): string {
	const item = `${key}=${value}`;
	if (quote) return `${indent}${marker}${requote(item, quote)}`;
	return `${indent}${marker}${isPlainSafe(item) ? item : doubleQuote(item)}`;
}

function isRecognised(key: string): key is RecognisedKey {
	return Object.hasOwn(RECOGNISED_KEYS, key);
}

function isDerived(key: string): key is DerivedKey {
	return Object.hasOwn(DERIVED_KEYS, key);
}

function keyOf(line: ParsedLine): string | undefined {
	return line.kind === 'other' ? undefined : line.key;
}

interface EnvironmentBlock {
	indent: number;
	/** Output index after which derived keys are inserted */
	lastEntry: number;
	entryIndent?: string;
	style?: BlockStyle;
	present: Set<DerivedKey>;
}

/**
 * Rewrite a compose template with the given values.
 *
 * The walk is line based so untouched lines, comments and indentation are
 * preserved exactly. Only the narrow YAML subset compose files use is
 * understood: block mappings, `- KEY=value` and `- KEY` environment lists
 * (indented or level with `environment:`), and block scalars, which are
 * copied without matching. The target service must be a direct child of a
 * top-level `services:` mapping.
 */
export function render(
	template: string,
	env: EnvironmentValues,
	targetService: string,
): RenderResult {
	const eol = template.includes('\r\n') ? '\r\n' : '\n';
	const lines = template.split(/\r?\n/);
	const trailingEol = lines.length > 1 && lines.at(-1) === '';
	if (trailingEol) lines.pop();

	const output: string[] = [];
	const inserted: DerivedKey[] = [];
	const substituted: RenderResult['substituted'] = {};

	let state: TemplaterState = 'Outside';
	let serviceFound = false;
	let serviceIndent = 0;
	let serviceChildIndent: number | undefined;
	/** Indent of the entries of the top-level `services:` mapping, while inside it */
	let servicesEntryIndent: number | undefined;
	let inServices = false;
	let block: EnvironmentBlock | undefined;
	let scalarIndent: number | undefined;

	const count = (key: RecognisedKey | DerivedKey) => {
		substituted[key] = (substituted[key] ?? 0) + 1;
	};

	const substitute = (raw: string, line: ParsedLine, allowDerived: boolean): string => {
		if (line.kind === 'other') return raw;

		let value: string;
		if (isRecognised(line.key)) {
			value = env[RECOGNISED_KEYS[line.key]];
			count(line.key);
		} else if (allowDerived && isDerived(line.key)) {
			value = env[DERIVED_KEYS[line.key]];
			count(line.key);
		} else {
			return raw;
		}

		return line.kind === 'mapping'
			? formatMapping(line, value)
			: formatListEntry(line.indent, line.marker, line.quote, line.key, value);
	};

	const insertDerived = (current: EnvironmentBlock) => {
		const missing = DERIVED_ORDER.filter((key) => !current.present.has(key));
		const indent =
			current.entryIndent ?? `${' '.repeat(current.indent)}  `;
		const style = current.style ?? 'mapping';

		const newLines = missing.map((key) => {
			const value = env[DERIVED_KEYS[key]];
			return style === 'list'
				? formatListEntry(indent, '- ', '', key, value)
				: `${indent}${key}: ${isPlainSafe(value) ? value : doubleQuote(value)}`;
		});

		output.splice(current.lastEntry + 1, 0, ...newLines);
		inserted.push(...missing);
	};

	for (const raw of lines) {
		const width = leadingWhitespace(raw).length;

		if (scalarIndent !== undefined) {
			if (raw.trim() === '' || width > scalarIndent) {
				output.push(raw);
				if (state === 'InTargetEnvironmentBlock' && block && raw.trim() !== '') {
					block.lastEntry = output.length - 1;
				}
				continue;
			}
			scalarIndent = undefined;
		}

		if (isTransparent(raw)) {
			output.push(raw);
			continue;
		}

		const line =
			state === 'InTargetEnvironmentBlock' ? parseEnvironmentLine(raw) : parseLine(raw);

		if (state === 'InTargetEnvironmentBlock' && block) {
			const compactEntry =
				width === block.indent &&
				line.kind === 'list' &&
				block.style !== 'mapping';
			if (width <= block.indent && !compactEntry) {
				insertDerived(block);
				block = undefined;
				state = 'InsertedDone';
			} else {
				if (block.entryIndent === undefined) {
					block.entryIndent = line.indent;
					block.style = raw.trimStart().startsWith('-') ? 'list' : 'mapping';
				}

				const atEntryLevel = width === block.entryIndent.length;
				const key = keyOf(line);
				if (atEntryLevel && key !== undefined && isDerived(key)) {
					block.present.add(key);
				}

				if (opensBlockScalar(line)) {
					scalarIndent = width;
					output.push(raw);
				} else {
					output.push(substitute(raw, line, atEntryLevel));
				}
				block.lastEntry = output.length - 1;
				continue;
			}
		}

		if (state === 'InTargetService' && width <= serviceIndent) {
			state = 'Outside';
			serviceChildIndent = undefined;
		}

		if (inServices && width === 0) {
			inServices = false;
			servicesEntryIndent = undefined;
		}
		if (inServices) {
			servicesEntryIndent ??= width;
		}

		if (
			width === 0 &&
			line.kind === 'mapping' &&
			line.key === 'services' &&
			isTransparent(line.value)
		) {
			inServices = true;
			output.push(raw);
			continue;
		}

		if (
			state === 'Outside' &&
			inServices &&
			width === servicesEntryIndent &&
			line.kind === 'mapping' &&
			line.key === targetService &&
			isTransparent(line.value)
		) {
			state = 'InTargetService';
			serviceFound = true;
			serviceIndent = width;
			serviceChildIndent = undefined;
			output.push(raw);
			continue;
		}

		if (state === 'InTargetService') {
			serviceChildIndent ??= width;
			if (
				line.kind === 'mapping' &&
				line.key === 'environment' &&
				width === serviceChildIndent &&
				isTransparent(line.value)
			) {
				output.push(raw);
				state = 'InTargetEnvironmentBlock';
				block = {
					indent: width,
					lastEntry: output.length - 1,
					present: new Set(),
				};
				continue;
			}
		}

		if (opensBlockScalar(line)) {
			scalarIndent = width;
			output.push(raw);
			continue;
		}

		output.push(substitute(raw, line, false));
	}

	if (state === 'InTargetEnvironmentBlock' && block) {
		insertDerived(block);
		state = 'InsertedDone';
	}

	if (!serviceFound) {
		throw new TemplateMalformedError(
			`Service "${targetService}" is not declared in the template`,
		);
	}

	const document = output.join(eol) + (trailingEol ? eol : '');
	if (document.length === 0) {
		throw new EmptyOutputError();
	}

	const parsed = parseDocument(document);
	const [firstError] = parsed.errors;
	if (firstError) {
		throw new TemplateMalformedError(
			`Rendered document is not valid YAML: ${firstError.message}`,
			{ cause: firstError },
		);
	}

	return { document, inserted, substituted };
}
