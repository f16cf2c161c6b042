import { existsSync } from 'node:fs';
import { readFile, writeFile } from 'node:fs/promises';
import { NotFoundError, TemplateMalformedError } from '../errors';

const BODY_SIZE = /^\d+[kKmMgG]?$/;
const BODY_SIZE_LINE = /client_max_body_size/;
const MIME_INCLUDE = /include mime\.types;/;

/**
 * Replace every `client_max_body_size` directive with one placed after each
 * `include mime.types;` line.
 */
export function applyClientMaxBodySize(conf: string, size: string): string {
	if (!BODY_SIZE.test(size)) {
		throw new RangeError(
			`Invalid upload size "${size}", expected a number with an optional k, m or g suffix`,
		);
	}

	const eol = conf.includes('\r\n') ? '\r\n' : '\n';
	const output: string[] = [];
	let anchors = 0;

	for (const line of conf.split(/\r?\n/)) {
		if (BODY_SIZE_LINE.test(line)) continue;
		output.push(line);
		if (MIME_INCLUDE.test(line)) {
			output.push(`    client_max_body_size ${size};`);
			anchors++;
		}
	}

	if (anchors === 0) {
		throw new TemplateMalformedError(
			'nginx.conf has no "include mime.types;" line to anchor client_max_body_size',
		);
	}

	return output.join(eol);
}

export async function updateNginxConfig(path: string, size: string): Promise<void> {
	if (!existsSync(path)) {
		throw new NotFoundError(`Nginx config not found: ${path}`, path);
	}
	const conf = await readFile(path, 'utf-8');
	await writeFile(path, applyClientMaxBodySize(conf, size));
}
