import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { HttpResponse, http } from 'msw';
import { setupServer } from 'msw/node';
import {
	afterAll,
	afterEach,
	beforeAll,
	beforeEach,
	describe,
	expect,
	it,
} from 'vitest';
import { cleanupDir, createMockLogger, createTempDir } from '../../__tests__/test-helpers';
import { getTokenPath } from '../../auth/token';
import { AuthError, NotFoundError, UploadError } from '../../errors';
import {
	ImporterClient,
	importDirectory,
	importFile,
	login,
	logout,
} from '../client';

const API_URL = 'https://api.test';
const server = setupServer();

interface Upload {
	name: string;
	type: string;
	content: string;
	authorization: string | null;
}

describe('ImporterClient', () => {
	let tempDir: string;
	let uploads: Upload[];

	beforeAll(() => {
		server.listen({ onUnhandledRequest: 'error' });
	});

	beforeEach(async () => {
		tempDir = await createTempDir();
		uploads = [];
	});

	afterEach(async () => {
		server.resetHandlers();
		await cleanupDir(tempDir);
	});

	afterAll(() => {
		server.close();
	});

	const recordUploads = (path: string, reject: string[] = []) =>
		http.post(`${API_URL}/${path}`, async ({ request }) => {
			const form = await request.formData();
			const file = form.get('file');
			if (file === null || typeof file === 'string') {
				return new HttpResponse('no file', { status: 400 });
			}
			uploads.push({
				name: file.name,
				type: file.type,
				content: await file.text(),
				authorization: request.headers.get('Authorization'),
			});
			if (reject.includes(file.name)) {
				return HttpResponse.json({ detail: 'invalid data' }, { status: 400 });
			}
			return HttpResponse.json({ ok: true }, { status: 201 });
		});

	describe('login', () => {
		it('should post credentials and store the token', async () => {
			let body: unknown;
			server.use(
				http.post(`${API_URL}/auth/login/`, async ({ request }) => {
					body = await request.json();
					return HttpResponse.json({ token: 'test-token' });
				}),
			);

			const token = await login(API_URL, 'admin_test', 'test-password', {
				tokenOptions: { root: tempDir },
			});

			expect(token).toBe('test-token');
			expect(body).toEqual({ username: 'admin_test', password: 'test-password' });
			expect(await readFile(getTokenPath({ root: tempDir }), 'utf-8')).toBe(
				'test-token\n',
			);
		});

		it('should strip trailing slashes from the API URL', async () => {
			server.use(
				http.post(`${API_URL}/auth/login/`, () => HttpResponse.json({ token: 'test-token' })),
			);

			await expect(
				login(`${API_URL}//`, 'admin_test', 'test-password', {
					tokenOptions: { root: tempDir },
				}),
			).resolves.toBe('test-token');
		});

		it('should throw AuthError with status and body when rejected', async () => {
			server.use(
				http.post(`${API_URL}/auth/login/`, () =>
					HttpResponse.json({ detail: 'Invalid credentials' }, { status: 401 }),
				),
			);

			const error = await login(API_URL, 'admin_test', 'wrong', {
				tokenOptions: { root: tempDir },
			}).catch((e: unknown) => e);

			expect(error).toBeInstanceOf(AuthError);
			expect(error).toMatchObject({
				status: 401,
				body: '{"detail":"Invalid credentials"}',
			});
		});

		it('should throw AuthError when the response has no token', async () => {
			server.use(http.post(`${API_URL}/auth/login/`, () => HttpResponse.json({})));

			await expect(
				login(API_URL, 'admin_test', 'test-password', {
					tokenOptions: { root: tempDir },
				}),
			).rejects.toBeInstanceOf(AuthError);
		});
	});

	describe('importFile', () => {
		it('should upload a mushaf with the token header', async () => {
			server.use(recordUploads('mushafs/import/'));
			const file = join(tempDir, 'hafs.json');
			await writeFile(file, '{"surahs":[]}');

			await importFile('mushaf', file, API_URL, 'test-token');

			expect(uploads).toEqual([
				{
					name: 'hafs.json',
					type: 'application/json',
					content: '{"surahs":[]}',
					authorization: 'Token test-token',
				},
			]);
		});

		it('should omit the header without a token', async () => {
			server.use(recordUploads('translations/import/'));
			const file = join(tempDir, 'en.json');
			await writeFile(file, '{}');

			await importFile('translation', file, API_URL);

			expect(uploads[0]?.authorization).toBeNull();
		});

		it('should throw UploadError with the response body', async () => {
			server.use(recordUploads('mushafs/import/', ['bad.json']));
			const file = join(tempDir, 'bad.json');
			await writeFile(file, '{}');

			await expect(importFile('mushaf', file, API_URL, 'test-token')).rejects.toMatchObject({
				name: 'UploadError',
				file: 'bad.json',
				status: 400,
				body: '{"detail":"invalid data"}',
			});
		});

		it('should wrap network errors in UploadError', async () => {
			server.use(http.post(`${API_URL}/mushafs/import/`, () => HttpResponse.error()));
			const file = join(tempDir, 'hafs.json');
			await writeFile(file, '{}');

			await expect(importFile('mushaf', file, API_URL)).rejects.toBeInstanceOf(UploadError);
		});

		it('should throw NotFoundError for a missing file', async () => {
			await expect(
				importFile('mushaf', join(tempDir, 'missing.json'), API_URL),
			).rejects.toBeInstanceOf(NotFoundError);
		});
	});

	describe('importDirectory', () => {
		it('should upload json files in lexical order and continue past failures', async () => {
			server.use(recordUploads('translations/import/', ['03-fa.json']));
			const dir = join(tempDir, 'translations');
			await mkdir(dir);
			for (const name of ['05-ur.json', '01-en.json', '03-fa.json', '04-tr.json', '02-de.json']) {
				await writeFile(join(dir, name), `{"name":"${name}"}`);
			}
			await writeFile(join(dir, 'notes.txt'), 'skip me');
			const logger = createMockLogger();

			const summary = await importDirectory(dir, API_URL, 'test-token', { logger });

			expect(summary).toEqual({ succeeded: 4, failed: 1, failedFiles: ['03-fa.json'] });
			expect(uploads.map((u) => u.name)).toEqual([
				'01-en.json',
				'02-de.json',
				'03-fa.json',
				'04-tr.json',
				'05-ur.json',
			]);
			expect(logger.error).toHaveBeenCalledTimes(1);
		});

		it('should use the mushaf endpoint when asked', async () => {
			server.use(recordUploads('mushafs/import/'));
			await writeFile(join(tempDir, 'hafs.json'), '{}');

			const summary = await new ImporterClient({ apiUrl: API_URL }).importDirectory(tempDir, {
				kind: 'mushaf',
			});

			expect(summary.succeeded).toBe(1);
		});

		it('should return an empty summary without json files', async () => {
			await expect(importDirectory(tempDir, API_URL)).resolves.toEqual({
				succeeded: 0,
				failed: 0,
				failedFiles: [],
			});
		});

		it('should throw NotFoundError for a missing directory', async () => {
			await expect(
				importDirectory(join(tempDir, 'missing'), API_URL),
			).rejects.toBeInstanceOf(NotFoundError);
		});
	});

	describe('logout', () => {
		it('should report whether a token was removed', async () => {
			server.use(
				http.post(`${API_URL}/auth/login/`, () => HttpResponse.json({ token: 'test-token' })),
			);
			await login(API_URL, 'admin_test', 'test-password', {
				tokenOptions: { root: tempDir },
			});

			await expect(logout({ root: tempDir })).resolves.toBe(true);
			await expect(logout({ root: tempDir })).resolves.toBe(false);
		});
	});
});
