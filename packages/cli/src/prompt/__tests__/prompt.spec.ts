import { PassThrough } from 'node:stream';
import prompts from 'prompts';
import { afterEach, describe, expect, it, vi } from 'vitest';
import { createMockLogger, FakeCommandRunner } from '../../__tests__/test-helpers';
import { CancelledError } from '../../errors';
import { createPrompter, editorCandidates, resolveEditor } from '../index';

describe('editorCandidates', () => {
	it('should try VISUAL and EDITOR before the fallbacks', () => {
		expect(editorCandidates({ VISUAL: 'code --wait', EDITOR: 'micro' })).toEqual([
			{ command: 'code', args: ['--wait'] },
			{ command: 'micro', args: [] },
			{ command: 'nano', args: [] },
			{ command: 'vim', args: [] },
			{ command: 'vi', args: [] },
		]);
	});

	it('should skip empty variables', () => {
		expect(editorCandidates({ VISUAL: '  ' }).map((c) => c.command)).toEqual([
			'nano',
			'vim',
			'vi',
		]);
	});
});

describe('resolveEditor', () => {
	it('should pick the first installed editor', async () => {
		const runner = new FakeCommandRunner(['vim', 'vi']);

		await expect(resolveEditor(runner, { EDITOR: 'micro' })).resolves.toEqual({
			command: 'vim',
			args: [],
		});
	});

	it('should return undefined when nothing is installed', async () => {
		await expect(resolveEditor(new FakeCommandRunner([]), {})).resolves.toBeUndefined();
	});
});

describe('createPrompter', () => {
	afterEach(() => {
		vi.useRealTimers();
		vi.restoreAllMocks();
	});

	it('should return the default without asking when assumeYes is set', async () => {
		const prompter = createPrompter({
			runner: new FakeCommandRunner(),
			assumeYes: true,
			interactive: true,
		});

		await expect(prompter.confirm('Keep .env?', false)).resolves.toBe(false);
		await expect(prompter.confirm('Create .env?', true)).resolves.toBe(true);
	});

	it('should return the default when not interactive', async () => {
		const prompter = createPrompter({
			runner: new FakeCommandRunner(),
			interactive: false,
		});

		await expect(prompter.confirm('Create .env?', true)).resolves.toBe(true);
	});

	it('should use injected answers when interactive', async () => {
		prompts.inject([true]);
		const prompter = createPrompter({
			runner: new FakeCommandRunner(),
			interactive: true,
		});

		await expect(prompter.confirm('Keep .env?', false)).resolves.toBe(true);
	});

	it('should throw CancelledError when the question is aborted', async () => {
		prompts.inject([new Error('aborted')]);
		const prompter = createPrompter({
			runner: new FakeCommandRunner(),
			interactive: true,
		});

		await expect(
			prompter.confirm('Do you want to create a new .env file?', true),
		).rejects.toBeInstanceOf(CancelledError);
	});

	it('should fall back to the default when nobody answers in time', async () => {
		vi.useFakeTimers();
		const logger = createMockLogger();
		const prompter = createPrompter({
			runner: new FakeCommandRunner(),
			interactive: true,
			timeoutMs: 15_000,
			input: new PassThrough(),
			output: new PassThrough(),
			logger,
		});

		const answer = prompter.confirm('Do you want to create a new .env file?', true);
		await vi.advanceTimersByTimeAsync(15_000);

		await expect(answer).resolves.toBe(true);
		expect(logger.warn).toHaveBeenCalledWith(
			{ question: 'Do you want to create a new .env file?', answer: true },
			'No answer, using default',
		);
	});

	it('should open the chosen editor on the file', async () => {
		prompts.inject([true]);
		const runner = new FakeCommandRunner(['nano']);
		const prompter = createPrompter({ runner, interactive: true, env: {} });

		await expect(prompter.offerEdit('/srv/app/.env', '.env')).resolves.toBe(true);

		expect(runner.calls).toEqual([
			{ command: 'nano', args: ['/srv/app/.env'], options: { interactive: true } },
		]);
	});

	it('should warn when no editor is available', async () => {
		const logger = createMockLogger();
		const prompter = createPrompter({
			runner: new FakeCommandRunner([]),
			assumeYes: true,
			env: {},
			logger,
		});

		await expect(prompter.offerEdit('/srv/app/.env', '.env', true)).resolves.toBe(false);
		expect(logger.warn).toHaveBeenCalledWith(
			{ file: '/srv/app/.env' },
			'No editor found (set $EDITOR), edit the file manually',
		);
	});

	it('should not edit when declined', async () => {
		const runner = new FakeCommandRunner(['nano']);
		const prompter = createPrompter({ runner, assumeYes: true, env: {} });

		await expect(prompter.offerEdit('/srv/app/.env', '.env')).resolves.toBe(false);
		expect(runner.calls).toHaveLength(0);
	});

	it('should report a failed editor', async () => {
		const runner = new FakeCommandRunner(['nano']).when('nano', { exitCode: 1 });
		const prompter = createPrompter({ runner, assumeYes: true, env: {} });

		await expect(prompter.offerEdit('/srv/app/.env', '.env', true)).resolves.toBe(false);
	});
});
