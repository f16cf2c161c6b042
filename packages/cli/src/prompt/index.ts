import type { Readable, Writable } from 'node:stream';
import { type Logger, SILENT_LOGGER } from '@berth/logger';
import prompts from 'prompts';
import type { CommandRunner } from '../deploy/runner';
import { CancelledError } from '../errors';

export interface EditorCommand {
	command: string;
	args: string[];
}

/**
 * Editors to try in order: $VISUAL, $EDITOR, then nano, vim and vi.
 * Variables may carry arguments, e.g. `EDITOR="code --wait"`.
 */
export function editorCandidates(
	env: Record<string, string | undefined> = process.env,
): EditorCommand[] {
	const candidates: EditorCommand[] = [];
	for (const value of [env.VISUAL, env.EDITOR]) {
		const [command, ...args] = value?.trim().split(/\s+/) ?? [];
		if (command) candidates.push({ command, args });
	}
	for (const command of ['nano', 'vim', 'vi']) {
		candidates.push({ command, args: [] });
	}
	return candidates;
}

export async function resolveEditor(
	runner: CommandRunner,
	env: Record<string, string | undefined> = process.env,
): Promise<EditorCommand | undefined> {
	for (const candidate of editorCandidates(env)) {
		if (await runner.commandExists(candidate.command)) {
			return candidate;
		}
	}
	return undefined;
}

export interface PrompterOptions {
	runner: CommandRunner;
	/** Answer every question with its default */
	assumeYes?: boolean;
	/** Unanswered questions fall back to their default after this long; 0 waits forever */
	timeoutMs?: number;
	interactive?: boolean;
	input?: Readable;
	output?: Writable;
	env?: Record<string, string | undefined>;
	logger?: Logger;
}

export interface Prompter {
	/** Throws CancelledError when the operator aborts with Ctrl-C or Ctrl-D. */
	confirm(message: string, initial: boolean): Promise<boolean>;
	/** Ask, then open `file` in an editor. Throws only when the question is aborted. */
	offerEdit(file: string, label: string, initial?: boolean): Promise<boolean>;
}

export function createPrompter(options: PrompterOptions): Prompter {
	const {
		runner,
		assumeYes = false,
		timeoutMs = 0,
		input = process.stdin,
		output = process.stdout,
		interactive = process.stdin.isTTY === true,
		env = process.env,
		logger = SILENT_LOGGER,
	} = options;

	const confirm = async (message: string, initial: boolean): Promise<boolean> => {
		if (assumeYes || !interactive) {
			logger.debug({ question: message, answer: initial }, 'Using default answer');
			return initial;
		}

		let timedOut = false;
		const timer =
			timeoutMs > 0
				? setTimeout(() => {
						timedOut = true;
						logger.warn({ question: message, answer: initial }, 'No answer, using default');
						// Escape aborts the open prompt
						input.emit('keypress', '', { name: 'escape' });
					}, timeoutMs)
				: undefined;

		try {
			const { value } = await prompts({
				type: 'confirm',
				name: 'value',
				message,
				initial,
				stdin: input,
				stdout: output,
			});
			if (typeof value === 'boolean') {
				return value;
			}
			// Ctrl-C and Ctrl-D abort without a value
			if (timedOut) {
				return initial;
			}
			throw new CancelledError();
		} finally {
			clearTimeout(timer);
		}
	};

	const offerEdit = async (file: string, label: string, initial = false): Promise<boolean> => {
		if (!(await confirm(`Do you want to edit ${label} before continuing?`, initial))) {
			logger.info(`Skipping manual edit of ${label}`);
			return false;
		}

		const editor = await resolveEditor(runner, env);
		if (!editor) {
			logger.warn({ file }, 'No editor found (set $EDITOR), edit the file manually');
			return false;
		}

		logger.info(`Opening ${label} with ${editor.command}`);
		try {
			const result = await runner.run(editor.command, [...editor.args, file], {
				interactive: true,
			});
			if (result.exitCode !== 0) {
				logger.warn({ exitCode: result.exitCode }, 'Editing was cancelled or failed');
				return false;
			}
		} catch (error) {
			logger.warn({ reason: String(error) }, 'Could not start the editor');
			return false;
		}
		return true;
	};

	return { confirm, offerEdit };
}
