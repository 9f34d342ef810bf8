import { access } from 'node:fs/promises';
import path from 'node:path';
import type { StatusReporter } from '../types.js';

/** Asks one question and resolves with the operator's raw answer. */
export type Prompter = (question: string) => Promise<string>;

export interface SinkTargetOptions {
  directory: string;
  extension: string;
  exists?: (filepath: string) => Promise<boolean>;
  reporter?: Pick<StatusReporter, 'status'>;
}

export async function fileExists(filepath: string): Promise<boolean> {
  try {
    await access(filepath);
    return true;
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') return false;
    throw error;
  }
}

export function withExtension(name: string, extension: string): string {
  return name.toLowerCase().endsWith(extension.toLowerCase()) ? name : `${name}${extension}`;
}

/**
 * Asks for the output file name until the operator gives a usable one.
 * Existing files are only reused after an explicit `y`.
 */
export async function promptSinkTarget(prompt: Prompter, options: SinkTargetOptions): Promise<string> {
  const exists = options.exists ?? fileExists;
  for (;;) {
    const answer = (await prompt(`Enter filename (e.g., session${options.extension}): `)).trim();
    if (!answer) {
      options.reporter?.status('Please enter a filename.');
      continue;
    }

    const filename = withExtension(answer, options.extension);
    const target = path.resolve(options.directory, filename);
    if (await exists(target)) {
      const overwrite = (await prompt(`File ${filename} exists. Overwrite? (y/n): `)).trim().toLowerCase();
      if (overwrite !== 'y') continue;
    }
    return target;
  }
}

export class PromptClosedError extends Error {
  constructor(options?: ErrorOptions) {
    super('input closed', options);
    this.name = 'PromptClosedError';
  }
}

/** Minimal slice of a `readline/promises` interface. */
export interface QuestionInterface {
  question(query: string, options: { signal: AbortSignal }): Promise<string>;
  once(event: 'close', listener: () => void): unknown;
}

/** Prompter over readline; rejects with PromptClosedError once input ends. */
export function createReadlinePrompter(rl: QuestionInterface): Prompter {
  const closed = new AbortController();
  rl.once('close', () => closed.abort());
  return async (question) => {
    if (closed.signal.aborted) throw new PromptClosedError();
    try {
      return await rl.question(question, { signal: closed.signal });
    } catch (error) {
      if (closed.signal.aborted) throw new PromptClosedError({ cause: error });
      throw error;
    }
  };
}
