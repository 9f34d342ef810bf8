import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import type { CaptureSession } from '../session/sessionController.js';
import type { SessionHistory } from '../storage/sessionHistory.js';
import { toHistoryEntry } from '../storage/sessionHistory.js';
import type { LineChannel, SessionResult, StatusReporter } from '../types.js';
import { PromptClosedError, promptSinkTarget } from './prompt.js';
import type { Prompter, SinkTargetOptions } from './prompt.js';

export const INTERRUPT_REASON = 'interrupted';

const RULE = '='.repeat(50);

export interface MenuDeps {
  prompt: Prompter;
  reporter: StatusReporter;
  discover: () => Promise<LineChannel | null>;
  createSession: (channel: LineChannel, sinkTarget: string) => CaptureSession;
  sinkTarget: Omit<SinkTargetOptions, 'reporter'>;
  history?: SessionHistory;
}

/**
 * Interactive loop: one discovery at startup, then sessions on demand. Each
 * session takes ownership of the channel, so the next one discovers again.
 */
export class CaptureMenu {
  #channel: LineChannel | null = null;
  #active: CaptureSession | null = null;
  #interrupted = false;

  constructor(private readonly deps: MenuDeps) {}

  get activeSession(): CaptureSession | null {
    return this.#active;
  }

  /** Resolves with the process exit code. */
  async run(): Promise<number> {
    const { reporter } = this.deps;
    reporter.status('Sensor Capture');
    reporter.status(RULE);

    this.#channel = await this.deps.discover();
    if (!this.#channel) return 1;

    try {
      while (!this.#interrupted) {
        reporter.status('');
        reporter.status(RULE);
        reporter.status('Main Menu:');
        reporter.status('1. Start new recording session');
        reporter.status('2. Quit');

        const choice = (await this.deps.prompt('Enter choice (1-2): ')).trim();
        if (choice === '1') {
          await this.#recordOnce();
        } else if (choice === '2') {
          reporter.status('Goodbye!');
          break;
        } else {
          reporter.status('Invalid choice. Please enter 1 or 2.');
        }
      }
    } catch (error) {
      if (!(error instanceof PromptClosedError)) throw error;
      logger.debug({ event: 'menu_input_closed' });
    } finally {
      await this.#releaseIdleChannel();
    }
    return 0;
  }

  /**
   * Force-finalizes the running session, if any. Without one the menu stops
   * at its next prompt.
   */
  async interrupt(): Promise<SessionResult | null> {
    this.#interrupted = true;
    const session = this.#active;
    if (!session) return null;
    this.deps.reporter.status('Stopping recording...');
    return session.abort(INTERRUPT_REASON);
  }

  async #recordOnce(): Promise<void> {
    const { reporter } = this.deps;
    const channel = this.#channel ?? (await this.deps.discover());
    this.#channel = null;
    if (!channel) return;

    let sinkTarget: string;
    try {
      sinkTarget = await promptSinkTarget(this.deps.prompt, { ...this.deps.sinkTarget, reporter });
    } catch (error) {
      // keep the device for a later session unless input is gone
      this.#channel = channel;
      throw error;
    }

    reporter.status("Press 'q' + ENTER to stop recording");
    const session = this.deps.createSession(channel, sinkTarget);
    this.#active = session;
    let result: SessionResult;
    try {
      result = await session.run();
    } finally {
      this.#active = null;
    }

    if (result.status === 'failed') {
      reporter.status(`Session failed: ${result.error.message}`);
    } else if (result.error) {
      reporter.status(`Session ended early: ${result.error.message}`);
    }
    await this.#recordHistory(result);
  }

  async #recordHistory(result: SessionResult): Promise<void> {
    const { history } = this.deps;
    if (!history) return;
    try {
      await history.append(toHistoryEntry(result));
    } catch (error) {
      logger.warn({ event: 'history_append_failed', path: history.path, message: describeError(error) });
    }
  }

  async #releaseIdleChannel(): Promise<void> {
    const channel = this.#channel;
    this.#channel = null;
    if (!channel) return;
    try {
      await channel.close();
      this.deps.reporter.status('Serial connection closed');
    } catch (error) {
      logger.warn({ event: 'channel_close_failed', path: channel.path, message: describeError(error) });
    }
  }
}
