/**
 * Operator notifications for unattended update runs.
 *
 * Delivery is best effort: a notifier never throws, it logs instead.
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { NotifierKind } from '../core/config.js';
import { createLogger, describeError } from '../core/utils/logger.js';

const logger = createLogger({ module: 'notifier' });

export const NOTIFICATION_TITLE = 'Strikewatch';

export interface Notifier {
  notify(title: string, message: string): Promise<void>;
}

/**
 * Writes notifications to the log at warn level
 */
export class LogNotifier implements Notifier {
  async notify(title: string, message: string): Promise<void> {
    logger.warn(message, { title });
  }
}

/**
 * Runs a command; rejects on spawn failure or non-zero exit
 */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<void>;

const execFileAsync = promisify(execFile);

const defaultRunner: CommandRunner = async (command, args) => {
  await execFileAsync(command, [...args], { timeout: 10_000 });
};

/**
 * macOS Notification Center via osascript, elsewhere libnotify's
 * notify-send. Falls back to the log when the command fails.
 */
export class DesktopNotifier implements Notifier {
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;

  constructor(options: { platform?: NodeJS.Platform; runner?: CommandRunner } = {}) {
    this.platform = options.platform ?? process.platform;
    this.run = options.runner ?? defaultRunner;
  }

  command(title: string, message: string): { command: string; args: string[] } {
    if (this.platform === 'darwin') {
      const script = `display notification ${appleScriptString(message)} with title ${appleScriptString(title)}`;
      return { command: 'osascript', args: ['-e', script] };
    }
    return { command: 'notify-send', args: [title, message] };
  }

  async notify(title: string, message: string): Promise<void> {
    const { command, args } = this.command(title, message);
    try {
      await this.run(command, args);
    } catch (error) {
      logger.warn('Desktop notification failed', {
        command,
        error: describeError(error),
        title,
        message,
      });
    }
  }
}

function appleScriptString(value: string): string {
  return `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`;
}

export function createNotifier(kind: NotifierKind): Notifier {
  return kind === 'desktop' ? new DesktopNotifier() : new LogNotifier();
}
