import * as fs from 'fs/promises';
import type { RosterEvent } from '../types/events';
import { ConsoleLogger } from './consoleLogger';
import { formatBindings, type Logger } from './types';

/**
 * Appends events to a JSON-lines file; plain messages are handed to
 * `messages`, a console logger showing every level unless one is given.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly bindings: Record<string, unknown>;
  private readonly messages: Logger;

  constructor(
    filePath: string,
    bindings: Record<string, unknown> = {},
    messages: Logger = new ConsoleLogger({ level: 'debug' }),
  ) {
    this.filePath = filePath;
    this.bindings = bindings;
    this.messages = messages;
  }

  async log(event: RosterEvent): Promise<void> {
    const line = JSON.stringify(event) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  debug(message: string) {
    return this.messages.debug(this.withPrefix(message));
  }

  info(message: string) {
    return this.messages.info(this.withPrefix(message));
  }

  warn(message: string) {
    return this.messages.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string) {
    return this.messages.error(error, message ? this.withPrefix(message) : undefined);
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, { ...this.bindings, ...bindings }, this.messages);
  }

  private withPrefix(message: string): string {
    return formatBindings(this.bindings, message);
  }
}
