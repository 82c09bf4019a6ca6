/**
 * Per-request state for the completion/logging guard.
 *
 * A request starts incomplete and loggable. Only a finished response write
 * completes it, and only the whenlog policy applied to that completed
 * response can silence its log.
 */

import { Whenlog } from './types.js';

/**
 * Whether a completed response with `status` is kept out of the log.
 *
 * `onError` silences every completed response, whatever its status: only
 * requests that aborted before a response was written get logged.
 */
export function suppressesCompletedLog(whenlog: Whenlog, status: number): boolean {
  switch (whenlog) {
    case Whenlog.OnError:
      return true;
    case Whenlog.OnNon200:
      return status === 200;
    case Whenlog.Always:
      return false;
  }
}

export class RequestExchange {
  private readonly lines: string[] = [];
  private completed = false;
  private loggable = true;

  record(line: string): void {
    this.lines.push(line);
  }

  /**
   * Mark the response as delivered and apply the log policy to its status
   */
  complete(status: number, whenlog: Whenlog): void {
    this.completed = true;
    if (suppressesCompletedLog(whenlog, status)) {
      this.loggable = false;
    }
  }

  get isComplete(): boolean {
    return this.completed;
  }

  get shouldLog(): boolean {
    return this.loggable;
  }

  render(): string {
    return this.lines.map((line) => `${line}\n`).join('');
  }
}
