/**
 * Notifier that feeds the TUI status line
 */

import type { Notifier } from '../jsonscope/io.js';

export interface StatusMessage {
  kind: 'error' | 'success';
  text: string;
}

export type StatusListener = (status: StatusMessage) => void;

export class StatusNotifier implements Notifier {
  private listener: StatusListener | undefined;
  private last: StatusMessage | undefined;

  subscribe(listener: StatusListener): () => void {
    this.listener = listener;
    return () => {
      if (this.listener === listener) this.listener = undefined;
    };
  }

  get latest(): StatusMessage | undefined {
    return this.last;
  }

  error(title: string, message: string): void {
    // The status line is a single row
    this.emit({ kind: 'error', text: `${title}: ${message.replace(/\n/g, ' ')}` });
  }

  success(message: string): void {
    this.emit({ kind: 'success', text: message });
  }

  private emit(status: StatusMessage): void {
    this.last = status;
    this.listener?.(status);
  }
}
