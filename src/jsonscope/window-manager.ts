/**
 * Window manager - owns the window creation counter and open windows
 */

import { debugLog } from './debug.js';
import { FormatterWindow, type WindowServices } from './formatter-window.js';

export class WindowManager {
  private counter = 0;
  private readonly windows = new Map<number, FormatterWindow>();

  constructor(private readonly services: WindowServices) {}

  /** Open a new, empty window. Window numbers are never reused. */
  create(): FormatterWindow {
    this.counter++;
    const window = new FormatterWindow(this.counter, this.counter, this.services);
    this.windows.set(window.id, window);
    debugLog('windows', `created ${window.title}`, { open: this.windows.size });
    return window;
  }

  destroy(id: number): boolean {
    const removed = this.windows.delete(id);
    if (removed) {
      debugLog('windows', `destroyed window ${id}`, { open: this.windows.size });
    }
    return removed;
  }

  get(id: number): FormatterWindow | undefined {
    return this.windows.get(id);
  }

  /** Open windows in creation order */
  list(): FormatterWindow[] {
    return [...this.windows.values()];
  }

  get size(): number {
    return this.windows.size;
  }

  /** Number of windows ever created */
  get created(): number {
    return this.counter;
  }
}
