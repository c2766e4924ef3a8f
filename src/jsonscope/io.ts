/**
 * IO collaborators - files, clipboard and user notifications
 *
 * The formatter window only talks to these interfaces; Node implementations
 * live here, terminal ones in the TUI.
 */

import { readFile, writeFile } from 'fs/promises';
import { TextDecoder } from 'util';
import { IOError, errorMessage } from './errors.js';

export interface FileStore {
  /** Whole-file UTF-8 read */
  read(path: string): Promise<string>;
  /** Whole-file UTF-8 overwrite */
  write(path: string, text: string): Promise<void>;
}

export interface Clipboard {
  writeText(text: string): Promise<void>;
}

export interface Notifier {
  error(title: string, message: string): void;
  success(message: string): void;
}

export class NodeFileStore implements FileStore {
  async read(path: string): Promise<string> {
    let bytes: Buffer;
    try {
      bytes = await readFile(path);
    } catch (error) {
      throw new IOError(errorMessage(error), 'read', path);
    }
    try {
      return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
    } catch {
      throw new IOError(`${path} is not valid UTF-8`, 'read', path);
    }
  }

  async write(path: string, text: string): Promise<void> {
    try {
      await writeFile(path, text, 'utf8');
    } catch (error) {
      throw new IOError(errorMessage(error), 'write', path);
    }
  }
}

/** Whole-stream UTF-8 read, line endings kept as sent */
export async function readStream(
  stream: AsyncIterable<Buffer | string>,
  source = 'stdin'
): Promise<string> {
  const chunks: Buffer[] = [];
  try {
    for await (const chunk of stream) {
      chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk);
    }
  } catch (error) {
    throw new IOError(errorMessage(error), 'read', source);
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(Buffer.concat(chunks));
  } catch {
    throw new IOError(`${source} is not valid UTF-8`, 'read', source);
  }
}

/**
 * Copies through the OSC 52 terminal escape, which most terminal emulators
 * forward to the system clipboard.
 */
export class Osc52Clipboard implements Clipboard {
  constructor(private readonly stream: NodeJS.WritableStream = process.stdout) {}

  writeText(text: string): Promise<void> {
    const payload = Buffer.from(text, 'utf8').toString('base64');
    return new Promise((resolve, reject) => {
      this.stream.write(`\x1b]52;c;${payload}\x07`, (error) => {
        if (error) {
          reject(new IOError(error.message, 'copy'));
        } else {
          resolve();
        }
      });
    });
  }
}

export class MemoryClipboard implements Clipboard {
  private contents = '';

  async writeText(text: string): Promise<void> {
    this.contents = text;
  }

  readText(): string {
    return this.contents;
  }
}
