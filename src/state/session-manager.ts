/**
 * Session Manager
 *
 * Owns the open buffers and the state they share, runs the key loop for
 * the active one and handles open, switch and close.
 *
 * The session ends when the last buffer is closed. It resolves with that
 * buffer's lines when it never had a file name, or with the file name.
 */

import { Document } from '../core/document.ts';
import { EditEngine, type EditAction } from '../core/edit-engine.ts';
import { SharedState } from '../core/shared-state.ts';
import { formatError } from '../core/errors.ts';
import { loadFile } from '../core/file-io.ts';
import type { Settings } from '../config/settings.ts';
import { InputDecoder } from '../terminal/input.ts';
import type { Size, TerminalPort } from '../terminal/port.ts';
import { Renderer } from '../ui/renderer.ts';
import { LinePrompt } from '../ui/line-prompt.ts';
import { debugLog } from '../debug.ts';

/**
 * An initial buffer: a file name, or lines supplied by the caller.
 */
export type SessionSource = string | readonly string[];

export type SessionResult = { type: 'content'; lines: string[] } | { type: 'file'; filename: string };

export interface SessionOptions {
  settings: Settings;
  /** Terminal size; queried from the port when omitted */
  size?: Size;
  /** Message for the first screen */
  greeting?: string;
}

export class SessionManager {
  private documents: Document[] = [];
  private _activeIndex = 0;
  private running = false;

  readonly shared = new SharedState();
  readonly renderer: Renderer;
  readonly input: InputDecoder;
  readonly engine: EditEngine;

  private readonly port: TerminalPort;
  private readonly settings: Settings;

  constructor(port: TerminalPort, size: Size, settings: Settings) {
    this.port = port;
    this.settings = settings;
    this.renderer = new Renderer(size, {
      output: (data: string) => port.write(data),
      mouseReporting: settings.get('editor.mouseReporting'),
    });
    this.input = new InputDecoder(port);
    this.engine = new EditEngine({
      shared: this.shared,
      renderer: this.renderer,
      prompt: new LinePrompt(this.input, this.renderer),
      input: this.input,
      port,
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Buffers
  // ─────────────────────────────────────────────────────────────────────────

  get count(): number {
    return this.documents.length;
  }

  get activeIndex(): number {
    return this._activeIndex;
  }

  get active(): Document {
    const doc = this.documents[this._activeIndex];
    if (!doc) {
      throw new Error('Session has no open buffers');
    }
    return doc;
  }

  /**
   * Create a buffer from a source and make it active. A file that cannot be
   * read gives an empty buffer with the error as its message.
   */
  async open(source: SessionSource = ''): Promise<Document> {
    const doc = new Document(this.settings.documentOptions());

    if (typeof source === 'string') {
      if (source) {
        doc.filename = source;
        try {
          doc.setLines(await loadFile(source));
        } catch (error) {
          doc.message = formatError(error);
          debugLog(`[Session] ${doc.message}`);
        }
      }
    } else {
      doc.setLines(source);
    }

    this.documents.push(doc);
    this._activeIndex = this.documents.length - 1;
    this.renderer.invalidate();
    debugLog(`[Session] Opened buffer ${this._activeIndex} (${doc.filename || 'unnamed'})`);
    return doc;
  }

  /**
   * Make the buffer at an index active.
   */
  activate(index: number): void {
    if (index < 0 || index >= this.documents.length) {
      throw new RangeError(`No buffer at index ${index}`);
    }
    this._activeIndex = index;
    this.renderer.invalidate();
  }

  /**
   * Switch to the next buffer, wrapping around.
   */
  next(): void {
    this._activeIndex = (this._activeIndex + 1) % this.documents.length;
    this.renderer.invalidate();
    debugLog(`[Session] Switched to buffer ${this._activeIndex}`);
  }

  /**
   * Close the active buffer. Returns false, keeping it open, when it is the
   * last one.
   */
  close(): boolean {
    if (this.documents.length <= 1) {
      return false;
    }
    this.documents.splice(this._activeIndex, 1);
    this._activeIndex %= this.documents.length;
    this.renderer.invalidate();
    debugLog(`[Session] Closed buffer, ${this.documents.length} left`);
    return true;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Key Loop
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Run until the last buffer is closed.
   */
  async run(): Promise<SessionResult> {
    if (this.documents.length === 0) {
      await this.open();
    }
    this.running = true;
    this.renderer.initialize();

    try {
      while (this.running) {
        const doc = this.active;
        if (!this.port.hasPendingInput()) {
          this.renderer.render(doc);
        }

        const key = await this.input.readKey();
        doc.message = '';

        const result = await this.engine.handleKey(doc, key);
        if (!result.ok) {
          doc.message = result.error;
          debugLog(`[Session] Key handling failed: ${result.error}`);
          continue;
        }
        await this.apply(result.action);
      }
    } finally {
      this.renderer.cleanup();
    }

    const last = this.active;
    this.shared.clear();
    return last.filename ? { type: 'file', filename: last.filename } : { type: 'content', lines: [...last.lines] };
  }

  private async apply(action: EditAction): Promise<void> {
    switch (action.type) {
      case 'continue':
        break;
      case 'next':
        this.next();
        break;
      case 'open':
        await this.open(action.filename);
        break;
      case 'close':
        if (!this.close()) {
          this.running = false;
        }
        break;
    }
  }
}

/**
 * Open the given sources and edit them until the user quits.
 */
export async function runSession(
  port: TerminalPort,
  sources: readonly SessionSource[],
  options: SessionOptions
): Promise<SessionResult> {
  const size = options.size ?? (await port.querySize());
  const session = new SessionManager(port, size, options.settings);

  for (const source of sources) {
    await session.open(source);
  }
  if (session.count === 0) {
    await session.open();
  }
  if (sources.length > 0) {
    session.activate(0);
  }
  if (options.greeting && !session.active.message) {
    session.active.message = options.greeting;
  }

  return session.run();
}
