/**
 * Editor Errors
 *
 * Errors raised by the editor core and the helpers that turn any thrown
 * value into a one-line status message.
 */

export type EditorErrorCode = 'LOAD_FAILED' | 'SAVE_FAILED';

export class EditorError extends Error {
  readonly code: EditorErrorCode;

  constructor(code: EditorErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EditorError';
    this.code = code;
  }
}

/**
 * Render a thrown value for the status line. Only the first line is kept.
 */
export function formatError(error: unknown): string {
  let text: string;
  if (error instanceof EditorError) {
    text = error.message;
  } else if (error instanceof Error) {
    text = `${error.name}: ${error.message}`;
  } else {
    text = String(error);
  }
  const newline = text.indexOf('\n');
  return newline >= 0 ? text.slice(0, newline) : text;
}
