/**
 * Line Prompt
 *
 * Blocking single-line input on the status line, used for file names,
 * search text, goto targets and settings. Reads keys from the same decoder
 * as the editor.
 *
 *   Enter/Tab  confirm
 *   Quit       cancel (null)
 *   Backspace  drop the last character
 *   Delete     clear the field
 */

import type { InputDecoder } from '../terminal/input.ts';
import type { Renderer } from './renderer.ts';
import { CURSOR, SCREEN, STYLE } from '../terminal/ansi.ts';

const ERASE_ONE = '\b \b';

export class LinePrompt {
  constructor(
    private readonly input: InputDecoder,
    private readonly renderer: Renderer
  ) {}

  async ask(prompt: string, defaultValue: string = ''): Promise<string | null> {
    this.renderer.write(
      CURSOR.moveTo(this.renderer.height, 0) + STYLE.status + prompt + defaultValue + SCREEN.clearToEnd
    );

    let answer = defaultValue;
    for (;;) {
      const event = await this.input.readKey();

      if (event.type === 'char') {
        if (prompt.length + answer.length < this.renderer.width - 2) {
          answer += event.char;
          this.renderer.write(event.char);
        }
        continue;
      }
      if (event.type !== 'command') continue;

      switch (event.key) {
        case 'ENTER':
        case 'TAB':
          this.renderer.write(STYLE.plain);
          return answer;
        case 'QUIT':
          this.renderer.write(STYLE.plain);
          return null;
        case 'BACKSPACE':
          if (answer.length > 0) {
            answer = answer.slice(0, -1);
            this.renderer.write(ERASE_ONE);
          }
          break;
        case 'DELETE':
          this.renderer.write(ERASE_ONE.repeat(answer.length));
          answer = '';
          break;
        default:
          break;
      }
    }
  }
}
