/**
 * @splitledger/persistence — Sequential reader over a text document.
 *
 * Mixes two reading modes over the same position:
 * - nextToken(): whitespace-separated words, crossing line breaks
 * - nextLine(): the remainder of the current line, verbatim
 */

const WHITESPACE = /\s/;

export class TextCursor {
  private readonly _text: string;
  private _pos = 0;

  constructor(text: string) {
    this._text = text;
  }

  get atEnd(): boolean {
    return this._pos >= this._text.length;
  }

  /**
   * Skip whitespace, then read up to the next whitespace character.
   * Returns undefined at end of input.
   */
  nextToken(): string | undefined {
    while (!this.atEnd && WHITESPACE.test(this._text.charAt(this._pos))) {
      this._pos++;
    }
    if (this.atEnd) {
      return undefined;
    }

    const start = this._pos;
    while (!this.atEnd && !WHITESPACE.test(this._text.charAt(this._pos))) {
      this._pos++;
    }
    return this._text.slice(start, this._pos);
  }

  /**
   * Read the rest of the current line without its terminator
   * ("\n" or "\r\n"). Returns undefined at end of input.
   */
  nextLine(): string | undefined {
    if (this.atEnd) {
      return undefined;
    }

    const newline = this._text.indexOf("\n", this._pos);
    const end = newline === -1 ? this._text.length : newline;
    let line = this._text.slice(this._pos, end);
    this._pos = newline === -1 ? this._text.length : newline + 1;

    if (line.endsWith("\r")) {
      line = line.slice(0, -1);
    }
    return line;
  }
}
