/**
 * Terminal contract
 *
 * The slice of an xterm.js Terminal the game needs. The CLI's stdin/stdout
 * adapter implements it too, so the same game code runs in a browser
 * terminal and in a real TTY.
 */

export interface KeyLike {
  key: string;
  preventDefault?: () => void;
  stopPropagation?: () => void;
}

export interface TerminalKeyEvent {
  key: string;
  domEvent: KeyLike;
}

export interface Disposable {
  dispose(): void;
}

/** Fixed-size character grid, written with ANSI escape sequences */
export interface Surface {
  readonly cols: number;
  readonly rows: number;
  write(data: string): void;
}

export interface GameTerminal extends Surface {
  onKey(listener: (event: TerminalKeyEvent) => void): Disposable;
}
