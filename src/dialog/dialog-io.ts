/**
 * Operator interaction used by the impl item dialog
 */

export type Completer = (line: string) => string[];

export interface DialogIO {
  /**
   * Let the operator pick one option; resolves to its index, or `null` when cancelled
   */
  select(prompt: string, help: string, options: string[]): Promise<number | null>;

  /**
   * Ask for a line of text; `null` when cancelled
   */
  text(prompt: string, help: string, initial: string, completer?: Completer): Promise<string | null>;

  confirm(prompt: string, defaultYes: boolean): Promise<boolean>;

  write(message: string): void;
}
