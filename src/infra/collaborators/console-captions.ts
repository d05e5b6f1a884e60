import chalk from 'chalk';
import type { CaptionDisplay } from '../../domain/stream/collaborators.js';

export type CaptionWriter = (line: string) => void;

/**
 * Prints captions to the terminal, one timestamped line per utterance.
 */
export class ConsoleCaptions implements CaptionDisplay {
  private lastCaption: string | null = null;

  constructor(
    private write: CaptionWriter = (line) => console.log(line),
    private now: () => Date = () => new Date()
  ) {}

  display(text: string): void {
    this.lastCaption = text;
    const time = this.now().toLocaleTimeString('en-GB', { hour12: false });
    this.write(`${chalk.gray(time)} ${chalk.cyan('▶')} ${chalk.white(text)}`);
  }

  getLastCaption(): string | null {
    return this.lastCaption;
  }
}
