import type { Writable } from 'stream';
import { log } from '../log';

/** Where finished dictation text goes. */
export interface TextOutput {
  insert(text: string): void;
}

/** Writes each dictation as one line to a stream (stdout by default). */
export class StdoutTextOutput implements TextOutput {
  constructor(private readonly stream: Writable = process.stdout) {}

  public insert(text: string): void {
    log.info({ event: 'text_output', chars: Array.from(text).length }, 'inserting text');
    this.stream.write(`${text}\n`);
  }
}
