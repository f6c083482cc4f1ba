/**
 * Companion display that prints each view to a text stream, for running the
 * companion from a terminal.
 */

import { CompanionDisplay, CompanionView } from '../shared/types/frame';

export interface TextSink {
  write(text: string): unknown;
}

export class ConsoleDisplay implements CompanionDisplay {
  private sink: TextSink;

  constructor(sink: TextSink = process.stdout) {
    this.sink = sink;
  }

  show(view: CompanionView): void {
    const header = `── ${view.label} @ ${view.host} (${view.timestamp}) ──`;
    const body = view.lines.map((line) => line.map((run) => run.t).join(''));
    this.sink.write([header, ...body, ''].join('\n'));
  }
}
