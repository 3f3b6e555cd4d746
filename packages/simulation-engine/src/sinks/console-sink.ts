import type { OrderEventPayload } from "@order-sim/shared/protocol";
import type { EventSink } from "../types.js";

/** Prints each event as indented JSON followed by a blank line. */
export class ConsoleSink implements EventSink {
  readonly name = "console";
  private readonly writeLine: (line: string) => void;

  constructor(writeLine: (line: string) => void = (line) => console.log(line)) {
    this.writeLine = writeLine;
  }

  async write(event: OrderEventPayload): Promise<void> {
    this.writeLine(JSON.stringify(event, null, 2));
    this.writeLine("");
  }

  async close(): Promise<void> {}
}
