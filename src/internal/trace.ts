import type { TraceEvent, TraceListener } from "../public/types.js";

export type TraceEventInput =
  TraceEvent extends infer Event
    ? Event extends { readonly seq: number }
      ? Omit<Event, "seq">
      : never
    : never;

/** Numbers events and forwards them to an optional listener. Shared by a pool and the arenas it creates. */
export class TraceSink {
  readonly #listener: TraceListener | undefined;
  #seq = 0;

  constructor(listener?: TraceListener) {
    this.#listener = listener;
  }

  emit(event: TraceEventInput): void {
    if (!this.#listener) {
      return;
    }

    this.#seq += 1;
    this.#listener({ seq: this.#seq, ...event });
  }
}
