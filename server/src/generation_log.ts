import { EventEmitter } from "node:events";
import { nowIso } from "./pipeline/utils.js";
import type { LoopState } from "./pipeline/schemas.js";

export type GenerationLogEvent = {
  type: "log" | "error";
  message: string;
  state?: LoopState;
  at: string;
};

/**
 * Per-request event stream. Entry points subscribe and print; the HTTP surface returns
 * the collected events alongside the result.
 */
export class GenerationLog {
  private readonly emitter = new EventEmitter();
  private readonly events: GenerationLogEvent[] = [];

  constructor() {
    // An unheard "error" event throws in EventEmitter.
    this.emitter.on("error", () => undefined);
  }

  log(message: string, state?: LoopState): void {
    this.push({ type: "log", message, state, at: nowIso() });
  }

  error(message: string, state?: LoopState): void {
    this.push({ type: "error", message, state, at: nowIso() });
  }

  entries(): GenerationLogEvent[] {
    return [...this.events];
  }

  subscribe(onEvent: (event: GenerationLogEvent) => void): () => void {
    const onLog = (event: GenerationLogEvent) => onEvent(event);
    const onError = (event: GenerationLogEvent) => onEvent(event);
    this.emitter.on("log", onLog);
    this.emitter.on("error", onError);
    return () => {
      this.emitter.off("log", onLog);
      this.emitter.off("error", onError);
    };
  }

  private push(event: GenerationLogEvent): void {
    this.events.push(event);
    this.emitter.emit(event.type, event);
  }
}

export function formatLogEvent(event: GenerationLogEvent): string {
  const prefix = event.state ? `[${event.state}] ` : "";
  return event.type === "error" ? `${prefix}ERROR ${event.message}` : `${prefix}${event.message}`;
}
