import { ExecutionEvent, Sink } from "./types";

export abstract class BaseSink implements Sink {
  abstract publishExecutionEvents(events: ExecutionEvent[]): Promise<void>;

  protected ensureConfigured(name: string, ready: boolean): void {
    if (!ready) {
      throw new Error(`${name} sink is not configured`);
    }
  }
}
