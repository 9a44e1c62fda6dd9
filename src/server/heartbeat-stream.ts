/**
 * Timer-driven Server-Sent Events writer: greeting events on start, then a heartbeat
 * every interval until stopped.
 */

export type SseWrite = (chunk: string) => unknown;

export interface HeartbeatEvent {
  type: 'heartbeat';
  timestamp: string;
}

/** Encode one SSE `data:` event. */
export function formatSseEvent(data: unknown): string {
  return `data: ${JSON.stringify(data)}\n\n`;
}

export class HeartbeatStream {
  private timer: NodeJS.Timeout | null = null;

  constructor(
    private readonly write: SseWrite,
    private readonly intervalMs: number,
    private readonly now: () => Date = () => new Date()
  ) {}

  get active(): boolean {
    return this.timer !== null;
  }

  start(greeting: readonly unknown[]): void {
    if (this.timer) return;
    for (const event of greeting) {
      this.write(formatSseEvent(event));
    }
    this.timer = setInterval(() => {
      const event: HeartbeatEvent = { type: 'heartbeat', timestamp: this.now().toISOString() };
      this.write(formatSseEvent(event));
    }, this.intervalMs);
  }

  /** Idempotent; called when the client disconnects or the server shuts down. */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
