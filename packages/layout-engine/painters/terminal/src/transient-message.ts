export const DEFAULT_MESSAGE_DURATION_MS = 2000;

/**
 * A status message with an expiry deadline.
 *
 * Nothing is scheduled: each render tick asks for {@link current} with its
 * own clock reading, and the message disappears once the deadline passes.
 */
export class TransientMessage {
  private text: string | null = null;
  private expiresAt = 0;

  constructor(private readonly defaultDurationMs = DEFAULT_MESSAGE_DURATION_MS) {}

  show(text: string, now: number, durationMs = this.defaultDurationMs): void {
    this.text = text;
    this.expiresAt = now + Math.max(durationMs, 0);
  }

  current(now: number): string | null {
    if (this.text !== null && now >= this.expiresAt) this.clear();
    return this.text;
  }

  clear(): void {
    this.text = null;
    this.expiresAt = 0;
  }
}
