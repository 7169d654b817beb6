import type { LineGeometry, RenderedLines } from '@leafline/contracts';

/**
 * Frame-atomic store of rendered line geometry.
 *
 * Geometry recorded during a frame stays invisible until {@link commit}, which
 * replaces the previous frame wholesale.
 */
export class RenderedLinesBuffer {
  private committed: Map<string, LineGeometry> = new Map();
  private pending: Map<string, LineGeometry> | null = null;

  beginFrame(): void {
    this.pending = new Map();
  }

  get frameOpen(): boolean {
    return this.pending !== null;
  }

  /** Records into the open frame, opening one if needed. Same key overwrites. */
  record(geometry: LineGeometry): void {
    if (!this.pending) this.beginFrame();
    this.pending?.set(geometry.key, geometry);
  }

  commit(): RenderedLines {
    if (this.pending) {
      this.committed = this.pending;
      this.pending = null;
    }
    return this.committed;
  }

  /** Geometry of the last committed frame. */
  get current(): RenderedLines {
    return this.committed;
  }

  clear(): void {
    this.committed = new Map();
    this.pending = null;
  }
}
