/**
 * In-memory buffer of paths waiting for the server to come back.
 *
 * Filled while the server is unreachable or a failed upload waits for its
 * retry, and drained strictly in insertion order. Each path is held once.
 * Contents are not persisted; whatever is still buffered at shutdown is lost.
 */
export class UploadBuffer {
  private readonly paths: string[] = [];

  /** Number of buffered paths */
  get size(): number {
    return this.paths.length;
  }

  /**
   * Append a path unless it is already buffered.
   * @returns false for a path that was already waiting
   */
  enqueue(filePath: string): boolean {
    if (this.paths.includes(filePath)) return false;
    this.paths.push(filePath);
    return true;
  }

  /** Oldest buffered path without removing it */
  peek(): string | undefined {
    return this.paths[0];
  }

  /** Remove and return the oldest path */
  shift(): string | undefined {
    return this.paths.shift();
  }

  /** Copy of all buffered paths in insertion order */
  snapshot(): string[] {
    return [...this.paths];
  }

  clear(): void {
    this.paths.length = 0;
  }

  has(filePath: string): boolean {
    return this.paths.includes(filePath);
  }
}
