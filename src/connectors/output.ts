// pci.ids is a little over 1MB; anything past this is not ours to parse
export const MAX_OUTPUT_SIZE = 10 * 1024 * 1024;

/**
 * Collects a command's output as bytes and decodes it once, so a UTF-8
 * sequence split across chunks survives. Bytes past MAX_OUTPUT_SIZE are
 * dropped and `truncated` is set.
 */
export class OutputBuffer {
  private chunks: Buffer[] = [];
  private size = 0;
  truncated = false;

  push(chunk: Buffer): void {
    const room = MAX_OUTPUT_SIZE - this.size;
    if (chunk.length > room) {
      this.truncated = true;
      if (room <= 0) return;
      chunk = chunk.subarray(0, room);
    }
    this.chunks.push(chunk);
    this.size += chunk.length;
  }

  get length(): number {
    return this.size;
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString("utf8");
  }
}
