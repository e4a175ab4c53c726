import fs from "fs";

const fsp = fs.promises;

const DEFAULT_CHUNK_SIZE = 64 * 1024;

/**
 * Buffered, seekable reader over an open file.
 *
 * Parsers walk headers a few bytes at a time; reads are served from a chunk
 * buffer so that a frame-by-frame MP3 walk does not issue one syscall per
 * frame. Reads never throw at end of file: they return a shorter (possibly
 * empty) buffer instead.
 */
export class ByteReader {
  private buffer: Buffer = Buffer.alloc(0);
  private bufferStart = 0;
  private offset = 0;

  private constructor(
    private readonly handle: fs.promises.FileHandle,
    readonly size: number,
    private readonly chunkSize: number
  ) {}

  static async open(filePath: string, chunkSize = DEFAULT_CHUNK_SIZE): Promise<ByteReader> {
    const handle = await fsp.open(filePath, "r");
    try {
      const stats = await handle.stat();
      return new ByteReader(handle, stats.size, chunkSize);
    } catch (err) {
      await handle.close();
      throw err;
    }
  }

  get position(): number {
    return this.offset;
  }

  /** Bytes left between the current position and the end of the file */
  get remaining(): number {
    return Math.max(0, this.size - this.offset);
  }

  /**
   * Returns up to `length` bytes at the current position without consuming them.
   */
  async peek(length: number): Promise<Buffer> {
    await this.fill(length);
    const start = this.offset - this.bufferStart;
    return this.buffer.subarray(start, start + length);
  }

  /**
   * Returns up to `length` bytes and advances past them.
   */
  async read(length: number): Promise<Buffer> {
    const bytes = await this.peek(length);
    this.offset += bytes.length;
    return bytes;
  }

  skip(length: number): void {
    this.offset += length;
  }

  seek(position: number): void {
    this.offset = position;
  }

  close(): Promise<void> {
    return this.handle.close();
  }

  private async fill(length: number): Promise<void> {
    const start = this.offset - this.bufferStart;
    if (start >= 0 && start + length <= this.buffer.length) {
      return;
    }

    const chunk = Buffer.alloc(Math.max(length, this.chunkSize));
    let filled = 0;
    while (filled < chunk.length) {
      const { bytesRead } = await this.handle.read(chunk, filled, chunk.length - filled, this.offset + filled);
      if (bytesRead === 0) {
        break;
      }
      filled += bytesRead;
    }

    this.buffer = chunk.subarray(0, filled);
    this.bufferStart = this.offset;
  }
}

/**
 * Opens `filePath`, hands the reader to `fn` and always closes the file.
 */
export async function withReader<T>(
  filePath: string,
  fn: (reader: ByteReader) => Promise<T>
): Promise<T> {
  const reader = await ByteReader.open(filePath);
  try {
    return await fn(reader);
  } finally {
    await reader.close();
  }
}
