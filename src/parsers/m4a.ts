import { DurationError, DurationErrorCode } from "../errors";
import { DurationReading } from "../types";
import { ByteReader, withReader } from "./reader";

/* MP4 (and so M4A) files are a tree of boxes. Each box starts with:
 *
 * - 4 bytes: size (big-endian uint32), header included
 * - 4 bytes: type (4 ASCII characters)
 *
 * When size == 1 a 64-bit size follows the type. The movie duration lives in
 * `mvhd`, which sits inside `moov`, so container boxes are descended into
 * rather than skipped.
 */

/**
 * Position of one box within the file.
 */
export interface BoxHeader {
  type: string;
  /** Offset of the first byte after the header */
  bodyStart: number;
  /** Offset one past the last byte, clamped to the enclosing box */
  end: number;
}

const HEADER_SIZE = 8;
const LARGE_HEADER_SIZE = 16;

export const CONTAINER_BOXES = new Set([
  "moov",
  "trak",
  "mdia",
  "minf",
  "stbl",
  "edts",
  "dinf",
  "udta",
  "mvex",
  "moof",
  "traf"
]);

/**
 * Reads the box header at the reader's position.
 *
 * @returns null when no well-formed header fits before `parentEnd`: a size
 *   smaller than its own header, or too few bytes left
 */
export async function readBoxHeader(reader: ByteReader, parentEnd: number): Promise<BoxHeader | null> {
  const start = reader.position;
  if (parentEnd - start < HEADER_SIZE) {
    return null;
  }

  const head = await reader.read(HEADER_SIZE);
  if (head.length < HEADER_SIZE) {
    return null;
  }

  let size = head.readUInt32BE(0);
  const type = head.toString("latin1", 4, 8);
  let headerSize = HEADER_SIZE;

  if (size === 1) {
    const large = await reader.read(8);
    if (large.length < 8) {
      return null;
    }
    size = Number(large.readBigUInt64BE(0));
    headerSize = LARGE_HEADER_SIZE;
  }

  // Size 0 is the last box of its parent, running to the parent's end.
  const end = size === 0 ? parentEnd : Math.min(start + size, parentEnd);
  if ((size !== 0 && size < headerSize) || end < start + headerSize) {
    return null;
  }

  return { type, bodyStart: start + headerSize, end };
}

/**
 * Extracts the duration in seconds from an `mvhd` body. Returns 0 when the
 * version is unknown, the body is too short for its version, or the
 * timescale is 0.
 */
export function movieHeaderSeconds(body: Buffer): number {
  let timeScale: number;
  let units: number;

  if (body.length >= 20 && body[0] === 0) {
    timeScale = body.readUInt32BE(12);
    units = body.readUInt32BE(16);
  } else if (body.length >= 32 && body[0] === 1) {
    timeScale = body.readUInt32BE(20);
    units = Number(body.readBigUInt64BE(24));
  } else {
    return 0;
  }

  return timeScale > 0 ? units / timeScale : 0;
}

/**
 * Walks the box tree depth-first until the first `mvhd` and returns its
 * duration, or 0 when none is found.
 */
export async function findMovieDuration(reader: ByteReader): Promise<number> {
  // End offsets of the boxes currently being walked, innermost last.
  const ends: number[] = [reader.size];

  while (ends.length > 0) {
    const end = ends[ends.length - 1];
    if (reader.position >= end) {
      ends.pop();
      continue;
    }

    const box = await readBoxHeader(reader, end);
    if (!box) {
      reader.seek(end);
      ends.pop();
      continue;
    }

    if (box.type === "mvhd") {
      return movieHeaderSeconds(await reader.read(box.end - box.bodyStart));
    }

    if (CONTAINER_BOXES.has(box.type)) {
      ends.push(box.end);
      continue;
    }

    reader.seek(box.end);
  }

  return 0;
}

/**
 * Computes the duration of an M4A/MP4 file from its movie header box.
 *
 * @throws DurationError M4A_PARSE_FAILED when no `mvhd` yields a non-zero duration
 */
export function parseM4A(filePath: string): Promise<DurationReading> {
  return withReader(filePath, async (reader) => {
    const seconds = await findMovieDuration(reader);
    if (seconds === 0) {
      throw new DurationError(
        DurationErrorCode.M4A_PARSE_FAILED,
        "could not parse M4A duration",
        filePath
      );
    }
    return { seconds };
  });
}
