import { DurationError, DurationErrorCode } from "../errors";
import { DurationReading } from "../types";
import { withReader } from "./reader";

/**
 * Fields of a WAVE `fmt ` chunk.
 */
export interface WavFormat {
  audioFormat: number;
  channels: number;
  sampleRate: number;
  byteRate: number;
  blockAlign: number;
  bitsPerSample: number;
}

const RIFF_HEADER_SIZE = 12;
const CHUNK_HEADER_SIZE = 8;
const FMT_MIN_SIZE = 16;

function parseFormat(body: Buffer): WavFormat {
  return {
    audioFormat: body.readUInt16LE(0),
    channels: body.readUInt16LE(2),
    sampleRate: body.readUInt32LE(4),
    byteRate: body.readUInt32LE(8),
    blockAlign: body.readUInt16LE(12),
    bitsPerSample: body.readUInt16LE(14)
  };
}

/**
 * Computes the duration of a WAV file from its header chunks.
 *
 * Duration is `dataBytes / (sampleRate * blockAlign)`; no samples are read.
 * The data length is clamped to the bytes actually present in the file.
 *
 * @throws DurationError INVALID_WAV when the RIFF/WAVE header or the `fmt `
 *   chunk is malformed, UNDERIVABLE_DURATION when the chunks needed for the
 *   computation are missing or declare a zero rate
 */
export function parseWAV(filePath: string): Promise<DurationReading> {
  return withReader(filePath, async (reader) => {
    const riff = await reader.read(RIFF_HEADER_SIZE);
    if (
      riff.length < RIFF_HEADER_SIZE ||
      riff.toString("latin1", 0, 4) !== "RIFF" ||
      riff.toString("latin1", 8, 12) !== "WAVE"
    ) {
      throw new DurationError(DurationErrorCode.INVALID_WAV, "invalid WAV file", filePath);
    }

    let format: WavFormat | undefined;
    let dataBytes: number | undefined;

    while (reader.remaining >= CHUNK_HEADER_SIZE && (!format || dataBytes === undefined)) {
      const header = await reader.read(CHUNK_HEADER_SIZE);
      const id = header.toString("latin1", 0, 4);
      const size = header.readUInt32LE(4);
      const bodyEnd = reader.position + size + (size % 2);

      if (id === "fmt ") {
        const body = await reader.read(FMT_MIN_SIZE);
        if (size < FMT_MIN_SIZE || body.length < FMT_MIN_SIZE) {
          throw new DurationError(DurationErrorCode.INVALID_WAV, "invalid WAV file", filePath);
        }

        format = parseFormat(body);
        if (format.channels < 1 || format.bitsPerSample < 8) {
          throw new DurationError(DurationErrorCode.INVALID_WAV, "invalid WAV file", filePath);
        }
      } else if (id === "data") {
        dataBytes = Math.min(size, reader.remaining);
      }

      reader.seek(bodyEnd);
    }

    const bytesPerSecond = format ? format.sampleRate * format.blockAlign : 0;
    if (dataBytes === undefined || bytesPerSecond === 0) {
      throw new DurationError(
        DurationErrorCode.UNDERIVABLE_DURATION,
        "could not derive WAV duration",
        filePath
      );
    }

    return { seconds: dataBytes / bytesPerSecond };
  });
}
