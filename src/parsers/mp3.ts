import { DurationReading } from "../types";
import { ByteReader, withReader } from "./reader";

type MpegVersion = "1" | "2" | "2.5";
type MpegLayer = 1 | 2 | 3;

/**
 * Fields of a 4-byte MPEG audio frame header that matter for timing.
 */
export interface FrameHeader {
  version: MpegVersion;
  layer: MpegLayer;
  /** Bits per second */
  bitrate: number;
  sampleRate: number;
  samplesPerFrame: number;
  /** Whole frame length in bytes, header included */
  frameLength: number;
}

const ID3V2_HEADER_SIZE = 10;
const ID3V1_TAG_SIZE = 128;

// Indexed by the 2-bit version field; index 1 is reserved.
const VERSIONS: Array<MpegVersion | null> = ["2.5", null, "2", "1"];
// Indexed by the 2-bit layer field; index 0 is reserved.
const LAYERS: Array<MpegLayer | null> = [null, 3, 2, 1];

const SAMPLE_RATES: Record<MpegVersion, number[]> = {
  "1": [44100, 48000, 32000],
  "2": [22050, 24000, 16000],
  "2.5": [11025, 12000, 8000]
};

// kbps, bitrate index 1-14. Index 0 (free format) and 15 are not decodable.
const BITRATES_V1: Record<MpegLayer, number[]> = {
  1: [32, 64, 96, 128, 160, 192, 224, 256, 288, 320, 352, 384, 416, 448],
  2: [32, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320, 384],
  3: [32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320]
};
const BITRATES_V2: Record<MpegLayer, number[]> = {
  1: [32, 48, 56, 64, 80, 96, 112, 128, 144, 160, 176, 192, 224, 256],
  2: [8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160],
  3: [8, 16, 24, 32, 40, 48, 56, 64, 80, 96, 112, 128, 144, 160]
};

function samplesPerFrame(version: MpegVersion, layer: MpegLayer): number {
  if (layer === 1) {
    return 384;
  }
  if (layer === 3 && version !== "1") {
    return 576;
  }
  return 1152;
}

/**
 * Decodes an MPEG audio frame header.
 *
 * @returns the header, or null when the bytes are not a decodable frame
 *   (no sync, reserved fields, free-format or invalid bitrate)
 */
export function parseFrameHeader(bytes: Buffer): FrameHeader | null {
  if (bytes.length < 4 || bytes[0] !== 0xff || (bytes[1] & 0xe0) !== 0xe0) {
    return null;
  }

  const version = VERSIONS[(bytes[1] >> 3) & 0x03];
  const layer = LAYERS[(bytes[1] >> 1) & 0x03];
  if (!version || !layer) {
    return null;
  }

  const bitrateIndex = bytes[2] >> 4;
  const sampleRateIndex = (bytes[2] >> 2) & 0x03;
  const padding = (bytes[2] >> 1) & 0x01;
  if (bitrateIndex === 0 || bitrateIndex === 15 || sampleRateIndex === 3) {
    return null;
  }

  const table = version === "1" ? BITRATES_V1 : BITRATES_V2;
  const bitrate = table[layer][bitrateIndex - 1] * 1000;
  const sampleRate = SAMPLE_RATES[version][sampleRateIndex];
  const samples = samplesPerFrame(version, layer);

  const frameLength = layer === 1
    ? (Math.floor((12 * bitrate) / sampleRate) + padding) * 4
    : Math.floor(((samples / 8) * bitrate) / sampleRate) + padding;

  return { version, layer, bitrate, sampleRate, samplesPerFrame: samples, frameLength };
}

function isTag(bytes: Buffer, tag: string): boolean {
  return bytes.length >= tag.length && bytes.toString("latin1", 0, tag.length) === tag;
}

// ID3v2 sizes are 28-bit "syncsafe" integers: 7 bits per byte.
function id3v2TagSize(header: Buffer): number {
  const size = ((header[6] & 0x7f) << 21) | ((header[7] & 0x7f) << 14) | ((header[8] & 0x7f) << 7) | (header[9] & 0x7f);
  const hasFooter = (header[5] & 0x10) !== 0;
  return ID3V2_HEADER_SIZE + size + (hasFooter ? ID3V2_HEADER_SIZE : 0);
}

/**
 * Sums frame durations from the reader's current position to the end of the
 * stream.
 *
 * Bytes that do not start a frame or a tag are skipped one at a time until
 * the next frame sync, the way decoders resynchronise after padding or a
 * damaged frame. `stoppedEarly` is set when any byte had to be skipped or the
 * last frame was cut short.
 */
export async function sumFrameDurations(reader: ByteReader): Promise<DurationReading> {
  let seconds = 0;
  let skipped = 0;

  while (true) {
    const head = await reader.peek(ID3V2_HEADER_SIZE);
    if (head.length === 0) {
      return { seconds, stoppedEarly: skipped > 0 };
    }

    if (isTag(head, "ID3") && head.length === ID3V2_HEADER_SIZE) {
      reader.skip(id3v2TagSize(head));
      continue;
    }

    if (isTag(head, "TAG") && reader.remaining >= ID3V1_TAG_SIZE) {
      reader.skip(ID3V1_TAG_SIZE);
      continue;
    }

    const frame = parseFrameHeader(head);
    if (!frame) {
      reader.skip(1);
      skipped++;
      continue;
    }

    // A frame cut short by the end of the file is not counted.
    if (reader.remaining < frame.frameLength) {
      return { seconds, stoppedEarly: true };
    }

    reader.skip(frame.frameLength);
    seconds += frame.samplesPerFrame / frame.sampleRate;
  }
}

/**
 * Computes the duration of an MP3 file by walking its frames.
 *
 * Undecodable bytes between frames are skipped rather than treated as
 * errors, and a frame cut short by the end of the file ends the walk. A file
 * with no decodable frame reads as 0 seconds. Only open and read failures
 * reject.
 */
export function parseMP3(filePath: string): Promise<DurationReading> {
  return withReader(filePath, sumFrameDurations);
}
