import { DurationError, DurationErrorCode, toDurationError } from "./errors";
import { parseM4A } from "./parsers/m4a";
import { parseMP3 } from "./parsers/mp3";
import { parseWAV } from "./parsers/wav";
import { fileExtension } from "./scan";
import { AudioFormat, DurationReading } from "./types";

type DurationParser = (filePath: string) => Promise<DurationReading>;

const PARSERS: Partial<Record<AudioFormat, DurationParser>> = {
  mp3: parseMP3,
  wav: parseWAV,
  m4a: parseM4A
};

const FORMATS: Partial<Record<string, AudioFormat>> = {
  ".mp3": "mp3",
  ".wav": "wav",
  ".m4a": "m4a",
  ".ogg": "ogg",
  ".flac": "flac"
};

/**
 * Maps a file's extension (case-insensitive) to a recognized audio format.
 */
export function detectFormat(filePath: string): AudioFormat | null {
  return FORMATS[fileExtension(filePath)] ?? null;
}

/**
 * Reads the duration of one audio file with the parser for its extension.
 *
 * @throws DurationError UNSUPPORTED_FORMAT for unknown extensions,
 *   FORMAT_NOT_IMPLEMENTED for ogg and flac, FILE_READ_FAILED when the file
 *   cannot be read, or whatever format error the parser raised
 */
export async function resolveDuration(filePath: string): Promise<DurationReading> {
  const ext = fileExtension(filePath);
  const format = detectFormat(filePath);
  if (!format) {
    throw new DurationError(
      DurationErrorCode.UNSUPPORTED_FORMAT,
      `unsupported format: ${ext || "(none)"}`,
      filePath
    );
  }

  const parser = PARSERS[format];
  if (!parser) {
    throw new DurationError(
      DurationErrorCode.FORMAT_NOT_IMPLEMENTED,
      `format recognized but not implemented: ${ext}`,
      filePath
    );
  }

  try {
    return await parser(filePath);
  } catch (err) {
    throw toDurationError(err, filePath);
  }
}
