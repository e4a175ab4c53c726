import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { parseFrameHeader, parseMP3 } from '../src/parsers/mp3';
import {
  createTempDir,
  cleanupTempDir,
  createTestFile,
  buildMp3,
  mp3Frame,
  MP3_FRAME_SECONDS
} from './setup';
import path from 'path';

describe('parseFrameHeader', () => {
  it('should decode an MPEG-1 Layer III header', () => {
    const header = parseFrameHeader(Buffer.from([0xff, 0xfb, 0x90, 0x00]));
    expect(header).toEqual({
      version: '1',
      layer: 3,
      bitrate: 128000,
      sampleRate: 44100,
      samplesPerFrame: 1152,
      frameLength: 417
    });
  });

  it('should add the padding byte to the frame length', () => {
    const header = parseFrameHeader(Buffer.from([0xff, 0xfb, 0x92, 0x00]));
    expect(header?.frameLength).toBe(418);
  });

  it('should use 576 samples for MPEG-2 Layer III', () => {
    // MPEG-2, Layer III, 64 kbps, 22050 Hz
    const header = parseFrameHeader(Buffer.from([0xff, 0xf3, 0x80, 0x00]));
    expect(header?.version).toBe('2');
    expect(header?.samplesPerFrame).toBe(576);
    expect(header?.sampleRate).toBe(22050);
    expect(header?.frameLength).toBe(208);
  });

  it('should compute Layer I frame lengths in 4-byte slots', () => {
    // MPEG-1, Layer I, 384 kbps, 48000 Hz
    const header = parseFrameHeader(Buffer.from([0xff, 0xff, 0xc4, 0x00]));
    expect(header?.layer).toBe(1);
    expect(header?.samplesPerFrame).toBe(384);
    expect(header?.frameLength).toBe(384);
  });

  it('should reject bytes without frame sync', () => {
    expect(parseFrameHeader(Buffer.from([0x00, 0xfb, 0x90, 0x00]))).toBeNull();
  });

  it('should reject the reserved version', () => {
    expect(parseFrameHeader(Buffer.from([0xff, 0xeb, 0x90, 0x00]))).toBeNull();
  });

  it('should reject free-format and invalid bitrates', () => {
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0x00, 0x00]))).toBeNull();
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0xf0, 0x00]))).toBeNull();
  });

  it('should reject the reserved sample rate', () => {
    expect(parseFrameHeader(Buffer.from([0xff, 0xfb, 0x9c, 0x00]))).toBeNull();
  });
});

describe('parseMP3', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  it('should sum the duration of every frame', async () => {
    const file = path.join(tempDir, 'ten.mp3');
    await createTestFile(file, buildMp3(10));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(10 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(false);
  });

  it('should read frames across buffer refills', async () => {
    const file = path.join(tempDir, 'long.mp3');
    await createTestFile(file, buildMp3(400));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(400 * MP3_FRAME_SECONDS, 9);
  });

  it('should return zero without failing when no frame decodes', async () => {
    const file = path.join(tempDir, 'junk.mp3');
    await createTestFile(file, 'not an mp3 at all');

    const reading = await parseMP3(file);

    expect(reading).toEqual({ seconds: 0, stoppedEarly: true });
  });

  it('should return zero for an empty file', async () => {
    const file = path.join(tempDir, 'empty.mp3');
    await createTestFile(file, '');

    await expect(parseMP3(file)).resolves.toEqual({ seconds: 0, stoppedEarly: false });
  });

  it('should skip a leading ID3v2 tag', async () => {
    const file = path.join(tempDir, 'tagged.mp3');
    await createTestFile(file, buildMp3(3, 300));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(3 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(false);
  });

  it('should skip a trailing ID3v1 tag', async () => {
    const file = path.join(tempDir, 'v1.mp3');
    const tag = Buffer.concat([Buffer.from('TAG', 'latin1'), Buffer.alloc(125)]);
    await createTestFile(file, Buffer.concat([buildMp3(3), tag]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(3 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(false);
  });

  it('should skip trailing garbage and keep the frames before it', async () => {
    const file = path.join(tempDir, 'garbage.mp3');
    await createTestFile(file, Buffer.concat([buildMp3(5), Buffer.from('trailing bytes')]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(5 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(true);
  });

  it('should resynchronise after padding behind the ID3v2 tag', async () => {
    const file = path.join(tempDir, 'padded.mp3');
    const tagged = buildMp3(0, 100);
    await createTestFile(file, Buffer.concat([tagged, Buffer.alloc(16), buildMp3(10)]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(10 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(true);
  });

  it('should resynchronise after a stray byte between frames', async () => {
    const file = path.join(tempDir, 'stray.mp3');
    await createTestFile(file, Buffer.concat([buildMp3(5), Buffer.from([0x00]), buildMp3(5)]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(10 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(true);
  });

  it('should find the first frame behind leading junk', async () => {
    const file = path.join(tempDir, 'lead.mp3');
    await createTestFile(file, Buffer.concat([Buffer.from('junk', 'latin1'), buildMp3(2)]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(2 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(true);
  });

  it('should not count a frame cut short by the end of the file', async () => {
    const file = path.join(tempDir, 'truncated.mp3');
    await createTestFile(file, Buffer.concat([buildMp3(3), mp3Frame().subarray(0, 100)]));

    const reading = await parseMP3(file);

    expect(reading.seconds).toBeCloseTo(3 * MP3_FRAME_SECONDS, 9);
    expect(reading.stoppedEarly).toBe(true);
  });

  it('should reject a file that does not exist', async () => {
    await expect(parseMP3(path.join(tempDir, 'missing.mp3'))).rejects.toThrow();
  });
});
