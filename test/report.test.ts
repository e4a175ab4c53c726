import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import path from 'path';
import { DurationErrorCode } from '../src/errors';
import {
  buildDurationReport,
  formatFailures,
  formatProcessingStart,
  formatStatistics,
  runDurationPipeline
} from '../src/report';
import {
  buildM4a,
  buildMp3,
  buildWav,
  cleanupTempDir,
  createTempDir,
  createTestFile,
  MP3_FRAME_LENGTH,
  MP3_FRAME_SECONDS,
  mp3Frame
} from './setup';

describe('buildDurationReport', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await cleanupTempDir(tempDir);
  });

  async function createLibrary(): Promise<void> {
    await createTestFile(path.join(tempDir, 'a.mp3'), buildMp3(10));
    await createTestFile(path.join(tempDir, 'b.wav'), buildWav({ dataBytes: 44100 * 4 }));
    await createTestFile(path.join(tempDir, 'd.ogg'), Buffer.from('OggS'));
    await createTestFile(path.join(tempDir, 'notes.txt'), 'not audio');
    await createTestFile(path.join(tempDir, 'sub', 'c.m4a'), buildM4a(1000, 5000));
  }

  it('should measure every supported file and record the rest as failures', async () => {
    await createLibrary();

    const report = await buildDurationReport(tempDir, { workerCount: 2 });

    expect(report.files).toEqual([
      path.join(tempDir, 'a.mp3'),
      path.join(tempDir, 'b.wav'),
      path.join(tempDir, 'd.ogg'),
      path.join(tempDir, 'sub', 'c.m4a')
    ]);
    expect(report.outcome.durations[0]).toBeCloseTo(10 * MP3_FRAME_SECONDS, 10);
    expect(report.outcome.durations.slice(1)).toEqual([1, 0, 5]);
    expect(report.outcome.stats.totalFiles).toBe(4);
    expect(report.outcome.stats.successCount).toBe(3);
    expect(report.outcome.stats.errorCount).toBe(1);
    expect(report.outcome.stats.totalSeconds).toBeCloseTo(6 + 10 * MP3_FRAME_SECONDS, 10);
    expect(report.failures).toEqual([
      {
        filePath: path.join(tempDir, 'd.ogg'),
        code: DurationErrorCode.FORMAT_NOT_IMPLEMENTED,
        error: 'format recognized but not implemented: .ogg'
      }
    ]);
  });

  it('should produce identical statistics for any worker count', async () => {
    await createLibrary();
    for (let i = 0; i < 20; i++) {
      await createTestFile(path.join(tempDir, 'bulk', `track${i}.mp3`), buildMp3(i + 1));
    }

    const single = await buildDurationReport(tempDir, { workerCount: 1 });
    const few = await buildDurationReport(tempDir, { workerCount: 4 });
    const many = await buildDurationReport(tempDir, { workerCount: 64 });

    expect(few.outcome.stats).toEqual(single.outcome.stats);
    expect(many.outcome.stats).toEqual(single.outcome.stats);
    expect(many.outcome.durations).toEqual(single.outcome.durations);
  });

  it('should count MP3 files whose decoding stopped early', async () => {
    const truncated = Buffer.concat([mp3Frame(), mp3Frame().subarray(0, MP3_FRAME_LENGTH - 100)]);
    await createTestFile(path.join(tempDir, 'cut.mp3'), truncated);
    await createTestFile(path.join(tempDir, 'whole.mp3'), buildMp3(2));

    const report = await buildDurationReport(tempDir, { workerCount: 2 });

    expect(report.outcome.earlyStops).toBe(1);
    expect(report.outcome.durations[0]).toBeCloseTo(MP3_FRAME_SECONDS, 10);
    expect(report.outcome.stats.successCount).toBe(2);
  });

  it('should apply the positive-duration success criterion', async () => {
    await createTestFile(path.join(tempDir, 'empty.wav'), buildWav({ dataBytes: 0 }));
    await createTestFile(path.join(tempDir, 'full.wav'), buildWav({ dataBytes: 44100 * 4 }));

    const byError = await buildDurationReport(tempDir, { workerCount: 1 });
    const byDuration = await buildDurationReport(tempDir, {
      workerCount: 1,
      successCriterion: 'positive-duration'
    });

    expect(byError.outcome.stats.successCount).toBe(2);
    expect(byError.outcome.stats.meanSecondsPerFile).toBe(0.5);
    expect(byDuration.outcome.stats.successCount).toBe(1);
    expect(byDuration.outcome.stats.meanSecondsPerFile).toBe(1);
  });

  it('should reject a directory without audio files', async () => {
    await createTestFile(path.join(tempDir, 'readme.txt'), 'hello');

    await expect(buildDurationReport(tempDir)).rejects.toThrow('No audio files found in the folder.');
  });

  it('should reject an invalid worker count', async () => {
    await createTestFile(path.join(tempDir, 'a.mp3'), buildMp3(1));

    await expect(buildDurationReport(tempDir, { workerCount: 0 })).rejects.toThrow(
      'Worker count must be a positive integer, got 0'
    );
  });
});

describe('runDurationPipeline', () => {
  it('should use an injected resolver and announce the run before processing', async () => {
    const events: string[] = [];

    const outcome = await runDurationPipeline(['x', 'y'], {
      workerCount: 2,
      resolve: async (filePath) => ({ seconds: filePath === 'x' ? 7 : 3 }),
      onStart: (total, workers) => events.push(`found ${total} ${workers}`),
      progress: {
        startScanning: () => {},
        updateScanning: () => {},
        endScanning: () => {},
        startProcessing: (total, workers) => events.push(`start ${total} ${workers}`),
        advance: () => events.push('advance'),
        endProcessing: () => events.push('end')
      }
    });

    expect(outcome.durations).toEqual([7, 3]);
    expect(events).toEqual(['found 2 2', 'start 2 2', 'advance', 'advance', 'end']);
  });
});

describe('formatProcessingStart', () => {
  it('should announce the file and worker counts', () => {
    expect(formatProcessingStart(12, 4)).toBe('Found 12 audio files. Processing with 4 workers...');
  });
});

describe('formatStatistics', () => {
  it('should render totals in hours and the mean in hours and minutes', () => {
    const text = formatStatistics({
      totalFiles: 4,
      successCount: 3,
      errorCount: 1,
      totalSeconds: 60,
      meanSecondsPerFile: 20
    });

    expect(text).toBe([
      '=== Results ===',
      'Total files found: 4',
      'Successfully processed: 3',
      'Errors: 1',
      'Total audio duration: 0.02 hours',
      'Mean audio duration per file: 0.0056 hours (0.33 minutes)'
    ].join('\n'));
  });
});

describe('formatFailures', () => {
  it('should render one line per failed file', () => {
    expect(formatFailures([
      { filePath: '/music/a.ogg', code: DurationErrorCode.FORMAT_NOT_IMPLEMENTED, error: 'format recognized but not implemented: .ogg' },
      { filePath: '/music/b.wav', code: DurationErrorCode.INVALID_WAV, error: 'invalid WAV file' }
    ])).toBe('- /music/a.ogg: format recognized but not implemented: .ogg\n- /music/b.wav: invalid WAV file');
  });
});
