/**
 * AudioExtractor.ts - Normalized audio track via ffmpeg
 *
 * Drops the video stream and writes a single 16 kHz mono PCM WAV, whatever
 * the input's channel layout or sample rate. One file per run, always named
 * audio.wav.
 */

import { mkdir, stat } from 'fs/promises';
import { join } from 'path';

import type { ToolPaths } from '../config/AppConfig.js';
import { AudioExtractionError, describeError } from '../shared/errors.js';
import type { LogFn } from '../shared/logger.js';
import { silentLogger } from '../shared/logger.js';
import type { ExtractedAudio, Result } from '../shared/types.js';
import { ok, err } from '../shared/types.js';
import { ToolRunner, diagnosticOf, succeeded } from './ToolRunner.js';

export const AUDIO_FILE_NAME = 'audio.wav';
export const AUDIO_SAMPLE_RATE = 16000;

const FFMPEG_AUDIO_TIMEOUT_MS = 10 * 60 * 1000;

export class AudioExtractor {
  private tools: Pick<ToolPaths, 'ffmpeg'>;
  private runner: ToolRunner;
  private log: LogFn;

  constructor(tools: Pick<ToolPaths, 'ffmpeg'>, runner?: ToolRunner, log: LogFn = silentLogger) {
    this.tools = tools;
    this.log = log;
    this.runner = runner ?? new ToolRunner(log);
  }

  async extract(videoPath: string, outputDir: string): Promise<Result<ExtractedAudio, AudioExtractionError>> {
    try {
      await mkdir(outputDir, { recursive: true });
    } catch (error) {
      return err(new AudioExtractionError(`Cannot create audio directory: ${outputDir}`, describeError(error)));
    }

    const audioPath = join(outputDir, AUDIO_FILE_NAME);

    // -vn: no video, pcm_s16le: uncompressed, -ar/-ac: 16 kHz mono
    const run = await this.runner.run(
      this.tools.ffmpeg,
      [
        '-hide_banner',
        '-nostdin',
        '-y',
        '-i', videoPath,
        '-vn',
        '-acodec', 'pcm_s16le',
        '-ar', String(AUDIO_SAMPLE_RATE),
        '-ac', '1',
        audioPath,
      ],
      { timeoutMs: FFMPEG_AUDIO_TIMEOUT_MS }
    );

    if (!succeeded(run)) {
      return err(new AudioExtractionError('Failed to extract audio', diagnosticOf(run)));
    }

    const size = await stat(audioPath).then(
      (stats) => stats.size,
      () => 0
    );
    if (size === 0) {
      return err(new AudioExtractionError('ffmpeg reported success but wrote no audio', run.stderr.trim()));
    }

    this.log(`Audio extracted to ${audioPath}`);
    return ok<ExtractedAudio>({ path: audioPath, sampleRate: AUDIO_SAMPLE_RATE, channels: 1, codec: 'pcm_s16le' });
  }

  abort(): void {
    this.runner.abort();
  }
}
