import ffmpeg from 'fluent-ffmpeg';
import { logger } from '../../config/logger';
import type {
  AudioProbe,
  AudioToolkit,
  OutputFormat,
  RenderGraphOptions,
} from '../../types/audio.types';

export const SAMPLE_RATE = 48000;

/** Strip container metadata and encoder tags so identical graphs give identical bytes. */
const BITEXACT_OPTIONS = ['-map_metadata', '-1', '-fflags', '+bitexact', '-flags:a', '+bitexact'];

/**
 * fluent-ffmpeg wrapper used by the timeline builder and the mixer. Every
 * render ends in 48 kHz stereo in the requested format.
 */
export class FFmpegService implements AudioToolkit {
  /**
   * Probe duration and first audio stream parameters
   */
  async probe(filePath: string): Promise<AudioProbe> {
    return new Promise((resolve, reject) => {
      ffmpeg.ffprobe(filePath, (err, metadata) => {
        if (err) {
          const msg = err instanceof Error ? err.message : String(err);
          reject(new Error(`FFprobe failed for ${filePath}: ${msg}`));
          return;
        }
        const stream = metadata.streams.find((s) => s.codec_type === 'audio');
        if (!stream) {
          reject(new Error(`No audio stream in ${filePath}`));
          return;
        }
        resolve({
          durationSec: Number(metadata.format.duration ?? stream.duration ?? 0),
          sampleRate: stream.sample_rate,
          channels: stream.channels,
          codec: stream.codec_name,
        });
      });
    });
  }

  /**
   * Run a filter_complex graph over the given inputs and write one output.
   */
  async renderGraph(options: RenderGraphOptions): Promise<string> {
    const { inputs, filterComplex, outputLabel, outputPath, format } = options;
    if (inputs.length === 0) throw new Error('renderGraph requires at least one input');

    return new Promise((resolve, reject) => {
      const command = ffmpeg();
      for (const input of inputs) {
        command.input(input.filePath);
        if (input.inputOptions && input.inputOptions.length > 0) {
          command.inputOptions(input.inputOptions);
        }
      }

      command.complexFilter(filterComplex, [outputLabel]);
      this.setOutputOptions(command, format);
      command.outputOptions(BITEXACT_OPTIONS);
      command.output(outputPath);

      command
        .on('start', (commandLine: string) => {
          logger.debug('FFmpeg filter_complex: %s', filterComplex);
          logger.debug('FFmpeg command (first 500 chars): %s', commandLine.substring(0, 500));
        })
        .on('end', () => {
          logger.info('FFmpeg render completed', { outputPath, inputs: inputs.length });
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = err instanceof Error ? err.message : String(err);
          logger.error('FFmpeg error: %s', msg);
          reject(new Error(`FFmpeg processing failed: ${msg}`));
        });

      command.run();
    });
  }

  /**
   * Re-encode a file into another format (same channel layout and rate)
   */
  async transcode(inputPath: string, outputPath: string, format: OutputFormat): Promise<string> {
    return new Promise((resolve, reject) => {
      const command = ffmpeg(inputPath);
      this.setOutputOptions(command, format);
      command.outputOptions(BITEXACT_OPTIONS);
      command.output(outputPath);

      command
        .on('end', () => {
          logger.debug('Transcode completed', { outputPath, format });
          resolve(outputPath);
        })
        .on('error', (err: unknown) => {
          const msg = err instanceof Error ? err.message : String(err);
          logger.error('FFmpeg transcode error: %s', msg);
          reject(new Error(`FFmpeg transcode failed: ${msg}`));
        });

      command.run();
    });
  }

  /**
   * Set output options based on format
   */
  private setOutputOptions(command: ffmpeg.FfmpegCommand, format: OutputFormat): void {
    switch (format) {
      case 'mp3':
        command
          .audioCodec('libmp3lame')
          .audioBitrate('320k')
          .audioChannels(2)
          .audioFrequency(SAMPLE_RATE);
        break;
      case 'wav':
        command
          .audioCodec('pcm_s16le')
          .audioChannels(2)
          .audioFrequency(SAMPLE_RATE);
        break;
      case 'aac':
        command
          .audioCodec('aac')
          .audioBitrate('320k')
          .audioChannels(2)
          .audioFrequency(SAMPLE_RATE);
        break;
    }
  }
}
