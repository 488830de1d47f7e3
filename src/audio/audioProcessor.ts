import fs from 'fs';
import path from 'path';
import type { AppConfiguration } from '../config/appConfig';
import { log } from '../log';
import { incStageError, startStageTimer } from '../metrics';
import { NoiseGate } from './noiseGate';
import { encodeWav, floatToPcm16, pcm16ToFloat } from './pcm';
import {
  EMPTY_PROCESSED_AUDIO,
  type AudioProcessing,
  type CapturedAudio,
  type ProcessedAudioResult,
} from './types';
import { VoiceActivityDetector } from './voiceActivityDetector';

export interface AudioProcessorOptions {
  /** Returns the configuration in effect for the next call. */
  getConfiguration: () => AppConfiguration;
  /** When set, intermediate stages are written here as WAV files. */
  debugDir?: string;
}

type DebugStage = '1_raw' | '2_after_noisegate' | '3_final_speech' | '3_final_speech_bypassed';

function timestampForFile(date: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  return `${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`;
}

/**
 * Turns a raw capture into an upload-ready payload: noise gate, speech
 * detection, concatenation of the speech segments and WAV encoding.
 */
export class AudioProcessor implements AudioProcessing {
  private readonly getConfiguration: () => AppConfiguration;
  private readonly debugDir?: string;
  private debugDirLogged = false;

  constructor(options: AudioProcessorOptions) {
    this.getConfiguration = options.getConfiguration;
    this.debugDir = options.debugDir;
  }

  public async process(captured: CapturedAudio): Promise<ProcessedAudioResult> {
    const sampleRate = Math.round(captured.sampleRate);
    const endTimer = startStageTimer('audio_process');

    try {
      log.debug(
        { event: 'audio_process_start', bytes: captured.data.length, sample_rate: sampleRate },
        'processing raw audio',
      );

      const samples = pcm16ToFloat(captured.data);
      if (samples.length === 0) {
        log.debug({ event: 'audio_process_empty' }, 'no samples to process');
        return EMPTY_PROCESSED_AUDIO;
      }

      await this.writeDebugAudio(samples, sampleRate, '1_raw');

      const config = this.getConfiguration();

      if (config.bypassAudioProcessing) {
        log.info({ event: 'audio_process_bypassed' }, 'audio processing bypassed (noise gate and VAD disabled)');
        await this.writeDebugAudio(samples, sampleRate, '3_final_speech_bypassed');
        return this.encode(samples, sampleRate);
      }

      const noiseGate = new NoiseGate({ thresholdDb: config.noiseGateThresholdDb, sampleRate });
      const detector = new VoiceActivityDetector({ sampleRate, silenceThresholdDb: config.silenceThresholdDb });

      noiseGate.process(samples);
      await this.writeDebugAudio(samples, sampleRate, '2_after_noisegate');

      const segments = detector.detectSpeechSegments(samples);
      if (segments.length === 0) {
        log.info(
          {
            event: 'audio_process_no_speech',
            silence_threshold_db: config.silenceThresholdDb,
            noise_gate_threshold_db: config.noiseGateThresholdDb,
          },
          'no speech detected after VAD processing',
        );
        return EMPTY_PROCESSED_AUDIO;
      }

      const speechLength = segments.reduce(
        (total, segment) => total + (Math.min(segment.endSample, samples.length) - segment.startSample),
        0,
      );
      const speech = new Float32Array(speechLength);
      let offset = 0;
      for (const segment of segments) {
        const part = samples.subarray(segment.startSample, Math.min(segment.endSample, samples.length));
        speech.set(part, offset);
        offset += part.length;
      }

      await this.writeDebugAudio(speech, sampleRate, '3_final_speech');

      const result = this.encode(speech, sampleRate);
      log.info(
        {
          event: 'audio_process_done',
          input_bytes: captured.data.length,
          output_bytes: result.audioData.length,
          speech_samples: speech.length,
          total_samples: samples.length,
        },
        'audio processed',
      );
      return result;
    } catch (error) {
      incStageError('audio_process');
      throw error;
    } finally {
      endTimer();
    }
  }

  private encode(samples: Float32Array, sampleRate: number): ProcessedAudioResult {
    return {
      audioData: encodeWav(floatToPcm16(samples), sampleRate),
      isEmpty: false,
      mimeType: 'audio/wav',
    };
  }

  private async writeDebugAudio(samples: Float32Array, sampleRate: number, stage: DebugStage): Promise<void> {
    if (!this.debugDir) return;

    const dir = this.debugDir;
    const filePath = path.join(dir, `${timestampForFile(new Date())}_${stage}.wav`);
    try {
      await fs.promises.mkdir(dir, { recursive: true });
      if (!this.debugDirLogged) {
        this.debugDirLogged = true;
        log.info({ event: 'audio_debug_dir', dir }, 'debug audio directory');
      }
      await fs.promises.writeFile(filePath, encodeWav(floatToPcm16(samples), sampleRate));
      log.info(
        { event: 'audio_debug_written', file_path: filePath, samples: samples.length },
        'debug audio written',
      );
    } catch (error) {
      log.warn({ event: 'audio_debug_write_failed', file_path: filePath, err: error }, 'debug audio write failed');
    }
  }
}
