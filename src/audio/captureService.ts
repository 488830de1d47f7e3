import { spawn } from 'child_process';
import type { Readable } from 'stream';
import type { AppConfiguration } from '../config/appConfig';
import { log } from '../log';
import { levelFromPcm16 } from './pcm';
import {
  AudioCaptureError,
  EMPTY_CAPTURED_AUDIO,
  createCapturedAudio,
  type AudioCaptureService,
  type CapturedAudio,
} from './types';

const LEVEL_UPDATE_INTERVAL_MS = 50;

/** A running recorder writing PCM16LE mono to `output`. */
export interface RecorderProcess {
  readonly output: Readable;
  stop(): void;
  onExit(listener: (code: number | null, error?: Error) => void): void;
}

export interface RecorderOptions {
  sampleRate: number;
  deviceId: string | null;
}

export interface RecorderFactory {
  /** Resolves true when the recorder can be started on this machine. */
  probe(): Promise<boolean>;
  start(options: RecorderOptions): RecorderProcess;
}

/**
 * Records through SoX (`sox -d` or `-t <driver> <device>`), raw signed 16-bit
 * little-endian mono on stdout.
 */
export class SoxRecorderFactory implements RecorderFactory {
  constructor(
    private readonly command = 'sox',
    private readonly driver = process.platform === 'darwin' ? 'coreaudio' : 'alsa',
  ) {}

  public probe(): Promise<boolean> {
    return new Promise((resolve) => {
      const child = spawn(this.command, ['--version'], { stdio: ['ignore', 'ignore', 'ignore'] });
      child.on('error', (err) => {
        log.warn({ event: 'recorder_probe_failed', command: this.command, err: err.message }, 'recorder probe failed');
        resolve(false);
      });
      child.on('close', (code) => resolve(code === 0));
    });
  }

  public start(options: RecorderOptions): RecorderProcess {
    const input = options.deviceId ? ['-t', this.driver, options.deviceId] : ['-d'];
    const args = [
      '-q',
      ...input,
      '-t', 'raw',
      '-b', '16',
      '-e', 'signed-integer',
      '-L',
      '-c', '1',
      '-r', String(options.sampleRate),
      '-',
    ];

    const child = spawn(this.command, args, { stdio: ['ignore', 'pipe', 'pipe'] });
    const stderr: Buffer[] = [];
    child.stderr.on('data', (d: Buffer) => stderr.push(d));

    return {
      output: child.stdout,
      stop: () => {
        if (child.exitCode === null) child.kill('SIGTERM');
      },
      onExit: (listener) => {
        child.on('error', (err) => listener(null, err));
        child.on('close', (code, signal) => {
          if (code === 0 || signal === 'SIGTERM') {
            listener(code);
            return;
          }
          const message = Buffer.concat(stderr).toString('utf8').trim();
          listener(code, new Error(message || `recorder exited with code ${code}`));
        });
      },
    };
  }
}

export interface StreamAudioCaptureOptions {
  recorder: RecorderFactory;
  getConfiguration: () => AppConfiguration;
  sampleRate: number;
  onDeviceDisconnected?: (error: AudioCaptureError) => void;
}

/**
 * Microphone capture on top of an external recorder process. Chunks arriving
 * on the recorder's stdout are kept until `stopRecording()` joins them.
 */
export class StreamAudioCaptureService implements AudioCaptureService {
  private readonly recorder: RecorderFactory;
  private readonly getConfiguration: () => AppConfiguration;
  private readonly sampleRate: number;
  private readonly onDeviceDisconnected?: (error: AudioCaptureError) => void;

  private process: RecorderProcess | null = null;
  private chunks: Buffer[] = [];
  private levelTimer: NodeJS.Timeout | null = null;
  private recording = false;
  private level = 0;

  constructor(options: StreamAudioCaptureOptions) {
    this.recorder = options.recorder;
    this.getConfiguration = options.getConfiguration;
    this.sampleRate = options.sampleRate;
    this.onDeviceDisconnected = options.onDeviceDisconnected;
  }

  public get isRecording(): boolean {
    return this.recording;
  }

  public get audioLevel(): number {
    return this.level;
  }

  public async requestMicrophoneAccess(): Promise<boolean> {
    return this.recorder.probe();
  }

  public startRecording(): void {
    if (this.recording) {
      throw new AudioCaptureError('already_recording');
    }

    this.chunks = [];
    const deviceId = this.getConfiguration().inputDeviceUID;

    let proc: RecorderProcess;
    try {
      proc = this.recorder.start({ sampleRate: this.sampleRate, deviceId });
    } catch (error) {
      throw new AudioCaptureError('engine_creation_failed', { cause: error });
    }

    proc.output.on('data', (chunk: Buffer) => {
      if (this.process === proc) this.chunks.push(chunk);
    });
    proc.onExit((code, error) => this.handleExit(proc, code, error));

    this.process = proc;
    this.recording = true;
    this.startLevelMonitoring();

    log.info(
      { event: 'audio_capture_started', sample_rate: this.sampleRate, device_id: deviceId },
      'audio capture started',
    );
  }

  public stopRecording(): CapturedAudio {
    if (!this.recording) {
      return EMPTY_CAPTURED_AUDIO;
    }

    this.stopLevelMonitoring();
    const proc = this.process;
    this.process = null;
    this.recording = false;
    proc?.stop();

    const data = Buffer.concat(this.chunks);
    this.chunks = [];
    // An odd trailing byte would split a sample.
    const aligned = data.length % 2 === 0 ? data : data.subarray(0, data.length - 1);

    log.info({ event: 'audio_capture_stopped', bytes: aligned.length }, 'audio capture stopped');
    return createCapturedAudio(aligned, this.sampleRate);
  }

  private handleExit(proc: RecorderProcess, code: number | null, error?: Error): void {
    if (this.process !== proc || !error) return;

    log.error(
      { event: 'audio_capture_device_lost', exit_code: code, err: error.message },
      'audio recorder exited while recording',
    );
    this.stopLevelMonitoring();
    this.onDeviceDisconnected?.(new AudioCaptureError('device_disconnected', { cause: error }));
  }

  private startLevelMonitoring(): void {
    this.levelTimer = setInterval(() => {
      const last = this.chunks[this.chunks.length - 1];
      if (!last) return;
      this.level = levelFromPcm16(last);
    }, LEVEL_UPDATE_INTERVAL_MS);
    this.levelTimer.unref?.();
  }

  private stopLevelMonitoring(): void {
    if (this.levelTimer) {
      clearInterval(this.levelTimer);
      this.levelTimer = null;
    }
    this.level = 0;
  }
}
