export interface NoiseGateOptions {
  thresholdDb?: number;
  attackMs?: number;
  releaseMs?: number;
  sampleRate?: number;
}

/**
 * Envelope-following gate. Samples whose envelope sits below the threshold are
 * attenuated in proportion to how far below it they are.
 */
export class NoiseGate {
  private readonly thresholdDb: number;
  private readonly attackMs: number;
  private readonly releaseMs: number;
  private readonly sampleRate: number;

  private envelope = 0;

  constructor(options: NoiseGateOptions = {}) {
    this.thresholdDb = options.thresholdDb ?? -50;
    this.attackMs = options.attackMs ?? 5;
    this.releaseMs = options.releaseMs ?? 50;
    this.sampleRate = options.sampleRate ?? 44100;
  }

  /** Gates `samples` in place. */
  public process(samples: Float32Array): void {
    const attackCoeff = Math.exp(-1 / ((this.attackMs * this.sampleRate) / 1000));
    const releaseCoeff = Math.exp(-1 / ((this.releaseMs * this.sampleRate) / 1000));
    const thresholdLinear = Math.pow(10, this.thresholdDb / 20);

    for (let i = 0; i < samples.length; i += 1) {
      const inputAbs = Math.abs(samples[i]);

      if (inputAbs > this.envelope) {
        this.envelope = attackCoeff * this.envelope + (1 - attackCoeff) * inputAbs;
      } else {
        this.envelope = releaseCoeff * this.envelope + (1 - releaseCoeff) * inputAbs;
      }

      if (this.envelope < thresholdLinear) {
        samples[i] *= this.envelope / Math.max(thresholdLinear, 0.00001);
      }
    }
  }

  public reset(): void {
    this.envelope = 0;
  }
}
