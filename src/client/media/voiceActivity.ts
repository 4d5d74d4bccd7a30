/**
 * Local voice activity detection
 *
 * Samples the microphone spectrum on a fixed interval. Speaking starts on
 * the first sample whose average level is above the threshold and ends once
 * the level has stayed below it for the hang time, so short pauses between
 * words do not flicker the indicator.
 */
import type { AudioAnalyser } from "./types.js";

export interface VadOptions {
  intervalMs: number;
  thresholdDb: number;
  hangTimeMs: number;
  now: () => number;
}

export const DEFAULT_VAD_OPTIONS: Readonly<Omit<VadOptions, "now">> = {
  intervalMs: 100,
  thresholdDb: -50,
  hangTimeMs: 500,
};

export interface VadEvents {
  onSpeakingStart(): void;
  onSpeakingEnd(): void;
}

export function averageLevel(spectrum: ArrayLike<number>): number {
  if (spectrum.length === 0) return Number.NEGATIVE_INFINITY;

  let sum = 0;
  for (let i = 0; i < spectrum.length; i++) {
    sum += spectrum[i] ?? Number.NEGATIVE_INFINITY;
  }
  return sum / spectrum.length;
}

export class VoiceActivityDetector {
  private readonly options: VadOptions;
  private timer: ReturnType<typeof setInterval> | null = null;
  private speaking = false;
  private silentSince: number | null = null;

  constructor(
    private readonly analyser: AudioAnalyser,
    private readonly events: VadEvents,
    options: Partial<VadOptions> = {},
  ) {
    this.options = { ...DEFAULT_VAD_OPTIONS, now: () => Date.now(), ...options };
  }

  get isSpeaking(): boolean {
    return this.speaking;
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.sample(), this.options.intervalMs);
  }

  /**
   * Stop sampling. An ongoing speaking period is ended.
   */
  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
    this.silentSince = null;
    if (this.speaking) {
      this.speaking = false;
      this.events.onSpeakingEnd();
    }
  }

  sample(): void {
    const level = averageLevel(this.analyser.readFrequencyData());
    const now = this.options.now();

    if (level > this.options.thresholdDb) {
      this.silentSince = null;
      if (!this.speaking) {
        this.speaking = true;
        this.events.onSpeakingStart();
      }
      return;
    }

    if (!this.speaking) return;

    if (this.silentSince === null) {
      this.silentSince = now;
      return;
    }

    if (now - this.silentSince >= this.options.hangTimeMs) {
      this.speaking = false;
      this.silentSince = null;
      this.events.onSpeakingEnd();
    }
  }
}
