import type { AudioSink, SoundEffect } from "../game/collaborators.js";

interface SoundConfig {
  volume?: number;
  music?: boolean;
}

export interface SoundCue {
  effect: SoundEffect;
  volume: number;
  loop: boolean;
}

export type SoundPlayer = (cue: SoundCue) => void | Promise<void>;

export interface AudioSettings {
  muted: boolean;
  sfxVolume: number;
  bgmVolume: number;
}

export interface SoundManagerOptions {
  player: SoundPlayer;
  muted?: boolean;
  sfxVolume?: number;
  bgmVolume?: number;
}

const SOUND_TABLE: Record<SoundEffect, SoundConfig> = {
  background: { volume: 1, music: true },
  move: { volume: 0.6 },
  merge: { volume: 0.85 },
  "game-over": { volume: 0.9 },
  achievement: { volume: 0.9 }
};

function clampVolume(volume: number): number {
  if (!Number.isFinite(volume)) return 0;
  return Math.min(1, Math.max(0, volume));
}

export class SoundManager implements AudioSink {
  private muted: boolean;
  private sfxVolume: number;
  private bgmVolume: number;
  private disposed = false;
  private readonly player: SoundPlayer;

  constructor(options: SoundManagerOptions) {
    this.player = options.player;
    this.muted = options.muted ?? true;
    this.sfxVolume = clampVolume(options.sfxVolume ?? 0.7);
    this.bgmVolume = clampVolume(options.bgmVolume ?? 0.5);
  }

  toggleMute(): boolean {
    this.muted = !this.muted;
    if (!this.muted) {
      this.play("background");
    }
    return this.muted;
  }

  setMuted(muted: boolean) {
    if (muted === this.muted) return;
    this.toggleMute();
  }

  setSfxVolume(volume: number) {
    this.sfxVolume = clampVolume(volume);
  }

  setBgmVolume(volume: number) {
    this.bgmVolume = clampVolume(volume);
  }

  settings(): AudioSettings {
    return { muted: this.muted, sfxVolume: this.sfxVolume, bgmVolume: this.bgmVolume };
  }

  play(effect: SoundEffect) {
    if (this.muted || this.disposed) return;
    const config = SOUND_TABLE[effect];
    const channel = config.music ? this.bgmVolume : this.sfxVolume;
    const cue: SoundCue = {
      effect,
      volume: clampVolume((config.volume ?? 1) * channel),
      loop: Boolean(config.music)
    };
    try {
      void Promise.resolve(this.player(cue)).catch((error: unknown) => {
        console.warn("[audio] playback failed", effect, error);
      });
    } catch (error) {
      console.warn("[audio] playback failed", effect, error);
    }
  }

  dispose() {
    this.disposed = true;
  }
}
