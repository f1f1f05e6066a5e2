export type SessionState = 'idle' | 'recording' | 'draining' | 'finalizing';
export type TranscriptProtocol = 'whisperlivekit' | 'json-events';
export type TranscriptMode = 'incremental' | 'cumulative';
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type DrainReason = 'end-of-stream' | 'deadline' | 'not-connected';

export interface AudioFormat {
  sampleRate: number;
  channels: number;
  frameDurationMs: number;
}

export interface AudioFrame {
  sequence: number;
  samples: Int16Array;
  data: Buffer;
}

export type TranscriptEvent =
  | { kind: 'partial'; text: string; speaker?: string }
  | { kind: 'final'; text: string }
  | { kind: 'end' };

export interface ToggleEvent {
  at: number;
}

export interface SessionResult {
  sessionId: number;
  text: string;
  finalCount: number;
  usedPartialFallback: boolean;
  drainReason: DrainReason;
  framesSent: number;
}

export interface AppConfig {
  endpoint: string;
  protocol: TranscriptProtocol;
  transcriptMode: TranscriptMode;
  hotkey: string;
  hotkeyCooldownMs: number;
  sampleRate: number;
  channels: number;
  frameDurationMs: number;
  maxWaitMs: number;
  connectTimeoutMs: number;
  typingDelayMs: number;
  ffmpegBin: string;
  audioInputFormat: string;
  audioInput: string;
  logDir: string;
  logLevel: LogLevel;
}
