import type { FastifyBaseLogger } from "fastify";

export interface TranscribeYoutubeRequest {
  url: string;
}

export interface ValidatedRequest {
  url: string;
  videoId: string;
}

export interface VideoMetadata {
  videoId: string;
  title: string;
}

export interface DownloadedAudio extends VideoMetadata {
  audioPath: string;
}

export interface AudioDownloader {
  download(url: string, outDir: string): Promise<DownloadedAudio>;
}

export interface Transcriber {
  transcribe(audioPath: string, log: Logger): Promise<string>;
}

// Lifecycle of a single request; only ever reported in logs
export type RequestStage =
  | "pending"
  | "downloading"
  | "transcribing"
  | "succeeded"
  | "failed";

export interface TranscribeSuccess {
  success: true;
  transcript: string;
  title: string;
  videoId: string;
}

export interface TranscribeFailure {
  success: false;
  error: string;
}

export type TranscribeResponse = TranscribeSuccess | TranscribeFailure;

export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
