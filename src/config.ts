import path from "node:path";
import fs from "node:fs";
import os from "node:os";
import {
  DEFAULT_ASSEMBLYAI_BASE_URL,
  DEFAULT_AUDIO_FORMAT,
  DEFAULT_DOWNLOAD_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_PORT,
  DEFAULT_STALE_TEMP_MAX_AGE_HOURS,
  DEFAULT_TRANSCRIPTION_TIMEOUT_MS,
  isAudioFormat,
  type AudioFormat,
} from "./constants.js";

export interface ServiceConfig {
  port: number;
  host: string;
  logLevel: string;
  corsOrigin: true | string[];
  audioDir: string;
  ytdlpCmd: string;
  ffmpegCmd?: string;
  audioFormat: AudioFormat;
  downloadTimeoutMs: number;
  // Absent key keeps the server up but refuses transcription requests
  assemblyAiApiKey?: string;
  assemblyAiBaseUrl: string;
  pollIntervalMs: number;
  transcriptionTimeoutMs: number;
  staleTempMaxAgeMs: number;
}

function ensureDir(dir: string) {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

function intFromEnv(value: string | undefined, fallback: number, min = 0): number {
  const parsed = parseInt(value || String(fallback), 10);
  return Math.max(min, Number.isNaN(parsed) ? fallback : parsed);
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function parseCorsOrigin(value: string | undefined): true | string[] {
  const raw = nonEmpty(value);
  if (!raw || raw === "*") return true;
  return raw
    .split(",")
    .map((origin) => origin.trim())
    .filter(Boolean);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const audioDir = nonEmpty(env.AUDIO_DIR) || path.join(os.tmpdir(), "transcribe-audio");

  const format = nonEmpty(env.AUDIO_FORMAT) || DEFAULT_AUDIO_FORMAT;
  if (!isAudioFormat(format)) {
    throw new Error(`Unsupported AUDIO_FORMAT "${format}"`);
  }

  const staleHours = intFromEnv(env.STALE_TEMP_MAX_AGE_HOURS, DEFAULT_STALE_TEMP_MAX_AGE_HOURS, 1);

  ensureDir(audioDir);

  return Object.freeze({
    port: intFromEnv(env.PORT, DEFAULT_PORT),
    host: nonEmpty(env.HOST) || "0.0.0.0",
    logLevel: nonEmpty(env.LOG_LEVEL) || "info",
    corsOrigin: parseCorsOrigin(env.CORS_ORIGIN),
    audioDir,
    ytdlpCmd: nonEmpty(env.YTDLP_CMD) || "yt-dlp",
    ffmpegCmd: nonEmpty(env.FFMPEG_CMD),
    audioFormat: format,
    downloadTimeoutMs: intFromEnv(env.DOWNLOAD_TIMEOUT_MS, DEFAULT_DOWNLOAD_TIMEOUT_MS, 10_000),
    assemblyAiApiKey: nonEmpty(env.ASSEMBLYAI_API_KEY),
    assemblyAiBaseUrl: (nonEmpty(env.ASSEMBLYAI_BASE_URL) || DEFAULT_ASSEMBLYAI_BASE_URL).replace(/\/+$/, ""),
    pollIntervalMs: intFromEnv(env.POLL_INTERVAL_MS, DEFAULT_POLL_INTERVAL_MS, 250),
    transcriptionTimeoutMs: intFromEnv(
      env.TRANSCRIPTION_TIMEOUT_MS,
      DEFAULT_TRANSCRIPTION_TIMEOUT_MS,
      10_000
    ),
    staleTempMaxAgeMs: staleHours * 60 * 60 * 1000,
  });
}
