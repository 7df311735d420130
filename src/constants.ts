export const DEFAULT_ASSEMBLYAI_BASE_URL = "https://api.assemblyai.com";

export const DEFAULT_PORT = 5000;
export const DEFAULT_AUDIO_FORMAT = "mp3";

export const DEFAULT_DOWNLOAD_TIMEOUT_MS = 120_000;

// 120 polls x 3s
export const DEFAULT_POLL_INTERVAL_MS = 3_000;
export const DEFAULT_TRANSCRIPTION_TIMEOUT_MS = 360_000;

export const DEFAULT_STALE_TEMP_MAX_AGE_HOURS = 24;

// Per-request working directories are named `${TEMP_DIR_PREFIX}<uuid>`
export const TEMP_DIR_PREFIX = "temp_";
export const AUDIO_FILE_BASENAME = "audio";

// Values yt-dlp accepts for --audio-format
export const AUDIO_FORMATS = ["aac", "flac", "m4a", "mp3", "opus", "vorbis", "wav"] as const;

export type AudioFormat = (typeof AUDIO_FORMATS)[number];

export function isAudioFormat(value: string): value is AudioFormat {
  return AUDIO_FORMATS.some((format) => format === value);
}

// Extensions yt-dlp may leave behind, including the source container when extraction is skipped
export const AUDIO_EXTENSIONS = [
  "mp3",
  "m4a",
  "webm",
  "opus",
  "ogg",
  "wav",
  "aac",
  "flac",
] as const;

export function extensionForFormat(format: AudioFormat): string {
  return format === "vorbis" ? "ogg" : format;
}
