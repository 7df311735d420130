import path from "node:path";
import fs from "node:fs/promises";
import { z } from "zod";
import {
  AUDIO_EXTENSIONS,
  AUDIO_FILE_BASENAME,
  extensionForFormat,
  type AudioFormat,
} from "../constants.js";
import { DownloadFailedError } from "../errors.js";
import { CommandError, runCommand, type CommandRunner } from "../utils/process.js";
import type { AudioDownloader, DownloadedAudio, VideoMetadata } from "../types.js";
import { extractVideoId } from "./validate.js";

export interface YtDlpDownloaderOptions {
  ytdlpCmd: string;
  ffmpegCmd?: string;
  audioFormat: AudioFormat;
  timeoutMs: number;
  run?: CommandRunner;
}

// Printed by `--print "%(.{id,title})j"` before the download starts
const MetadataLine = z.object({
  id: z.string().optional(),
  title: z.string().optional(),
});

export function buildYtDlpArgs(
  url: string,
  outDir: string,
  opts: Pick<YtDlpDownloaderOptions, "audioFormat" | "ffmpegCmd">
): string[] {
  const args = [
    "--format", "bestaudio/best",
    "--extract-audio",
    "--audio-format", opts.audioFormat,
    "--no-playlist",
    "--no-warnings",
    "--no-progress",
    "--no-simulate",
    "--print", "%(.{id,title})j",
    "--output", path.join(outDir, `${AUDIO_FILE_BASENAME}.%(ext)s`),
  ];
  if (opts.ffmpegCmd) {
    args.push("--ffmpeg-location", opts.ffmpegCmd);
  }
  // Everything after `--` is a URL, even if it starts with a dash
  args.push("--", url);
  return args;
}

/** Reads id/title from yt-dlp's stdout; empty strings when nothing usable was printed. */
export function parseMetadata(stdout: string, url: string): VideoMetadata {
  const lines = stdout
    .split("\n")
    .map((line) => line.trim())
    .filter((line) => line.startsWith("{"));

  for (const line of lines.reverse()) {
    try {
      const parsed = MetadataLine.safeParse(JSON.parse(line));
      if (parsed.success) {
        return {
          videoId: parsed.data.id || extractVideoId(url) || "",
          title: parsed.data.title || "",
        };
      }
    } catch {
      // not JSON, keep looking
    }
  }

  return { videoId: extractVideoId(url) || "", title: "" };
}

export async function findAudioFile(outDir: string, preferred: AudioFormat): Promise<string | null> {
  const files = (await fs.readdir(outDir)).filter((f) => {
    const ext = path.extname(f).slice(1);
    return (
      path.basename(f, path.extname(f)) === AUDIO_FILE_BASENAME &&
      AUDIO_EXTENSIONS.some((known) => known === ext)
    );
  });
  if (files.length === 0) return null;

  const chosen = files.find((f) => f.endsWith(`.${extensionForFormat(preferred)}`)) ?? files.sort()[0];
  return path.join(outDir, chosen);
}

function lastErrorLine(stderr: string): string | undefined {
  const lines = stderr
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.filter((line) => line.startsWith("ERROR:")).pop() ?? lines.pop();
}

function describeFailure(err: unknown, opts: YtDlpDownloaderOptions): string {
  if (!(err instanceof CommandError)) {
    return err instanceof Error ? err.message : String(err);
  }
  switch (err.reason) {
    case "not-found":
      return `${opts.ytdlpCmd} is not installed or not on PATH`;
    case "timeout":
      return `Timed out downloading audio after ${Math.round(opts.timeoutMs / 1000)}s`;
    case "exit":
      return lastErrorLine(err.stderr) ?? `${opts.ytdlpCmd} exited with code ${err.exitCode}`;
  }
}

export function createYtDlpDownloader(opts: YtDlpDownloaderOptions): AudioDownloader {
  const run = opts.run ?? runCommand;

  return {
    async download(url: string, outDir: string): Promise<DownloadedAudio> {
      const args = buildYtDlpArgs(url, outDir, opts);

      let stdout: string;
      try {
        ({ stdout } = await run(opts.ytdlpCmd, args, { timeoutMs: opts.timeoutMs }));
      } catch (err) {
        throw new DownloadFailedError(`Failed to download audio: ${describeFailure(err, opts)}`);
      }

      const audioPath = await findAudioFile(outDir, opts.audioFormat);
      if (!audioPath) {
        throw new DownloadFailedError("Failed to download audio: yt-dlp did not produce an audio file");
      }

      return { audioPath, ...parseMetadata(stdout, url) };
    },
  };
}
