import fs from "node:fs/promises";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DownloadFailedError,
  InvalidRequestError,
  ServiceUnavailableError,
  TranscriptionFailedError,
} from "../../../src/errors.js";
import { handleTranscribeRequest } from "../../../src/pipeline/handler.js";
import type { AudioDownloader } from "../../../src/types.js";
import { failingDownloader, failingTranscriber, fakeDownloader, fakeTranscriber } from "../../fakes.js";
import { listDir, makeTempDir, silentLogger } from "../../helpers.js";

const URL = "https://www.youtube.com/watch?v=abc123";

describe("handleTranscribeRequest", () => {
  let audioDir: string;

  beforeEach(async () => {
    audioDir = await makeTempDir();
  });

  afterEach(async () => {
    await fs.rm(audioDir, { recursive: true, force: true });
  });

  it("returns transcript and metadata, leaving no temp files", async () => {
    const downloader = fakeDownloader();
    const transcriber = fakeTranscriber();

    const result = await handleTranscribeRequest(
      { url: URL },
      { audioDir, downloader, transcriber, log: silentLogger() }
    );

    expect(result).toEqual({ success: true, transcript: "hello world", title: "Test Video", videoId: "abc123" });
    expect(transcriber.transcribe).toHaveBeenCalledWith(downloader.written[0], expect.anything());
    expect(await listDir(audioDir)).toEqual([]);
  });

  it("falls back to the id parsed from the url", async () => {
    const downloader = fakeDownloader({ title: "", videoId: "" });

    const result = await handleTranscribeRequest(
      { url: "https://youtu.be/xyz789" },
      { audioDir, downloader, transcriber: fakeTranscriber(), log: silentLogger() }
    );

    expect(result).toMatchObject({ title: "", videoId: "xyz789" });
  });

  it.each([[{}], [{ url: "" }], [{ url: 7 }], [null]])(
    "rejects %j without downloading or transcribing",
    async (body) => {
      const downloader = fakeDownloader();
      const transcriber = fakeTranscriber();

      await expect(
        handleTranscribeRequest(body, { audioDir, downloader, transcriber, log: silentLogger() })
      ).rejects.toThrow(InvalidRequestError);
      expect(downloader.download).not.toHaveBeenCalled();
      expect(transcriber.transcribe).not.toHaveBeenCalled();
      expect(await listDir(audioDir)).toEqual([]);
    }
  );

  it("refuses to start without a transcriber", async () => {
    const downloader = fakeDownloader();

    await expect(
      handleTranscribeRequest({ url: URL }, { audioDir, downloader, log: silentLogger() })
    ).rejects.toThrow(ServiceUnavailableError);
    expect(downloader.download).not.toHaveBeenCalled();
  });

  it("skips transcription when the download fails and removes the partial file", async () => {
    const downloader = failingDownloader();
    const transcriber = fakeTranscriber();

    await expect(
      handleTranscribeRequest({ url: URL }, { audioDir, downloader, transcriber, log: silentLogger() })
    ).rejects.toThrow(DownloadFailedError);
    expect(transcriber.transcribe).not.toHaveBeenCalled();
    expect(downloader.written).toHaveLength(1);
    expect(await listDir(audioDir)).toEqual([]);
  });

  it("removes the downloaded audio when transcription fails", async () => {
    const downloader = fakeDownloader();

    await expect(
      handleTranscribeRequest(
        { url: URL },
        { audioDir, downloader, transcriber: failingTranscriber(), log: silentLogger() }
      )
    ).rejects.toThrow(TranscriptionFailedError);
    expect(await listDir(audioDir)).toEqual([]);
  });

  it("removes the temp directory when a step throws unexpectedly", async () => {
    const downloader = fakeDownloader();
    const transcriber = {
      transcribe: vi.fn(async () => {
        throw new TypeError("unexpected");
      }),
    };

    await expect(
      handleTranscribeRequest({ url: URL }, { audioDir, downloader, transcriber, log: silentLogger() })
    ).rejects.toThrow(TypeError);
    expect(await listDir(audioDir)).toEqual([]);
  });

  it("gives concurrent requests their own temp files", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const seen: string[] = [];
    const downloader = fakeDownloader();
    const transcriber = {
      transcribe: vi.fn(async (audioPath: string) => {
        seen.push(audioPath);
        if (seen.length === 2) release();
        // Both files exist at once while both requests are in flight
        await gate;
        await fs.access(audioPath);
        return `text for ${audioPath}`;
      }),
    };
    const deps = { audioDir, downloader, transcriber, log: silentLogger() };

    const [a, b] = await Promise.all([
      handleTranscribeRequest({ url: "https://youtu.be/first1" }, deps),
      handleTranscribeRequest({ url: "https://youtu.be/second2" }, deps),
    ]);

    expect(seen).toHaveLength(2);
    expect(seen[0]).not.toBe(seen[1]);
    expect(a.transcript).not.toBe(b.transcript);
    expect(await listDir(audioDir)).toEqual([]);
  });

  it("keeps the request outcome when cleanup cannot run", async () => {
    const log = silentLogger();
    const downloader: AudioDownloader = {
      download: vi.fn(async (_url: string, outDir: string) => {
        const audioPath = `${outDir}/audio.mp3`;
        await fs.writeFile(audioPath, "audio-bytes");
        return { audioPath, title: "Test Video", videoId: "abc123" };
      }),
    };
    const rm = vi.spyOn(fs, "rm").mockRejectedValueOnce(new Error("EBUSY"));

    const result = await handleTranscribeRequest(
      { url: URL },
      { audioDir, downloader, transcriber: fakeTranscriber(), log }
    );

    expect(result.success).toBe(true);
    expect(log.error).toHaveBeenCalledTimes(1);
    rm.mockRestore();
  });
});
