import "dotenv/config";
import { buildApp } from "./app.js";
import { loadConfig } from "./config.js";
import { createYtDlpDownloader } from "./pipeline/download.js";
import { createAssemblyAiTranscriber } from "./pipeline/transcribe_assemblyai.js";
import { sweepStaleRequestDirs } from "./utils/tempFiles.js";

const cfg = loadConfig();

const downloader = createYtDlpDownloader({
  ytdlpCmd: cfg.ytdlpCmd,
  ffmpegCmd: cfg.ffmpegCmd,
  audioFormat: cfg.audioFormat,
  timeoutMs: cfg.downloadTimeoutMs,
});

const transcriber = cfg.assemblyAiApiKey
  ? createAssemblyAiTranscriber({
      apiKey: cfg.assemblyAiApiKey,
      baseUrl: cfg.assemblyAiBaseUrl,
      pollIntervalMs: cfg.pollIntervalMs,
      timeoutMs: cfg.transcriptionTimeoutMs,
    })
  : undefined;

const app = await buildApp({
  config: cfg,
  downloader,
  transcriber,
  logger: { level: cfg.logLevel },
});

const start = async () => {
  try {
    if (!transcriber) {
      app.log.warn("ASSEMBLYAI_API_KEY is not set; transcription requests will be refused");
    }
    await sweepStaleRequestDirs(cfg.audioDir, cfg.staleTempMaxAgeMs, app.log);
    await app.listen({ port: cfg.port, host: cfg.host });
    app.log.info(`YouTube transcription endpoint: POST /api/transcribe-youtube`);
  } catch (err) {
    app.log.error({ err }, "Failed to start server");
    process.exit(1);
  }
};

const shutdown = (signal: NodeJS.Signals) => {
  app.log.info({ signal }, "Shutting down");
  app.close().then(
    () => process.exit(0),
    (err: unknown) => {
      app.log.error({ err }, "Error during shutdown");
      process.exit(1);
    }
  );
};

process.on("SIGINT", shutdown);
process.on("SIGTERM", shutdown);

await start();
