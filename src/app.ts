import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import cors from "@fastify/cors";
import type { ServiceConfig } from "./config.js";
import { toAppError } from "./errors.js";
import { handleTranscribeRequest } from "./pipeline/handler.js";
import type { AudioDownloader, TranscribeFailure, Transcriber } from "./types.js";

export interface AppOptions {
  config: Pick<ServiceConfig, "audioDir" | "corsOrigin">;
  downloader: AudioDownloader;
  transcriber?: Transcriber;
  logger?: FastifyServerOptions["logger"];
}

export async function buildApp(opts: AppOptions): Promise<FastifyInstance> {
  const { config, downloader, transcriber } = opts;

  const app = Fastify({
    logger: opts.logger ?? true,
    connectionTimeout: 0, // Disable connection timeout
    keepAliveTimeout: 0, // Disable keep-alive timeout
    requestTimeout: 0, // Transcription waits can run for minutes
  });

  await app.register(cors, { origin: config.corsOrigin });

  app.setErrorHandler((error, request, reply) => {
    const appError = toAppError(error);
    if (appError.statusCode >= 500) {
      request.log.error({ err: error }, "Request failed");
    } else {
      request.log.warn({ reason: appError.message }, "Request rejected");
    }
    const body: TranscribeFailure = { success: false, error: appError.message };
    return reply.code(appError.statusCode).send(body);
  });

  app.setNotFoundHandler((request, reply) => {
    const body: TranscribeFailure = {
      success: false,
      error: `Route ${request.method} ${request.url} not found`,
    };
    return reply.code(404).send(body);
  });

  app.get("/", async () => "Transcription backend is running");

  app.get("/api/health", async () => ({ status: "ok" }));

  app.post("/api/transcribe-youtube", async (request) => {
    return handleTranscribeRequest(request.body, {
      audioDir: config.audioDir,
      downloader,
      transcriber,
      log: request.log,
    });
  });

  return app;
}
