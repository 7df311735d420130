import fs from "node:fs/promises";
import { fetch, type Dispatcher } from "undici";
import { z } from "zod";
import { TranscriptionFailedError } from "../errors.js";
import type { Logger, Transcriber } from "../types.js";

export interface AssemblyAiOptions {
  apiKey: string;
  baseUrl: string;
  pollIntervalMs: number;
  timeoutMs: number;
  // Tests route requests through undici's MockAgent
  dispatcher?: Dispatcher;
}

const UploadResponse = z.object({ upload_url: z.string().min(1) });

const TranscriptResponse = z.object({
  id: z.string().min(1),
  status: z.enum(["queued", "processing", "completed", "error"]),
  text: z.string().nullish(),
  error: z.string().nullish(),
});

export type TranscriptStatus = z.infer<typeof TranscriptResponse>["status"];
type Transcript = z.infer<typeof TranscriptResponse>;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// Shared by every call of one transcribe(): a single deadline covers upload, submit and polling
interface CallContext {
  deadline: number;
  log: Logger;
  transcriptId?: string;
}

export function createAssemblyAiTranscriber(opts: AssemblyAiOptions): Transcriber {
  const { apiKey, baseUrl } = opts;

  function timedOut(ctx: CallContext): TranscriptionFailedError {
    ctx.log.warn({ transcriptId: ctx.transcriptId }, "Transcription wait exceeded timeout");
    const job = ctx.transcriptId ? ` (transcript ${ctx.transcriptId})` : "";
    return new TranscriptionFailedError(
      `Transcription timed out after ${Math.round(opts.timeoutMs / 1000)}s${job}`
    );
  }

  async function callApi<T>(
    step: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ctx: CallContext,
    init: { method: "GET" | "POST"; body?: Buffer | string; contentType?: string }
  ): Promise<T> {
    const remainingMs = ctx.deadline - Date.now();
    if (remainingMs <= 0) throw timedOut(ctx);

    const headers: Record<string, string> = { authorization: apiKey };
    if (init.contentType) headers["content-type"] = init.contentType;
    const signal = AbortSignal.timeout(remainingMs);

    let payload: unknown;
    try {
      const res = await fetch(`${baseUrl}${path}`, {
        method: init.method,
        headers,
        body: init.body,
        signal,
        dispatcher: opts.dispatcher,
      });
      if (!res.ok) {
        const text = await res.text();
        throw new TranscriptionFailedError(`Failed to ${step}: ${res.status} ${text}`.trim());
      }
      payload = await res.json();
    } catch (err) {
      if (signal.aborted) throw timedOut(ctx);
      if (err instanceof TranscriptionFailedError) throw err;
      if (err instanceof SyntaxError) {
        throw new TranscriptionFailedError(`Failed to ${step}: unexpected response from transcription service`);
      }
      const reason = err instanceof Error ? err.message : String(err);
      throw new TranscriptionFailedError(`Failed to ${step}: ${reason}`);
    }

    const parsed = schema.safeParse(payload);
    if (!parsed.success) {
      throw new TranscriptionFailedError(`Failed to ${step}: unexpected response from transcription service`);
    }
    return parsed.data;
  }

  async function uploadAudio(audioPath: string, ctx: CallContext): Promise<string> {
    let body: Buffer;
    try {
      body = await fs.readFile(audioPath);
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new TranscriptionFailedError(`Failed to upload audio: ${reason}`);
    }
    const { upload_url } = await callApi("upload audio", "/v2/upload", UploadResponse, ctx, {
      method: "POST",
      body,
      contentType: "application/octet-stream",
    });
    return upload_url;
  }

  async function submitTranscript(audioUrl: string, ctx: CallContext): Promise<Transcript> {
    return callApi("submit transcription", "/v2/transcript", TranscriptResponse, ctx, {
      method: "POST",
      body: JSON.stringify({ audio_url: audioUrl }),
      contentType: "application/json",
    });
  }

  async function waitForTranscript(ctx: CallContext & { transcriptId: string }): Promise<string> {
    const id = ctx.transcriptId;

    while (true) {
      const transcript = await callApi("poll transcription", `/v2/transcript/${id}`, TranscriptResponse, ctx, {
        method: "GET",
      });

      if (transcript.status === "completed") {
        return transcript.text ?? "";
      }
      if (transcript.status === "error") {
        throw new TranscriptionFailedError(`Transcription failed: ${transcript.error || "Unknown error"}`);
      }

      if (Date.now() + opts.pollIntervalMs > ctx.deadline) {
        throw timedOut(ctx);
      }
      await sleep(opts.pollIntervalMs);
    }
  }

  return {
    async transcribe(audioPath: string, log: Logger): Promise<string> {
      const ctx: CallContext = { deadline: Date.now() + opts.timeoutMs, log };

      log.info("Uploading audio to AssemblyAI");
      const uploadUrl = await uploadAudio(audioPath, ctx);

      const job = await submitTranscript(uploadUrl, ctx);
      log.info({ transcriptId: job.id }, "Transcription submitted");

      const text = await waitForTranscript({ ...ctx, transcriptId: job.id });
      log.info({ transcriptId: job.id, chars: text.length }, "Transcription complete");
      return text;
    },
  };
}
