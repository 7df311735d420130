import { ServiceUnavailableError } from "../errors.js";
import { createRequestDir, newRequestId, removeRequestDir } from "../utils/tempFiles.js";
import type {
  AudioDownloader,
  Logger,
  RequestStage,
  TranscribeSuccess,
  Transcriber,
} from "../types.js";
import { parseTranscribeRequest } from "./validate.js";

export interface TranscribeDeps {
  audioDir: string;
  downloader: AudioDownloader;
  // Undefined when no speech-to-text credential is configured
  transcriber?: Transcriber;
  log: Logger;
}

/**
 * Validate -> download -> transcribe, strictly in order.
 * The request's temp directory is removed on every exit path before this resolves or rejects.
 */
export async function handleTranscribeRequest(
  body: unknown,
  deps: TranscribeDeps
): Promise<TranscribeSuccess> {
  const { url, videoId: urlVideoId } = parseTranscribeRequest(body);

  const { transcriber } = deps;
  if (!transcriber) {
    throw new ServiceUnavailableError("Transcription service is not configured (ASSEMBLYAI_API_KEY missing)");
  }

  const requestId = newRequestId();
  const log = deps.log;
  let stage: RequestStage = "pending";
  const workDir = await createRequestDir(deps.audioDir, requestId);

  try {
    stage = "downloading";
    log.info({ requestId, stage, videoId: urlVideoId }, "Downloading audio");
    const audio = await deps.downloader.download(url, workDir);
    log.info({ requestId, audioPath: audio.audioPath }, "Downloaded audio");

    stage = "transcribing";
    log.info({ requestId, stage }, "Transcribing audio");
    const transcript = await transcriber.transcribe(audio.audioPath, log);

    stage = "succeeded";
    log.info({ requestId, stage, chars: transcript.length }, "Transcription request complete");
    return {
      success: true,
      transcript,
      title: audio.title,
      videoId: audio.videoId || urlVideoId,
    };
  } catch (err) {
    const failed: RequestStage = "failed";
    log.warn({ requestId, stage: failed, failedAt: stage }, "Transcription request failed");
    throw err;
  } finally {
    await removeRequestDir(workDir, log);
  }
}
