import { z } from "zod";
import { InvalidRequestError } from "../errors.js";
import type { ValidatedRequest } from "../types.js";

const YOUTUBE_HOSTS = new Set(["youtube.com", "www.youtube.com", "m.youtube.com", "music.youtube.com"]);
const SHORT_HOST = "youtu.be";
// Path prefixes whose next segment is the video id
const ID_PATH_PREFIXES = new Set(["embed", "shorts", "live", "v"]);
const VIDEO_ID = /^[\w-]+$/;

const TranscribeSchema = z.object(
  {
    url: z
      .string({
        required_error: "Missing 'url' in request body",
        invalid_type_error: "'url' must be a string",
      })
      .trim()
      .min(1, "'url' must not be empty"),
  },
  {
    required_error: "Missing 'url' in request body",
    invalid_type_error: "Request body must be a JSON object",
  }
);

/** Returns the video id for a link on a known YouTube host, or null. */
export function extractVideoId(url: string): string | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") return null;

  const host = parsed.hostname.toLowerCase();
  const segments = parsed.pathname.split("/").filter(Boolean);
  let id: string | null | undefined;

  if (host === SHORT_HOST) {
    id = segments[0];
  } else if (YOUTUBE_HOSTS.has(host)) {
    if (segments[0] === "watch") {
      id = parsed.searchParams.get("v");
    } else if (segments[0] && ID_PATH_PREFIXES.has(segments[0])) {
      id = segments[1];
    }
  }

  return id && VIDEO_ID.test(id) ? id : null;
}

export function parseTranscribeRequest(body: unknown): ValidatedRequest {
  const parsed = TranscribeSchema.safeParse(body ?? undefined);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues[0]?.message ?? "Invalid request body");
  }

  const { url } = parsed.data;
  const videoId = extractVideoId(url);
  if (!videoId) {
    throw new InvalidRequestError("Invalid YouTube URL");
  }

  return { url, videoId };
}
