import { describe, expect, it } from "vitest";
import { InvalidRequestError } from "../../../src/errors.js";
import { extractVideoId, parseTranscribeRequest } from "../../../src/pipeline/validate.js";

describe("extractVideoId", () => {
  it.each([
    ["https://www.youtube.com/watch?v=abc123", "abc123"],
    ["https://www.youtube.com/watch?v=abc123&t=42s", "abc123"],
    ["https://youtube.com/watch?feature=share&v=def456", "def456"],
    ["https://youtu.be/xyz789?si=tracking", "xyz789"],
    ["https://www.youtube.com/embed/emb001", "emb001"],
    ["https://www.youtube.com/shorts/short01", "short01"],
    ["https://m.youtube.com/watch?v=mobile1", "mobile1"],
    ["https://music.youtube.com/watch?v=music01&list=RD", "music01"],
  ])("extracts the id from %s", (url, expected) => {
    expect(extractVideoId(url)).toBe(expected);
  });

  it.each([
    "http://169.254.169.254/latest?x=youtube.com/watch?v=abc",
    "https://evil.example/youtube.com/watch?v=abc",
    "https://notyoutube.com/watch?v=abc",
    "https://youtube.com.evil.example/watch?v=abc",
    "ftp://www.youtube.com/watch?v=abc",
    "not a url",
  ])("ignores a video id outside a YouTube host in %s", (url) => {
    expect(extractVideoId(url)).toBeNull();
  });

  it("returns null for links outside known hosts", () => {
    expect(extractVideoId("https://vimeo.com/123456")).toBeNull();
    expect(extractVideoId("https://www.youtube.com/watch?lv=nope")).toBeNull();
  });
});

describe("parseTranscribeRequest", () => {
  it("returns the trimmed url and its video id", () => {
    expect(parseTranscribeRequest({ url: "  https://youtu.be/abc123  " })).toEqual({
      url: "https://youtu.be/abc123",
      videoId: "abc123",
    });
  });

  it.each([
    [undefined, "Missing 'url' in request body"],
    [null, "Missing 'url' in request body"],
    [{}, "Missing 'url' in request body"],
    [{ url: "" }, "'url' must not be empty"],
    [{ url: "   " }, "'url' must not be empty"],
    [{ url: 42 }, "'url' must be a string"],
    ["https://youtu.be/abc123", "Request body must be a JSON object"],
    [{ url: "https://example.com/video" }, "Invalid YouTube URL"],
    [{ url: "http://169.254.169.254/latest?x=youtube.com/watch?v=abc" }, "Invalid YouTube URL"],
  ])("rejects %j", (body, message) => {
    expect(() => parseTranscribeRequest(body)).toThrow(InvalidRequestError);
    expect(() => parseTranscribeRequest(body)).toThrow(message);
  });
});
