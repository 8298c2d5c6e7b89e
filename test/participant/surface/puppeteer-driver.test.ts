import { describe, expect, it } from "vitest";
import { fakeMediaArgs } from "../../../src/participant/surface/puppeteer-driver.js";

describe("fakeMediaArgs", () => {
  it("adds no capture flags without fake media", () => {
    expect(fakeMediaArgs("none")).toEqual([]);
  });

  it("uses the built-in test pattern", () => {
    expect(fakeMediaArgs("builtin")).toEqual(["--use-fake-device-for-media-stream"]);
  });

  it("feeds video and audio files to the matching capture device", () => {
    expect(fakeMediaArgs("/media/talk.y4m")).toEqual([
      "--use-fake-device-for-media-stream",
      "--use-file-for-fake-video-capture=/media/talk.y4m",
    ]);
    expect(fakeMediaArgs("/media/talk.wav")).toEqual([
      "--use-fake-device-for-media-stream",
      "--use-file-for-fake-audio-capture=/media/talk.wav",
    ]);
  });

  it("falls back to the test pattern for remote or unknown media", () => {
    expect(fakeMediaArgs("https://media.example.test/clip.y4m")).toEqual(["--use-fake-device-for-media-stream"]);
    expect(fakeMediaArgs("/media/clip.mp4")).toEqual(["--use-fake-device-for-media-stream"]);
  });
});
