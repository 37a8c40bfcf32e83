// Unit tests for chat command parsing

import { describe, it, expect } from "vitest";
import { parseIntent } from "./command-parser.js";

describe("parseIntent", () => {
  it.each([
    ["/start", { type: "start" }],
    ["/video", { type: "select_video" }],
    ["/audio", { type: "select_audio" }],
    ["/cancel", { type: "cancel" }],
    ["/CANCEL", { type: "cancel" }],
  ] as const)("parses %s", (text, intent) => {
    expect(parseIntent(text)).toEqual(intent);
  });

  it("strips a @botname suffix", () => {
    expect(parseIntent("/video@courier_bot")).toEqual({ type: "select_video" });
    expect(parseIntent("/res_720p@courier_bot")).toEqual({ type: "select_resolution", tag: "720p" });
  });

  it("extracts the resolution tag verbatim", () => {
    expect(parseIntent("/res_1080p")).toEqual({ type: "select_resolution", tag: "1080p" });
    expect(parseIntent("/res_720p60")).toEqual({ type: "select_resolution", tag: "720p60" });
  });

  it("ignores arguments after the command", () => {
    expect(parseIntent("/start now please")).toEqual({ type: "start" });
  });

  it("treats an empty resolution command as unknown", () => {
    expect(parseIntent("/res_")).toEqual({ type: "unknown_command", command: "/res_" });
  });

  it("reports other commands as unknown", () => {
    expect(parseIntent("/help")).toEqual({ type: "unknown_command", command: "/help" });
  });

  it("returns trimmed plain text as a reference", () => {
    expect(parseIntent("  https://videos.example/watch?v=abc  ")).toEqual({
      type: "text",
      reference: "https://videos.example/watch?v=abc",
    });
  });
});
