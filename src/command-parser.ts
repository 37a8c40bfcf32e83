// Stream Courier - Command parsing
// Raw chat lines → intents. Slash commands may carry a "@botname" suffix.

import type { Intent } from "./types.js";

const RESOLUTION_COMMAND = /^res_(.+)$/i;

export function parseIntent(text: string): Intent {
  const trimmed = text.trim();
  if (!trimmed.startsWith("/")) {
    return { type: "text", reference: trimmed };
  }

  const [head] = trimmed.split(/\s+/);
  const command = head.slice(1).replace(/@.*$/, "");

  switch (command.toLowerCase()) {
    case "start":
      return { type: "start" };
    case "video":
      return { type: "select_video" };
    case "audio":
      return { type: "select_audio" };
    case "cancel":
      return { type: "cancel" };
  }

  const resolution = RESOLUTION_COMMAND.exec(command);
  if (resolution) {
    return { type: "select_resolution", tag: resolution[1] };
  }
  return { type: "unknown_command", command: head };
}
