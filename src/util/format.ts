import type { ParticipantEvent } from "../participant/events.js";
import type { MediaState } from "../participant/types.js";

/** One-line description of a participant event, without the participant's name. */
export function formatEvent(event: ParticipantEvent): string {
  switch (event.type) {
    case "state-changed": {
      const base = `${event.from} -> ${event.to}`;
      if (event.failure) return `${base} (${event.failure.kind}: ${event.failure.reason})`;
      return event.reason ? `${base} (${event.reason})` : base;
    }
    case "media-changed":
      return `media ${formatMedia(event.media)}`;
    case "log-line":
      return event.message;
    case "error":
      return `ERROR ${event.kind}: ${event.message}`;
  }
}

export function formatMedia(media: MediaState): string {
  const flag = (name: string, on: boolean): string => `${name}:${on ? "on" : "off"}`;
  return [
    flag("audio", media.audio),
    flag("video", media.video),
    flag("share", media.screenshare),
    flag("blur", media.blur),
    `ns:${media.noiseSuppression}`,
  ].join(" ");
}

export function pad(s: string, n: number): string {
  return s.length >= n ? s.slice(0, n) : s + " ".repeat(n - s.length);
}

export function clockTime(timestamp: number): string {
  return new Date(timestamp).toLocaleTimeString("en-US", { hour12: false });
}
