import { z } from "zod";
import { NoiseSuppressionSchema, ResolutionSchema } from "../types.js";

/*
 * Page-side functions. The frontend keeps its call settings in localStorage
 * and reads them when the call starts, so pre-join changes take effect on join.
 */

export const STORAGE_KEYS = {
  noiseSuppression: "settings.noiseSuppression",
  blur: "settings.backgroundBlur",
  resolution: "settings.outgoingCameraResolution",
  forceStream: "settings.forceStreamTransport",
};

/** Which screen is showing: "lobby", "login" or "pending". */
export const PROBE_SCREEN = `(lobby, login) => {
  if (document.querySelector(lobby)) return "lobby";
  if (document.querySelector(login)) return "login";
  return "pending";
}`;

/** Write one setting; args: key, JSON value. */
export const WRITE_SETTING = `(key, value) => {
  window.localStorage.setItem(key, JSON.stringify(value));
  window.dispatchEvent(new StorageEvent("storage", { key }));
  return true;
}`;

/** Read every setting back; args: the key map. */
export const READ_SETTINGS = `(keys) => {
  const out = {};
  for (const [name, key] of Object.entries(keys)) {
    const raw = window.localStorage.getItem(key);
    out[name] = raw === null ? null : JSON.parse(raw);
  }
  return out;
}`;

export const PageSettingsSchema = z.object({
  noiseSuppression: NoiseSuppressionSchema.nullable(),
  blur: z.boolean().nullable(),
  resolution: ResolutionSchema.nullable(),
  forceStream: z.boolean().nullable(),
});

export type PageSettings = z.infer<typeof PageSettingsSchema>;
export type SettingName = keyof typeof STORAGE_KEYS;
