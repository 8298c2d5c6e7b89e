/** Controls of the session frontend, addressed by their test ids. */
export const NAME_INPUT = '[data-testid="trigger-join-name"]';
export const JOIN_BUTTON = 'button[type="submit"]:not([disabled])';
export const LEAVE_BUTTON = '[data-testid="trigger-leave-call"]';
export const AUDIO_BUTTON = '[data-testid="toggle-audio"]';
export const VIDEO_BUTTON = '[data-testid="toggle-video"]';
export const SCREENSHARE_BUTTON = '[data-testid="toggle-screen-share"]';
/** Shown instead of the lobby when the session cookie is not accepted. */
export const LOGIN_FORM = '[data-testid="login-form"]';

/** Attribute the toggles carry: "true" when the medium is on. */
export const STATE_ATTRIBUTE = "data-test-state";

export const MEDIA_BUTTONS = {
  audio: AUDIO_BUTTON,
  video: VIDEO_BUTTON,
  screenshare: SCREENSHARE_BUTTON,
} as const;
