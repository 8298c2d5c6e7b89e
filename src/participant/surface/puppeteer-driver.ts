import puppeteer, { type Browser, type Page, type PuppeteerLaunchOptions } from "puppeteer-core";
import { InternalError, UnreachableError } from "../../errors.js";
import { getLogger } from "../../util/logger.js";
import type {
  JsonValue,
  SurfaceAction,
  SurfaceCookie,
  SurfaceDriver,
  SurfaceLauncher,
  SurfaceLaunchRequest,
} from "./driver.js";

const log = getLogger("surface");

const BASE_ARGS = [
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-dev-shm-usage",
  "--disable-gpu",
  "--autoplay-policy=no-user-gesture-required",
  "--use-fake-ui-for-media-stream",
];

const CLEAR_INPUT = `(selector) => {
  const el = document.querySelector(selector);
  if (el && "value" in el) el.value = "";
}`;

const READ_ATTRIBUTE = `(selector, name) => {
  const el = document.querySelector(selector);
  return el ? el.getAttribute(name) : null;
}`;

export interface PuppeteerLauncherOptions {
  /** Chromium binary; puppeteer-core never downloads one. */
  executablePath: string;
  headless?: boolean;
  navigationTimeoutMs?: number;
}

/** Chromium flags that feed the participant's fake media into the capture devices. */
export function fakeMediaArgs(fakeMedia: string): string[] {
  if (fakeMedia === "none") return [];
  const args = ["--use-fake-device-for-media-stream"];
  if (fakeMedia === "builtin") return args;
  if (/^https?:\/\//.test(fakeMedia)) {
    log.warn(`remote fake media ${fakeMedia} is not fetched; using the built-in test pattern`);
    return args;
  }
  if (fakeMedia.endsWith(".y4m") || fakeMedia.endsWith(".mjpeg")) {
    args.push(`--use-file-for-fake-video-capture=${fakeMedia}`);
  } else if (fakeMedia.endsWith(".wav")) {
    args.push(`--use-file-for-fake-audio-capture=${fakeMedia}`);
  } else {
    log.warn(`unrecognized fake media file ${fakeMedia}; using the built-in test pattern`);
  }
  return args;
}

export function createPuppeteerLauncher(options: PuppeteerLauncherOptions): SurfaceLauncher {
  return async (request: SurfaceLaunchRequest) => {
    const launchOptions: PuppeteerLaunchOptions = {
      executablePath: options.executablePath,
      headless: options.headless ?? true,
      handleSIGINT: false,
      handleSIGTERM: false,
      handleSIGHUP: false,
      args: [...BASE_ARGS, ...fakeMediaArgs(request.media.fakeMedia)],
    };
    let browser: Browser;
    try {
      browser = await puppeteer.launch(launchOptions);
    } catch (err) {
      throw new UnreachableError(`cannot launch surface for ${request.username}: ${String(err)}`, { cause: err });
    }
    try {
      const page = await browser.newPage();
      page.setDefaultNavigationTimeout(options.navigationTimeoutMs ?? 30_000);
      log.debug(`launched surface for ${request.username}`);
      return new PuppeteerDriver(browser, page);
    } catch (err) {
      browser.process()?.kill("SIGKILL");
      throw new UnreachableError(`cannot open a page for ${request.username}: ${String(err)}`, { cause: err });
    }
  };
}

export class PuppeteerDriver implements SurfaceDriver {
  private browser: Browser;
  private page: Page;
  private ended = false;

  constructor(browser: Browser, page: Page) {
    this.browser = browser;
    this.page = page;
  }

  async navigate(url: string): Promise<void> {
    const response = await this.page.goto(url, { waitUntil: "domcontentloaded" });
    if (response && !response.ok()) {
      throw new UnreachableError(`navigation to ${url} answered HTTP ${response.status()}`);
    }
  }

  async waitFor(selector: string, timeoutMs: number): Promise<void> {
    await this.page.waitForSelector(selector, { timeout: timeoutMs });
  }

  async invoke(selector: string, action: SurfaceAction): Promise<void> {
    if (action === "click") {
      await this.page.click(selector);
      return;
    }
    await this.evaluate(CLEAR_INPUT, selector);
    await this.page.type(selector, action.type);
  }

  async evaluate(script: string, ...args: JsonValue[]): Promise<unknown> {
    const call = `(${script})(${args.map((arg) => JSON.stringify(arg)).join(", ")})`;
    return this.page.evaluate(call);
  }

  async readAttribute(selector: string, name: string): Promise<string | null> {
    const value = await this.evaluate(READ_ATTRIBUTE, selector, name);
    if (value === null || value === undefined) return null;
    if (typeof value === "string") return value;
    throw new InternalError(`attribute ${name} of ${selector} read back as ${typeof value}`);
  }

  async setCookie(cookie: SurfaceCookie): Promise<void> {
    await this.page.setCookie({ name: cookie.name, value: cookie.value, url: cookie.url });
  }

  onDisconnected(listener: () => void): void {
    this.browser.process()?.once("exit", () => {
      if (!this.ended) listener();
    });
  }

  async close(): Promise<void> {
    this.ended = true;
    await this.page.close();
    await this.browser.close();
  }

  kill(): void {
    this.ended = true;
    const proc = this.browser.process();
    if (proc && proc.exitCode === null) proc.kill("SIGKILL");
  }
}
