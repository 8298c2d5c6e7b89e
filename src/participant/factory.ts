import { UnsupportedError } from "../errors.js";
import { ProtocolStrategy } from "./protocol/protocol-strategy.js";
import type { StrategyFactory } from "./strategy.js";
import type { SurfaceLauncher } from "./surface/driver.js";
import { SurfaceStrategy } from "./surface/surface-strategy.js";

export interface StrategyFactoryOptions {
  /** Absent when no surface can be launched on this worker. */
  launchSurface?: SurfaceLauncher;
  cookieName: string;
  signalingPath?: string;
}

export function createStrategyFactory(options: StrategyFactoryOptions): StrategyFactory {
  return (kind, context) => {
    switch (kind) {
      case "protocol":
        return new ProtocolStrategy(context, { signalingPath: options.signalingPath });
      case "surface":
        if (!options.launchSurface) {
          throw new UnsupportedError("surface participants need a browser; set CHROME_PATH");
        }
        return new SurfaceStrategy(context, { launch: options.launchSurface, cookieName: options.cookieName });
    }
  };
}
