/**
 * Default values and normalization for ndk-graph options.
 */

import { nullLogger, sourcePath, type Logger, type SourcePath } from "@ndk-graph/shared";
import { DEFAULT_NDK_ROOT } from "./prebuilt/ndk-prebuilt.js";

export const NDK_ROOT_ENV_VAR = "NDK_GRAPH_NDK_ROOT";

/** Platform version used for prebuilts whose module sets no `sdkVersion`. */
export const DEFAULT_SDK_VERSION = "9";

export interface NdkGraphOptions {
  /** Root of the NDK prebuilts, relative to the source tree. */
  ndkRoot?: string;
  defaultSdkVersion?: string;
  logger?: Logger;
}

export interface ResolvedNdkGraphOptions {
  ndkRoot: SourcePath;
  defaultSdkVersion: string;
  logger: Logger;
}

export const DEFAULT_OPTIONS: ResolvedNdkGraphOptions = {
  ndkRoot: sourcePath(DEFAULT_NDK_ROOT),
  defaultSdkVersion: DEFAULT_SDK_VERSION,
  logger: nullLogger,
};

/**
 * Fill in defaults. An explicit `ndkRoot` wins over NDK_GRAPH_NDK_ROOT,
 * which wins over the built-in root.
 */
export function normalizeOptions(
  options: NdkGraphOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): ResolvedNdkGraphOptions {
  const envRoot = env[NDK_ROOT_ENV_VAR]?.trim();
  const ndkRoot = options.ndkRoot ?? (envRoot ? envRoot : DEFAULT_OPTIONS.ndkRoot);
  return {
    ndkRoot: sourcePath(ndkRoot),
    defaultSdkVersion: options.defaultSdkVersion ?? DEFAULT_OPTIONS.defaultSdkVersion,
    logger: options.logger ?? DEFAULT_OPTIONS.logger,
  };
}
