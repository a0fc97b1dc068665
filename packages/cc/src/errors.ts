/* =============================================================================
 * MODULE ERRORS
 * ============================================================================= */

/** Error codes */
export const NdkGraphErrorCode = {
  NOT_STATIC_OR_SHARED: "NDK_GRAPH_NOT_STATIC_OR_SHARED",
  BAD_PREFIX: "NDK_GRAPH_BAD_PREFIX",
  UNKNOWN_STL: "NDK_GRAPH_UNKNOWN_STL",
  PASS_ALREADY_RUN: "NDK_GRAPH_PASS_ALREADY_RUN",
  UNKNOWN_MODULE_TYPE: "NDK_GRAPH_UNKNOWN_MODULE_TYPE",
  DUPLICATE_MODULE: "NDK_GRAPH_DUPLICATE_MODULE",
} as const;

export type NdkGraphErrorCodeType = (typeof NdkGraphErrorCode)[keyof typeof NdkGraphErrorCode];

/**
 * Base class for every failure raised while splitting or linking a module.
 * `value` is the offending input (a prefix, an STL flavor, a type name).
 */
export class NdkGraphError extends Error {
  constructor(
    message: string,
    public readonly code: NdkGraphErrorCodeType,
    public readonly moduleName: string,
    public readonly value?: string,
  ) {
    super(message);
    this.name = "NdkGraphError";
  }
}

/** A library module that builds neither a static nor a shared variant. */
export class ConfigurationError extends NdkGraphError {
  constructor(moduleName: string) {
    super(
      `library "${moduleName}" not static or shared`,
      NdkGraphErrorCode.NOT_STATIC_OR_SHARED,
      moduleName,
    );
    this.name = "ConfigurationError";
  }
}

/** A prebuilt module whose name lacks the prefix its category requires. */
export class NamingError extends NdkGraphError {
  constructor(moduleName: string, requiredPrefix: string) {
    super(
      `NDK prebuilts must have an ${requiredPrefix} prefixed name, got "${moduleName}"`,
      NdkGraphErrorCode.BAD_PREFIX,
      moduleName,
      requiredPrefix,
    );
    this.name = "NamingError";
  }
}

export class UnknownStlError extends NdkGraphError {
  constructor(moduleName: string, stl: string) {
    super(`Unknown NDK STL: ${stl}`, NdkGraphErrorCode.UNKNOWN_STL, moduleName, stl);
    this.name = "UnknownStlError";
  }
}

/** Misuse of the host graph: re-running a pass, unknown module types, duplicates. */
export class GraphStateError extends NdkGraphError {
  constructor(
    message: string,
    code: NdkGraphErrorCodeType,
    moduleName: string,
    value?: string,
  ) {
    super(message, code, moduleName, value);
    this.name = "GraphStateError";
  }
}

export function isNdkGraphError(error: unknown): error is NdkGraphError {
  return error instanceof NdkGraphError;
}
