/**
 * Linkers decide what a module's link step produces. Compiled modules link
 * their own (or a sibling's) objects; prebuilt modules compile nothing and
 * only compute the path of an artifact shipped with the NDK.
 */

export type BuildKind = "static" | "shared";

export type PrebuiltArtifactKind = "object" | "library" | "stl";

export type LinkStrategy =
  | { readonly kind: "compiled" }
  | { readonly kind: "prebuilt"; readonly artifact: PrebuiltArtifactKind };

export const COMPILED: LinkStrategy = { kind: "compiled" };

export function prebuilt(artifact: PrebuiltArtifactKind): LinkStrategy {
  return { kind: "prebuilt", artifact };
}

/**
 * Static/shared capability of a library linker. The variant mutator only
 * touches modules whose linker exposes one.
 */
export interface LinkageCapability {
  buildStatic(): boolean;
  buildShared(): boolean;
  isStatic(): boolean;
  setStatic(isStatic: boolean): void;
}

export interface Linker {
  readonly strategy: LinkStrategy;
  /** Include directories handed to dependents, relative to the module directory. */
  readonly exportIncludeDirs: readonly string[];
  linkage(): LinkageCapability | null;
  clone(): Linker;
}

export interface LibraryLinkerProperties {
  buildStatic: boolean;
  buildShared: boolean;
}

export class LibraryLinker implements Linker, LinkageCapability {
  readonly strategy: LinkStrategy;
  readonly exportIncludeDirs: readonly string[];
  readonly dynamicProperties: LibraryLinkerProperties;
  #static = false;

  constructor(
    strategy: LinkStrategy,
    dynamicProperties: LibraryLinkerProperties,
    exportIncludeDirs: readonly string[] = [],
  ) {
    this.strategy = strategy;
    this.dynamicProperties = { ...dynamicProperties };
    this.exportIncludeDirs = [...exportIncludeDirs];
  }

  linkage(): LinkageCapability {
    return this;
  }

  buildStatic(): boolean {
    return this.dynamicProperties.buildStatic;
  }

  buildShared(): boolean {
    return this.dynamicProperties.buildShared;
  }

  isStatic(): boolean {
    return this.#static;
  }

  setStatic(isStatic: boolean): void {
    this.#static = isStatic;
  }

  clone(): LibraryLinker {
    const copy = new LibraryLinker(this.strategy, this.dynamicProperties, this.exportIncludeDirs);
    copy.setStatic(this.#static);
    return copy;
  }
}

/** Linker for single object files (crt objects); never split into variants. */
export class ObjectLinker implements Linker {
  readonly strategy: LinkStrategy;
  readonly exportIncludeDirs: readonly string[] = [];

  constructor(strategy: LinkStrategy) {
    this.strategy = strategy;
  }

  linkage(): null {
    return null;
  }

  clone(): ObjectLinker {
    return new ObjectLinker(this.strategy);
  }
}
