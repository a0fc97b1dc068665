import type { SourcePath } from "@ndk-graph/shared";
import type { BuildKind, Linker } from "./linker.js";

/** Flags added to one build kind only, on top of the common set. */
export interface KindFlags {
  cflags: string[];
}

export interface LibraryCompilerProperties {
  srcs: string[];
  generatedSources: string[];
  cflags: string[];
  static: KindFlags;
  shared: KindFlags;
}

/**
 * Compiler half of a compiled library. Prebuilt modules have none.
 */
export class LibraryCompiler {
  readonly properties: LibraryCompilerProperties;

  constructor(properties: LibraryCompilerProperties) {
    this.properties = {
      srcs: [...properties.srcs],
      generatedSources: [...properties.generatedSources],
      cflags: [...properties.cflags],
      static: { cflags: [...properties.static.cflags] },
      shared: { cflags: [...properties.shared.cflags] },
    };
  }

  /** Flags that apply only to the given kind. */
  additionalFlags(kind: BuildKind): readonly string[] {
    return this.properties[kind].cflags;
  }

  compilesSources(): boolean {
    return this.properties.srcs.length > 0 || this.properties.generatedSources.length > 0;
  }

  clone(): LibraryCompiler {
    return new LibraryCompiler(this.properties);
  }
}

export interface ModuleProperties {
  /** Excluded from the legacy make export. */
  hideFromMake: boolean;
  sdkVersion?: string;
}

/** Resolved location of a prebuilt artifact; computed once per variant. */
export interface PrebuiltArtifactRef {
  readonly dir: SourcePath;
  readonly fileName: string;
  readonly path: SourcePath;
}

/**
 * A node of the build graph. Before the variant mutator runs a module is
 * logical (`buildKind` is null); afterwards each node is one variant.
 */
export class Module {
  readonly name: string;
  readonly typeName: string;
  readonly dir: SourcePath;
  readonly linker: Linker;
  readonly compiler: LibraryCompiler | null;
  readonly properties: ModuleProperties;
  #buildKind: BuildKind | null = null;
  #artifact: PrebuiltArtifactRef | undefined;
  #exportedFlags: readonly string[] = [];

  constructor(init: {
    name: string;
    typeName: string;
    dir: SourcePath;
    linker: Linker;
    compiler?: LibraryCompiler | null;
    properties?: Partial<ModuleProperties>;
  }) {
    this.name = init.name;
    this.typeName = init.typeName;
    this.dir = init.dir;
    this.linker = init.linker;
    this.compiler = init.compiler ?? null;
    this.properties = {
      hideFromMake: init.properties?.hideFromMake ?? false,
      sdkVersion: init.properties?.sdkVersion,
    };
  }

  get buildKind(): BuildKind | null {
    return this.#buildKind;
  }

  /** Graph identity: the logical name plus the variant tag, if split. */
  get id(): string {
    return this.#buildKind ? `${this.name}#${this.#buildKind}` : this.name;
  }

  get exportedFlags(): readonly string[] {
    return this.#exportedFlags;
  }

  setExportedFlags(flags: readonly string[]): void {
    this.#exportedFlags = [...flags];
  }

  /** Tags this node as one variant and points its linker at that kind. */
  assignBuildKind(kind: BuildKind): void {
    this.#buildKind = kind;
    this.linker.linkage()?.setStatic(kind === "static");
  }

  /**
   * Returns the cached artifact, computing it on first request.
   */
  prebuiltArtifact(compute: () => PrebuiltArtifactRef): PrebuiltArtifactRef {
    if (!this.#artifact) {
      this.#artifact = Object.freeze(compute());
    }
    return this.#artifact;
  }

  /** Copy used for a new variant: own linker, own compiler, own source lists. */
  clone(): Module {
    const copy = new Module({
      name: this.name,
      typeName: this.typeName,
      dir: this.dir,
      linker: this.linker.clone(),
      compiler: this.compiler?.clone() ?? null,
      properties: { ...this.properties },
    });
    if (this.#buildKind) copy.assignBuildKind(this.#buildKind);
    return copy;
  }
}
