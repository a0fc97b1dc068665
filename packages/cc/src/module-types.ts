import { sourcePath } from "@ndk-graph/shared";
import { GraphStateError, NdkGraphErrorCode } from "./errors.js";
import { COMPILED, LibraryLinker, ObjectLinker, prebuilt, type LibraryLinkerProperties } from "./model/linker.js";
import { LibraryCompiler, Module } from "./model/module.js";

/**
 * Declaration as parsed from a build file. Property parsing itself lives in
 * the host; factories only read what they need.
 */
export interface ModuleDeclaration {
  name: string;
  /** Directory of the declaring build file. */
  dir?: string;
  sdkVersion?: string;
  exportIncludeDirs?: readonly string[];
  srcs?: readonly string[];
  generatedSources?: readonly string[];
  cflags?: readonly string[];
  static?: { cflags?: readonly string[] };
  shared?: { cflags?: readonly string[] };
  /** `cc_library` only: opt out of a kind. */
  buildStatic?: boolean;
  buildShared?: boolean;
}

export type ModuleFactory = (declaration: ModuleDeclaration) => Module;

/* =============================================================================
 * NDK PREBUILTS
 *
 * Unlike regular prebuilts these are not stripped and are usually not
 * installed (the shared STLs go to the app's directory, not the system
 * image), so all of them are hidden from the make export.
 * ============================================================================= */

function prebuiltModule(
  typeName: string,
  declaration: ModuleDeclaration,
  linker: LibraryLinker | ObjectLinker,
): Module {
  return new Module({
    name: declaration.name,
    typeName,
    dir: sourcePath(declaration.dir ?? ""),
    linker,
    properties: { hideFromMake: true, sdkVersion: declaration.sdkVersion },
  });
}

export const ndkPrebuiltObjectFactory: ModuleFactory = (declaration) =>
  prebuiltModule("ndk_prebuilt_object", declaration, new ObjectLinker(prebuilt("object")));

export const ndkPrebuiltLibraryFactory: ModuleFactory = (declaration) =>
  prebuiltModule(
    "ndk_prebuilt_library",
    declaration,
    new LibraryLinker(prebuilt("library"), { buildStatic: false, buildShared: true }, declaration.exportIncludeDirs),
  );

export const ndkPrebuiltSharedStlFactory: ModuleFactory = (declaration) =>
  prebuiltModule(
    "ndk_prebuilt_shared_stl",
    declaration,
    new LibraryLinker(prebuilt("stl"), { buildStatic: false, buildShared: true }, declaration.exportIncludeDirs),
  );

export const ndkPrebuiltStaticStlFactory: ModuleFactory = (declaration) =>
  prebuiltModule(
    "ndk_prebuilt_static_stl",
    declaration,
    new LibraryLinker(prebuilt("stl"), { buildStatic: true, buildShared: false }, declaration.exportIncludeDirs),
  );

/* =============================================================================
 * COMPILED LIBRARIES
 * ============================================================================= */

function libraryModule(typeName: string, declaration: ModuleDeclaration, kinds: LibraryLinkerProperties): Module {
  return new Module({
    name: declaration.name,
    typeName,
    dir: sourcePath(declaration.dir ?? ""),
    linker: new LibraryLinker(COMPILED, kinds, declaration.exportIncludeDirs),
    compiler: new LibraryCompiler({
      srcs: [...(declaration.srcs ?? [])],
      generatedSources: [...(declaration.generatedSources ?? [])],
      cflags: [...(declaration.cflags ?? [])],
      static: { cflags: [...(declaration.static?.cflags ?? [])] },
      shared: { cflags: [...(declaration.shared?.cflags ?? [])] },
    }),
    properties: { sdkVersion: declaration.sdkVersion },
  });
}

export const libraryFactory: ModuleFactory = (declaration) =>
  libraryModule("cc_library", declaration, {
    buildStatic: declaration.buildStatic ?? true,
    buildShared: declaration.buildShared ?? true,
  });

export const libraryStaticFactory: ModuleFactory = (declaration) =>
  libraryModule("cc_library_static", declaration, { buildStatic: true, buildShared: false });

export const librarySharedFactory: ModuleFactory = (declaration) =>
  libraryModule("cc_library_shared", declaration, { buildStatic: false, buildShared: true });

/* =============================================================================
 * REGISTRY
 * ============================================================================= */

/**
 * Module types known to one build. Hosts create it during startup and call
 * the register* functions below; nothing is registered implicitly.
 */
export class ModuleTypeRegistry {
  #factories = new Map<string, ModuleFactory>();

  register(typeName: string, factory: ModuleFactory): this {
    this.#factories.set(typeName, factory);
    return this;
  }

  has(typeName: string): boolean {
    return this.#factories.has(typeName);
  }

  typeNames(): string[] {
    return [...this.#factories.keys()].sort();
  }

  create(typeName: string, declaration: ModuleDeclaration): Module {
    const factory = this.#factories.get(typeName);
    if (!factory) {
      throw new GraphStateError(
        `Unknown module type "${typeName}" for module "${declaration.name}"`,
        NdkGraphErrorCode.UNKNOWN_MODULE_TYPE,
        declaration.name,
        typeName,
      );
    }
    return factory(declaration);
  }
}

export function registerNdkPrebuiltModuleTypes(registry: ModuleTypeRegistry): ModuleTypeRegistry {
  return registry
    .register("ndk_prebuilt_library", ndkPrebuiltLibraryFactory)
    .register("ndk_prebuilt_object", ndkPrebuiltObjectFactory)
    .register("ndk_prebuilt_static_stl", ndkPrebuiltStaticStlFactory)
    .register("ndk_prebuilt_shared_stl", ndkPrebuiltSharedStlFactory);
}

export function registerLibraryModuleTypes(registry: ModuleTypeRegistry): ModuleTypeRegistry {
  return registry
    .register("cc_library", libraryFactory)
    .register("cc_library_static", libraryStaticFactory)
    .register("cc_library_shared", librarySharedFactory);
}
