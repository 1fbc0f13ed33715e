import { Effect, Either, Option, Schema } from "effect"
import { parse as parseToml } from "smol-toml"
import { ImageManifestError, type ImageErrorContext } from "./errors"
import type { InstalledPackage, ManifestKind } from "./types"

/**
 * Manifests `pip install .` accepts at the root of a source tree, in lookup order.
 */
export const MANIFEST_FILES: ReadonlyArray<ManifestKind> = ["pyproject.toml", "setup.py", "setup.cfg"]

const Identity = Schema.Struct({
  name: Schema.optional(Schema.String),
  version: Schema.optional(Schema.String),
})

const PyProject = Schema.Struct({
  project: Schema.optional(Identity),
  tool: Schema.optional(Schema.Struct({ poetry: Schema.optional(Identity) })),
})

const UNVERSIONED = "0.0.0"

const lastSegment = (path: string) => path.replace(/\/+$/, "").split("/").pop() || path

/**
 * Package identity declared in a `pyproject.toml`: `[project]` first, then
 * `[tool.poetry]`. None when the file only configures the build backend.
 */
export const readPyProjectIdentity = (
  content: string,
  context?: ImageErrorContext,
): Effect.Effect<Option.Option<{ name: string; version: string }>, ImageManifestError> =>
  Effect.try({
    try: () => parseToml(content),
    catch: (err) =>
      new ImageManifestError({
        message: `Malformed pyproject.toml: ${err instanceof Error ? err.message : String(err)}`,
        path: "pyproject.toml",
        context,
      }),
  }).pipe(
    Effect.flatMap((table) => {
      const decoded = Schema.decodeUnknownEither(PyProject)(table)
      if (Either.isLeft(decoded)) {
        return Effect.fail(
          new ImageManifestError({
            message: "pyproject.toml: [project] and [tool.poetry] name and version must be strings",
            path: "pyproject.toml",
            context,
          }),
        )
      }
      const declared = [decoded.right.project, decoded.right.tool?.poetry].find(
        (identity) => identity?.name !== undefined && identity.name.length > 0,
      )
      return Effect.succeed(
        Option.map(Option.fromNullable(declared?.name), (name) => ({
          name,
          version: declared?.version ?? UNVERSIONED,
        })),
      )
    }),
  )

/**
 * Derive the installed package identity from a manifest's content.
 * Legacy manifests are executable, so only `pyproject.toml` carries a
 * readable identity; everything else falls back to the tree's directory name.
 */
export const parseInstallManifest = (
  file: ManifestKind,
  content: string,
  root: string,
  context?: ImageErrorContext,
): Effect.Effect<InstalledPackage, ImageManifestError> => {
  const unnamed: InstalledPackage = { name: lastSegment(root), version: UNVERSIONED, manifest: file }
  if (file !== "pyproject.toml") {
    return Effect.succeed(unnamed)
  }
  return Effect.map(readPyProjectIdentity(content, context), (identity) =>
    Option.match(identity, {
      onNone: () => unnamed,
      onSome: ({ name, version }) => ({ name, version, manifest: file }),
    }),
  )
}

/**
 * Reads a file relative to the source tree root, resolving to undefined when
 * the file does not exist.
 */
export type TreeReader = (relativePath: string) => Promise<string | undefined>

/**
 * Locate and parse the install manifest of a source tree. A tree without one
 * cannot be installed, so this fails the build.
 */
export const findInstallManifest = (
  root: string,
  read: TreeReader,
  context?: ImageErrorContext,
): Effect.Effect<InstalledPackage, ImageManifestError> =>
  Effect.gen(function* () {
    const found: Array<{ file: ManifestKind; content: string }> = []
    for (const file of MANIFEST_FILES) {
      const content = yield* Effect.tryPromise({
        try: () => read(file),
        catch: (err) =>
          new ImageManifestError({
            message: `Cannot read ${file}: ${err instanceof Error ? err.message : String(err)}`,
            path: file,
            context,
          }),
      })
      if (content !== undefined) {
        found.push({ file, content })
      }
    }

    const [first, ...rest] = found
    if (first === undefined) {
      return yield* Effect.fail(
        new ImageManifestError({
          message: `No install manifest (${MANIFEST_FILES.join(", ")}) at the root of ${root}`,
          context,
        }),
      )
    }
    if (first.file !== "pyproject.toml") {
      return yield* parseInstallManifest(first.file, first.content, root, context)
    }
    const identity = yield* readPyProjectIdentity(first.content, context)
    if (Option.isSome(identity)) {
      return { ...identity.value, manifest: first.file }
    }
    // Only the build backend is configured; setup.py or setup.cfg declares the package.
    return { name: lastSegment(root), version: UNVERSIONED, manifest: rest[0]?.file ?? first.file }
  })
