import { readFile } from "node:fs/promises"
import { join } from "node:path"
import { Effect, Layer } from "effect"
import {
  ImageBuilder,
  ImageBuildError,
  describeImageError,
  findInstallManifest,
  formatBaseRuntimeRef,
  renderDockerfile,
  runtimeConfigOf,
  validateRecipe,
  withOperationContext,
  type BuildPhase,
  type BuildRequest,
  type ImageBuilderService,
  type ImageErrorContext,
  type TreeReader,
} from "@agent-image/core"
import { DockerConfigTag } from "./config"
import { dockerContext, failureFrom, makeDockerExec } from "./shared"
import { labelsFor, parseImageInspect } from "./inspect"

const treeReader =
  (root: string): TreeReader =>
  async (relativePath) => {
    try {
      return await readFile(join(root, relativePath), "utf8")
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return undefined
      }
      throw err
    }
  }

// BuildKit reports a missing COPY source as a cache key failure.
const COPY_FAILURE = /failed to compute cache key|COPY failed|failed to calculate checksum/i

const buildPhaseOf = (stderr: string): BuildPhase => (COPY_FAILURE.test(stderr) ? "copy" : "install")

export const DockerImageBuilderLive = Layer.effect(
  ImageBuilder,
  Effect.gen(function* () {
    const config = yield* DockerConfigTag
    const run = yield* makeDockerExec

    const inspect = (tag: string, context: ImageErrorContext) =>
      Effect.gen(function* () {
        const result = yield* run(["image", "inspect", "--format", "{{json .}}", tag], context)
        if (result.exitCode !== 0) {
          return yield* Effect.fail(failureFrom(result, context, tag))
        }
        return yield* parseImageInspect(result.stdout, tag, context)
      })

    const builder: ImageBuilderService = {
      build: (request: BuildRequest) => {
        const context = dockerContext("builder", "build", { imageTag: request.tag })
        return withOperationContext(
          context,
          Effect.gen(function* () {
            const recipe = yield* validateRecipe(request.recipe, context)
            const installedPackage = yield* findInstallManifest(request.context, treeReader(request.context), context)
            yield* Effect.logDebug("Install manifest found").pipe(
              Effect.annotateLogs({ package: installedPackage.name, version: installedPackage.version }),
            )

            const baseRef = formatBaseRuntimeRef(recipe.base)
            const resolved = yield* run(
              config.pull ? ["pull", "--quiet", baseRef] : ["image", "inspect", "--format", "{{.Id}}", baseRef],
              context,
            )
            if (resolved.exitCode !== 0) {
              return yield* Effect.fail(
                new ImageBuildError({
                  phase: "resolve-base",
                  message: resolved.stderr.trim() || `Cannot resolve base image ${baseRef}`,
                  context,
                }),
              )
            }

            const labels = labelsFor({ base: recipe.base, config: runtimeConfigOf(recipe), installedPackage })
            const built = yield* run(
              [
                "build",
                "--tag",
                request.tag,
                ...labels.flatMap((label) => ["--label", label]),
                "--file",
                "-",
                request.context,
              ],
              context,
              renderDockerfile(recipe),
            )
            if (built.exitCode !== 0) {
              return yield* Effect.fail(
                new ImageBuildError({
                  phase: buildPhaseOf(built.stderr),
                  message: built.stderr.trim() || `docker build exited with code ${built.exitCode}`,
                  context,
                }),
              )
            }

            // An image that cannot be read back is not left under the tag.
            const info = yield* inspect(request.tag, context).pipe(
              Effect.tapError(() =>
                run(["rmi", "--force", request.tag], context).pipe(
                  Effect.flatMap((removed) =>
                    removed.exitCode === 0
                      ? Effect.void
                      : Effect.logWarning("Failed to remove unreadable image").pipe(
                          Effect.annotateLogs({ imageTag: request.tag, stderr: removed.stderr.trim() }),
                        ),
                  ),
                  Effect.catchAll((err) =>
                    Effect.logWarning("Failed to remove unreadable image").pipe(
                      Effect.annotateLogs({ imageTag: request.tag, error: describeImageError(err) }),
                    ),
                  ),
                ),
              ),
              Effect.mapError(
                (err) => new ImageBuildError({ phase: "inspect", message: describeImageError(err), cause: err, context }),
              ),
            )
            yield* Effect.logInfo("Image built").pipe(
              Effect.annotateLogs({ imageTag: info.tag, imageId: info.id, base: baseRef }),
            )
            return info
          }),
        )
      },

      inspect: (tag: string) => inspect(tag, dockerContext("builder", "inspect", { imageTag: tag })),

      remove: (tag: string) => {
        const context = dockerContext("builder", "remove", { imageTag: tag })
        return Effect.gen(function* () {
          const result = yield* run(["rmi", tag], context)
          if (result.exitCode !== 0) {
            return yield* Effect.fail(failureFrom(result, context, tag))
          }
        })
      },
    }

    return builder
  }),
)
