/**
 * Build-then-launch composition.
 *
 * The build always completes before the launch starts; a failed build never
 * reaches the launcher.
 *
 * @example
 * ```ts
 * const program = buildAndLaunch(
 *   { recipe: defaultRecipe(), context: "./agent", tag: "agent:dev" },
 *   { hostPort: 2024 },
 * )
 *
 * Effect.runPromise(program.pipe(Effect.provide(DockerRuntimeLive())))
 * ```
 */

import { Effect, Scope } from "effect"
import { ImageBuilder } from "./builder"
import { ContainerLauncher } from "./launcher"
import { imageErrorToLog, withOperationContext, type ImageError } from "./errors"
import type { BuildRequest, ContainerInfo, ImageInfo, LaunchOptions } from "./types"

export interface LaunchedImage {
  readonly image: ImageInfo
  readonly container: ContainerInfo
}

/**
 * Build the image, then start one container from it.
 */
export const buildAndLaunch = (
  request: BuildRequest,
  options?: LaunchOptions,
): Effect.Effect<LaunchedImage, ImageError, ImageBuilder | ContainerLauncher> =>
  Effect.gen(function* () {
    const builder = yield* ImageBuilder
    const launcher = yield* ContainerLauncher

    const image = yield* withOperationContext(
      { component: "pipeline", operation: "build", imageTag: request.tag },
      builder.build(request),
    )
    yield* Effect.logInfo("Image built").pipe(
      Effect.annotateLogs({ imageTag: image.tag, imageId: image.id }),
    )

    const container = yield* withOperationContext(
      { component: "pipeline", operation: "launch", imageTag: image.tag },
      launcher.launch(image, options),
    )
    yield* Effect.logInfo("Container started").pipe(
      Effect.annotateLogs({ imageTag: image.tag, containerId: container.id }),
    )

    return { image, container }
  })

/**
 * Launch a container as a scoped resource. It is stopped when the scope
 * closes, whatever the outcome; a container that is already gone is fine.
 */
export const acquireContainer = (
  image: ImageInfo,
  options?: LaunchOptions,
): Effect.Effect<ContainerInfo, ImageError, ContainerLauncher | Scope.Scope> =>
  Effect.acquireRelease(
    ContainerLauncher.pipe(Effect.flatMap((l) => l.launch(image, options))),
    (container) =>
      ContainerLauncher.pipe(
        Effect.flatMap((l) => l.stop(container.id)),
        Effect.catchTag("ImageNotFound", () => Effect.void),
        Effect.catchAll((err) =>
          Effect.logWarning("Failed to stop container during cleanup").pipe(
            Effect.annotateLogs({
              containerId: container.id,
              error: JSON.stringify(imageErrorToLog(err)),
            }),
          ),
        ),
      ),
  )

/**
 * Run `use` with a launched container that is stopped afterwards.
 */
export const withLaunchedContainer = <A, E, R>(
  image: ImageInfo,
  options: LaunchOptions | undefined,
  use: (container: ContainerInfo) => Effect.Effect<A, E, R>,
): Effect.Effect<A, E | ImageError, R | ContainerLauncher> =>
  Effect.scoped(Effect.flatMap(acquireContainer(image, options), use))
