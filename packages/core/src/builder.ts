import { Context, Effect } from "effect"
import type { ImageError } from "./errors"
import type { BuildRequest, ImageInfo } from "./types"

/**
 * Runs the build pipeline: select base, copy tree, set working directory,
 * install. Every engine implements this service.
 */
export interface ImageBuilderService {
  /**
   * Build an image. Any failing step aborts the whole build and no image is
   * left under the requested tag.
   */
  readonly build: (request: BuildRequest) => Effect.Effect<ImageInfo, ImageError>

  /**
   * Info of an image previously built from a recipe.
   */
  readonly inspect: (tag: string) => Effect.Effect<ImageInfo, ImageError>

  /**
   * Remove an image by tag.
   */
  readonly remove: (tag: string) => Effect.Effect<void, ImageError>
}

export class ImageBuilder extends Context.Tag("ImageBuilder")<ImageBuilder, ImageBuilderService>() {}

export const build = (request: BuildRequest): Effect.Effect<ImageInfo, ImageError, ImageBuilder> =>
  Effect.flatMap(ImageBuilder, (svc) => svc.build(request))

export const inspectImage = (tag: string): Effect.Effect<ImageInfo, ImageError, ImageBuilder> =>
  Effect.flatMap(ImageBuilder, (svc) => svc.inspect(tag))

export const removeImage = (tag: string): Effect.Effect<void, ImageError, ImageBuilder> =>
  Effect.flatMap(ImageBuilder, (svc) => svc.remove(tag))

/**
 * Return the image already built under the request's tag, or build it.
 */
export const ensureImage = (request: BuildRequest): Effect.Effect<ImageInfo, ImageError, ImageBuilder> =>
  Effect.flatMap(ImageBuilder, (svc) =>
    svc.inspect(request.tag).pipe(
      Effect.tap((info) => Effect.logDebug("Reusing existing image").pipe(Effect.annotateLogs({ imageTag: info.tag }))),
      Effect.catchTag("ImageNotFound", () => svc.build(request)),
    ),
  )
