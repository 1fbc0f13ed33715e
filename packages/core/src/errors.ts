import { Data, Effect, Clock, Random } from "effect"

/**
 * Context attached to image and container errors for debugging and tracing.
 * All fields are optional.
 */
export interface ImageErrorContext {
  /** Container engine name (e.g., "docker", "mock") */
  engine?: string
  /** Component that failed ("builder", "launcher", "pipeline") */
  component?: string
  /** Operation name (e.g., "build", "launch", "wait") */
  operation?: string
  /** Image tag involved in the operation */
  imageTag?: string
  /** Container ID involved in the operation */
  containerId?: string
  /** Timestamp when the error occurred (ISO string) */
  timestamp?: string
  /** Duration of the operation in milliseconds */
  durationMs?: number
}

/**
 * A recipe, reference or option failed validation before anything ran.
 */
export class ImageValidationError extends Data.TaggedError("ImageValidation")<{
  message: string
  context?: ImageErrorContext
}> {}

/**
 * The application source tree has no usable install manifest.
 */
export class ImageManifestError extends Data.TaggedError("ImageManifest")<{
  message: string
  path?: string
  context?: ImageErrorContext
}> {}

/**
 * Pipeline step that a build failure happened in.
 */
export type BuildPhase = "resolve-base" | "copy" | "install" | "inspect"

/**
 * The build pipeline aborted. No image is left under the requested tag.
 */
export class ImageBuildError extends Data.TaggedError("ImageBuild")<{
  phase: BuildPhase
  message: string
  cause?: unknown
  context?: ImageErrorContext
}> {}

/**
 * An image or container is unknown to the engine.
 */
export class ImageNotFoundError extends Data.TaggedError("ImageNotFound")<{
  id: string
  context?: ImageErrorContext
}> {}

/**
 * The entry command could not be started.
 */
export class ContainerLaunchError extends Data.TaggedError("ContainerLaunch")<{
  message: string
  cause?: unknown
  context?: ImageErrorContext
}> {}

/**
 * Any other container engine failure.
 */
export class ImageProviderError extends Data.TaggedError("ImageProvider")<{
  message: string
  cause?: unknown
  context?: ImageErrorContext
}> {}

export type ImageError =
  | ImageValidationError
  | ImageManifestError
  | ImageBuildError
  | ImageNotFoundError
  | ContainerLaunchError
  | ImageProviderError

/**
 * Keywords used by mapErrorWithContext to classify engine output.
 * Engines can extend these with their own phrasing.
 */
export const ErrorPatterns = {
  notFound: ["not found", "no such", "does not exist", "404"],
  baseUnresolved: [
    "manifest unknown",
    "pull access denied",
    "repository does not exist",
    "failed to resolve source metadata",
  ],
  launch: ["exec format error", "executable file not found", "oci runtime create failed"],
} as const

export interface ErrorPatternsConfig {
  notFound?: readonly string[]
  baseUnresolved?: readonly string[]
  launch?: readonly string[]
}

export interface MapErrorOptions {
  /** Image tag or container ID for ImageNotFoundError */
  id?: string
  patterns?: ErrorPatternsConfig
  context?: ImageErrorContext
}

/**
 * Type guard to check if an error is already an ImageError.
 */
export const isImageError = (err: unknown): err is ImageError =>
  err instanceof ImageValidationError ||
  err instanceof ImageManifestError ||
  err instanceof ImageBuildError ||
  err instanceof ImageNotFoundError ||
  err instanceof ContainerLaunchError ||
  err instanceof ImageProviderError

const withTimestamp = (context?: ImageErrorContext): ImageErrorContext | undefined =>
  context ? { ...context, timestamp: context.timestamp ?? new Date().toISOString() } : undefined

/**
 * Convert an unknown failure into a typed ImageError.
 *
 * Already-typed errors are kept (their context is filled in when missing).
 * Base-resolution keywords only classify as a build error; the caller decides
 * whether a match is a failed pull or an unknown image.
 *
 * @example
 * ```ts
 * Effect.tryPromise({
 *   try: () => runner.exec("docker", ["inspect", id]),
 *   catch: (err) => mapErrorWithContext(err, { id, context: { engine: "docker", operation: "state" } }),
 * })
 * ```
 */
export const mapErrorWithContext = (err: unknown, options: MapErrorOptions = {}): ImageError => {
  const { id, patterns = ErrorPatterns, context } = options
  const ctx = withTimestamp(context)

  if (isImageError(err)) {
    if (ctx && !err.context) {
      return addContextToError(err, ctx)
    }
    return err
  }

  const msg = err instanceof Error ? err.message : String(err)
  const lower = msg.toLowerCase()
  const matchesAny = (keywords: readonly string[]) => keywords.some((k) => lower.includes(k))

  if (matchesAny(patterns.baseUnresolved ?? ErrorPatterns.baseUnresolved)) {
    return new ImageBuildError({ phase: "resolve-base", message: msg, cause: err, context: ctx })
  }
  if (matchesAny(patterns.launch ?? ErrorPatterns.launch)) {
    return new ContainerLaunchError({ message: msg, cause: err, context: ctx })
  }
  if (matchesAny(patterns.notFound ?? ErrorPatterns.notFound)) {
    return new ImageNotFoundError({ id: id ?? ctx?.containerId ?? ctx?.imageTag ?? "unknown", context: ctx })
  }

  return new ImageProviderError({ message: msg, cause: err, context: ctx })
}

/**
 * Return a copy of the error carrying the given context.
 */
export const addContextToError = (err: ImageError, ctx: ImageErrorContext): ImageError => {
  switch (err._tag) {
    case "ImageValidation":
      return new ImageValidationError({ ...err, context: ctx })
    case "ImageManifest":
      return new ImageManifestError({ ...err, context: ctx })
    case "ImageBuild":
      return new ImageBuildError({ ...err, context: ctx })
    case "ImageNotFound":
      return new ImageNotFoundError({ ...err, context: ctx })
    case "ContainerLaunch":
      return new ContainerLaunchError({ ...err, context: ctx })
    case "ImageProvider":
      return new ImageProviderError({ ...err, context: ctx })
  }
}

/**
 * Wrap an effect with operation context: failures get the context and the
 * elapsed time, logs get annotated, and the operation runs inside a span.
 */
export const withOperationContext = <A, R>(
  context: ImageErrorContext,
  effect: Effect.Effect<A, ImageError, R>,
): Effect.Effect<A, ImageError, R> => {
  const spanName = [context.engine, context.component, context.operation].filter(Boolean).join(".")

  return Effect.gen(function* () {
    const startTime = yield* Clock.currentTimeMillis
    const result = yield* Effect.either(effect)

    if (result._tag === "Left") {
      const endTime = yield* Clock.currentTimeMillis
      const enriched = addContextToError(result.left, {
        ...result.left.context,
        ...context,
        durationMs: endTime - startTime,
        timestamp: new Date(endTime).toISOString(),
      })
      return yield* Effect.fail(enriched)
    }

    return result.right
  }).pipe(
    Effect.withSpan(spanName || "image.operation", {
      attributes: {
        "image.engine": context.engine ?? "",
        "image.component": context.component ?? "",
        "image.operation": context.operation ?? "",
        "image.tag": context.imageTag ?? "",
        "container.id": context.containerId ?? "",
      },
    }),
    Effect.annotateLogs({
      component: context.component ?? "",
      operation: context.operation ?? "",
    }),
  )
}

/**
 * Convert an ImageError to a flat object for structured logging.
 */
export const imageErrorToLog = (err: ImageError): Record<string, unknown> => {
  const base: Record<string, unknown> = {
    tag: err._tag,
  }

  if (err.context) {
    base.engine = err.context.engine
    base.component = err.context.component
    base.operation = err.context.operation
    base.imageTag = err.context.imageTag
    base.containerId = err.context.containerId
    base.durationMs = err.context.durationMs
  }

  switch (err._tag) {
    case "ImageNotFound":
      base.id = err.id
      break
    case "ImageBuild":
      base.phase = err.phase
      base.message = err.message
      break
    case "ImageManifest":
      base.message = err.message
      base.path = err.path
      break
    case "ImageValidation":
    case "ContainerLaunch":
    case "ImageProvider":
      base.message = err.message
      break
  }

  return base
}

/**
 * One-line human readable description of an ImageError.
 */
export const describeImageError = (err: ImageError): string => {
  switch (err._tag) {
    case "ImageNotFound":
      return `not found: ${err.id}`
    case "ImageBuild":
      return `build failed (${err.phase}): ${err.message}`
    case "ImageManifest":
      return `install manifest: ${err.message}`
    case "ImageValidation":
      return `invalid: ${err.message}`
    case "ContainerLaunch":
      return `launch failed: ${err.message}`
    case "ImageProvider":
      return err.message
  }
}

/**
 * Current timestamp as ISO string using Effect Clock.
 */
export const currentTimestamp: Effect.Effect<string> = Effect.map(
  Clock.currentTimeMillis,
  (ms) => new Date(ms).toISOString(),
)

/**
 * Unique ID with timestamp and random suffix, built from Effect services so
 * tests can pin both.
 */
export const generateId = (prefix: string): Effect.Effect<string> =>
  Effect.gen(function* () {
    const timestamp = yield* Clock.currentTimeMillis
    const n = yield* Random.next
    const suffix = Math.floor(n * 36 ** 6)
      .toString(36)
      .padStart(6, "0")
    return `${prefix}-${timestamp}-${suffix}`
  })
