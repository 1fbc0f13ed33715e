import { Effect, Either, Schema } from "effect"
import {
  ImageNotFoundError,
  ImageProviderError,
  parseBaseRuntimeRef,
  type ContainerState,
  type ImageError,
  type ImageErrorContext,
  type ImageInfo,
  type InstalledPackage,
  type RuntimeConfig,
} from "@agent-image/core"

/**
 * Image labels carrying the recipe's runtime contract.
 */
export const LABELS = {
  base: "agent-image.base",
  package: "agent-image.package",
  runtime: "agent-image.runtime",
} as const

const InstalledPackageSchema = Schema.Struct({
  name: Schema.String,
  version: Schema.String,
  manifest: Schema.Literal("pyproject.toml", "setup.py", "setup.cfg"),
})

const RuntimeConfigSchema = Schema.Struct({
  exposedPort: Schema.Int,
  entryCommand: Schema.Tuple(Schema.String, Schema.String),
  workdir: Schema.String,
})

const LabelsSchema = Schema.NullOr(Schema.Record({ key: Schema.String, value: Schema.String }))

const ImageInspectSchema = Schema.Struct({
  Id: Schema.String,
  Created: Schema.String,
  Config: Schema.Struct({
    Labels: LabelsSchema,
  }),
})

const ContainerStateSchema = Schema.Struct({
  Status: Schema.String,
  ExitCode: Schema.Number,
  StartedAt: Schema.String,
  FinishedAt: Schema.String,
})

const PortBindingsSchema = Schema.NullOr(
  Schema.Record({
    key: Schema.String,
    value: Schema.NullOr(Schema.Array(Schema.Struct({ HostIp: Schema.optional(Schema.String), HostPort: Schema.String }))),
  }),
)

const decodeJson = <A, I>(
  schema: Schema.Schema<A, I>,
  json: string,
  what: string,
  context: ImageErrorContext,
): Effect.Effect<A, ImageProviderError> => {
  const decoded = Schema.decodeUnknownEither(Schema.parseJson(schema))(json.trim())
  return Either.isRight(decoded)
    ? Effect.succeed(decoded.right)
    : Effect.fail(new ImageProviderError({ message: `Unexpected ${what} from docker`, cause: decoded.left, context }))
}

export const labelsFor = (image: Pick<ImageInfo, "base" | "config" | "installedPackage">): string[] => [
  `${LABELS.base}=${image.base.name}:${image.base.tag}`,
  `${LABELS.package}=${JSON.stringify(image.installedPackage)}`,
  `${LABELS.runtime}=${JSON.stringify(image.config)}`,
]

/**
 * Rebuild ImageInfo from `docker image inspect --format '{{json .}}'`.
 * An image without the recipe labels was not built by this tool and is
 * reported as not found.
 */
export const parseImageInspect = (
  json: string,
  tag: string,
  context: ImageErrorContext,
): Effect.Effect<ImageInfo, ImageError> =>
  Effect.gen(function* () {
    const inspect = yield* decodeJson(ImageInspectSchema, json, "image inspect output", context)
    const labels: Readonly<Record<string, string>> = inspect.Config.Labels ?? {}
    const base = labels[LABELS.base]
    const pkg = labels[LABELS.package]
    const runtime = labels[LABELS.runtime]
    if (base === undefined || pkg === undefined || runtime === undefined) {
      return yield* Effect.fail(new ImageNotFoundError({ id: tag, context }))
    }

    const installedPackage: InstalledPackage = yield* decodeJson(InstalledPackageSchema, pkg, "package label", context)
    const config: RuntimeConfig = yield* decodeJson(RuntimeConfigSchema, runtime, "runtime label", context)

    return {
      id: inspect.Id,
      tag,
      base: yield* parseBaseRuntimeRef(base, context),
      config,
      installedPackage,
      createdAt: inspect.Created,
    }
  })

/**
 * Runtime contract of a container from `docker inspect --format '{{json .Config.Labels}}'`.
 * Containers inherit their image's labels.
 */
export const parseContainerRuntime = (
  json: string,
  id: string,
  context: ImageErrorContext,
): Effect.Effect<RuntimeConfig, ImageError> =>
  Effect.gen(function* () {
    const labels: Readonly<Record<string, string>> =
      (yield* decodeJson(LabelsSchema, json, "container labels", context)) ?? {}
    const runtime = labels[LABELS.runtime]
    if (runtime === undefined) {
      return yield* Effect.fail(new ImageNotFoundError({ id, context }))
    }
    return yield* decodeJson(RuntimeConfigSchema, runtime, "runtime label", context)
  })

/**
 * Map `docker inspect --format '{{json .State}}'` onto the container lifecycle.
 */
export const parseContainerState = (
  json: string,
  context: ImageErrorContext,
): Effect.Effect<ContainerState, ImageError> =>
  Effect.map(decodeJson(ContainerStateSchema, json, "container state", context), (state): ContainerState => {
    switch (state.Status) {
      case "created":
        return { _tag: "NotStarted" }
      case "exited":
      case "dead":
      case "removing":
        return { _tag: "Exited", exitCode: state.ExitCode, finishedAt: state.FinishedAt }
      default:
        return { _tag: "Running", startedAt: state.StartedAt }
    }
  })

/**
 * Parse `docker inspect --format '{{json .NetworkSettings.Ports}}'` into
 * { containerPort: hostPort }. Unpublished ports are left out.
 */
export const parsePortBindings = (
  json: string,
  context: ImageErrorContext,
): Effect.Effect<Record<number, number>, ImageError> =>
  Effect.map(decodeJson(PortBindingsSchema, json, "port bindings", context), (bindings) => {
    const ports: Record<number, number> = {}
    for (const [containerPort, hostBindings] of Object.entries(bindings ?? {})) {
      const first = hostBindings?.[0]
      if (!first) continue
      const port = parseInt(containerPort.split("/")[0] ?? "", 10)
      const hostPort = parseInt(first.HostPort, 10)
      if (!isNaN(port) && !isNaN(hostPort)) {
        ports[port] = hostPort
      }
    }
    return ports
  })
