import { Effect, Layer, Option } from "effect"
import {
  ContainerLauncher,
  ContainerLaunchError,
  ImageValidationError,
  currentTimestamp,
  withOperationContext,
  type ContainerInfo,
  type ContainerLauncherService,
  type ExitedState,
  type ImageErrorContext,
  type ImageInfo,
  type LaunchOptions,
} from "@agent-image/core"
import { DockerConfigTag } from "./config"
import { DockerStateTag, dockerContext, failureFrom, makeDockerExec, type PublishedPorts } from "./shared"
import { parseContainerRuntime, parseContainerState, parseImageInspect, parsePortBindings } from "./inspect"

export const DockerContainerLauncherLive = Layer.effect(
  ContainerLauncher,
  Effect.gen(function* () {
    const config = yield* DockerConfigTag
    const state = yield* DockerStateTag
    const run = yield* makeDockerExec

    const inspectField = (id: string, template: string, context: ImageErrorContext) =>
      Effect.gen(function* () {
        const result = yield* run(["inspect", "--format", template, id], context)
        if (result.exitCode !== 0) {
          return yield* Effect.fail(failureFrom(result, context, id))
        }
        return result.stdout
      })

    const containerState = (id: string, context: ImageErrorContext) =>
      Effect.flatMap(inspectField(id, "{{json .State}}", context), (json) => parseContainerState(json, context))

    const ports = (id: string, context: ImageErrorContext) =>
      Effect.flatMap(inspectField(id, "{{json .NetworkSettings.Ports}}", context), (json) =>
        parsePortBindings(json, context),
      )

    // For containers this process did not launch.
    const lookupPorts = (id: string, context: ImageErrorContext) =>
      Effect.gen(function* () {
        const runtime = yield* Effect.flatMap(inspectField(id, "{{json .Config.Labels}}", context), (json) =>
          parseContainerRuntime(json, id, context),
        )
        const published: PublishedPorts = { exposedPort: runtime.exposedPort, ports: yield* ports(id, context) }
        return published
      })

    const launchArgs = (image: ImageInfo, options: LaunchOptions, hostPort: number): string[] => {
      const args = ["run", "--detach", "--publish", `${hostPort}:${image.config.exposedPort}`]
      if (options.name) {
        args.push("--name", options.name)
      }
      for (const [key, value] of Object.entries(options.env ?? {})) {
        args.push("--env", `${key}=${value}`)
      }
      for (const [hostPath, containerPath] of Object.entries(options.volumes ?? {})) {
        args.push("--volume", `${hostPath}:${containerPath}`)
      }
      const network = options.network ?? config.network
      if (network) {
        args.push("--network", network)
      }
      args.push(image.tag)
      return args
    }

    const launcher: ContainerLauncherService = {
      launch: (image: ImageInfo, options: LaunchOptions = {}) => {
        const context = dockerContext("launcher", "launch", { imageTag: image.tag })
        return withOperationContext(
          context,
          Effect.gen(function* () {
            const hostPort = options.hostPort ?? image.config.exposedPort
            if (!Number.isInteger(hostPort) || hostPort < 0 || hostPort > 65535) {
              return yield* Effect.fail(
                new ImageValidationError({ message: `Host port must be between 0 and 65535, got: ${hostPort}`, context }),
              )
            }

            // The entry command only works on top of a completed install.
            const inspected = yield* run(["image", "inspect", "--format", "{{json .}}", image.tag], context)
            const built: Option.Option<ImageInfo> =
              inspected.exitCode === 0
                ? yield* Effect.option(parseImageInspect(inspected.stdout, image.tag, context))
                : Option.none()
            if (Option.isNone(built) || built.value.id !== image.id) {
              return yield* Effect.fail(
                new ContainerLaunchError({ message: `Image ${image.tag} has no installed package`, context }),
              )
            }

            const result = yield* run(launchArgs(image, options, hostPort), context)
            if (result.exitCode !== 0) {
              return yield* Effect.fail(
                new ContainerLaunchError({
                  message: result.stderr.trim() || `docker run exited with code ${result.exitCode}`,
                  context,
                }),
              )
            }

            const id = result.stdout.trim().substring(0, 12)
            const exposedPort = image.config.exposedPort
            const published = yield* ports(id, { ...context, containerId: id })
            // Docker clears the bindings once the process has exited.
            if (published[exposedPort] === undefined && hostPort !== 0) {
              published[exposedPort] = hostPort
            }
            state.portCache.set(id, { exposedPort, ports: published })

            const info: ContainerInfo = {
              id,
              name: options.name,
              image: image.tag,
              engine: "docker",
              state: { _tag: "Running", startedAt: yield* currentTimestamp },
              ports: published,
            }
            yield* Effect.logInfo("Container started").pipe(
              Effect.annotateLogs({ containerId: id, imageTag: image.tag }),
            )
            return info
          }),
        )
      },

      state: (id: string) => containerState(id, dockerContext("launcher", "state", { containerId: id })),

      wait: (id: string) => {
        const context = dockerContext("launcher", "wait", { containerId: id })
        return Effect.gen(function* () {
          const result = yield* run(["wait", id], context)
          if (result.exitCode !== 0) {
            return yield* Effect.fail(failureFrom(result, context, id))
          }
          const current = yield* containerState(id, context)
          if (current._tag === "Exited") {
            return current
          }
          const exited: ExitedState = {
            _tag: "Exited",
            exitCode: parseInt(result.stdout.trim(), 10),
            finishedAt: yield* currentTimestamp,
          }
          return exited
        })
      },

      stop: (id: string) => {
        const context = dockerContext("launcher", "stop", { containerId: id })
        return Effect.gen(function* () {
          const result = yield* run(["rm", "--force", id], context)
          if (result.exitCode !== 0) {
            return yield* Effect.fail(failureFrom(result, context, id))
          }
          state.portCache.delete(id)
        })
      },

      endpoint: (id: string) => {
        const context = dockerContext("launcher", "endpoint", { containerId: id })
        return Effect.gen(function* () {
          const published = state.portCache.get(id) ?? (yield* lookupPorts(id, context))
          const hostPort = published.ports[published.exposedPort]
          if (hostPort === undefined) {
            return yield* Effect.fail(
              new ContainerLaunchError({ message: `Container ${id} publishes no port`, context }),
            )
          }
          return `http://${config.advertiseHost}:${hostPort}`
        })
      },

      logs: (id: string) => {
        const context = dockerContext("launcher", "logs", { containerId: id })
        return Effect.gen(function* () {
          const result = yield* run(["logs", id], context)
          if (result.exitCode !== 0) {
            return yield* Effect.fail(failureFrom(result, context, id))
          }
          return { stdout: result.stdout, stderr: result.stderr }
        })
      },
    }

    return launcher
  }),
)
