import { Layer } from "effect"
import { DockerConfigLive, type DockerConfig } from "./config"
import { DockerStateLive, NodeCommandRunnerLive, type CommandRunner } from "./shared"
import { DockerImageBuilderLive } from "./builder"
import { DockerContainerLauncherLive } from "./launcher"

/**
 * Image builder and container launcher backed by the docker CLI.
 *
 * Both services share one DockerState so ports published at launch are
 * reused by later endpoint lookups.
 *
 * Usage:
 * ```ts
 * const program = Effect.gen(function* () {
 *   const builder = yield* ImageBuilder
 *   const image = yield* builder.build({ recipe: defaultRecipe(), context: ".", tag: "agent:dev" })
 *   // ...
 * })
 *
 * Effect.runPromise(program.pipe(Effect.provide(DockerRuntimeLive({ advertiseHost: "localhost" }))))
 * ```
 */
export const DockerRuntimeLive = (
  config: DockerConfig = {},
  runner: Layer.Layer<CommandRunner> = NodeCommandRunnerLive,
) => {
  const baseLayer = Layer.mergeAll(DockerConfigLive(config), DockerStateLive, runner)

  return Layer.mergeAll(DockerImageBuilderLive, DockerContainerLauncherLive).pipe(Layer.provide(baseLayer))
}
