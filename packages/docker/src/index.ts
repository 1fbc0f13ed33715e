export { DockerConfigTag, DockerConfigLive, resolveDockerConfig, type DockerConfig, type ResolvedDockerConfig } from "./config"
export {
  CommandRunner,
  NodeCommandRunnerLive,
  exec,
  type CommandResult,
  type CommandRunnerService,
  type ExecOptions,
} from "./shared"
export { LABELS, labelsFor, parseContainerRuntime, parseContainerState, parseImageInspect, parsePortBindings } from "./inspect"
export { DockerImageBuilderLive } from "./builder"
export { DockerContainerLauncherLive } from "./launcher"
export { DockerRuntimeLive } from "./layer"
