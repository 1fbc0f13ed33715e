import { Config, type Option } from "effect"

export interface CliEnvValues {
  readonly tag: string
  readonly hostPort: Option.Option<number>
  readonly binary: string
}

/**
 * Environment the CLI reads through Effect's Config; flags take precedence.
 */
export const CliEnv: Config.Config<CliEnvValues> = Config.all({
  tag: Config.string("AGENT_IMAGE_TAG").pipe(Config.withDefault("agent-image:latest")),
  hostPort: Config.option(Config.integer("AGENT_IMAGE_HOST_PORT")),
  binary: Config.string("DOCKER_BINARY").pipe(Config.withDefault("docker")),
})
