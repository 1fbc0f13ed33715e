import { Context, Layer } from "effect"

export interface DockerConfig {
  /** Host to advertise in endpoint URLs (default: 127.0.0.1) */
  advertiseHost?: string
  /** Timeout for a single docker invocation in ms (default: 600000) */
  timeoutMs?: number
  /** Docker network containers join (optional) */
  network?: string
  /** Docker CLI binary (default: "docker") */
  binary?: string
  /** Resolve the base image by pulling it; false only checks the local store (default: true) */
  pull?: boolean
}

export type ResolvedDockerConfig = Required<Omit<DockerConfig, "network">> & Pick<DockerConfig, "network">

export class DockerConfigTag extends Context.Tag("DockerConfig")<DockerConfigTag, ResolvedDockerConfig>() {}

export const resolveDockerConfig = (config: DockerConfig = {}): ResolvedDockerConfig => ({
  advertiseHost: config.advertiseHost ?? "127.0.0.1",
  timeoutMs: config.timeoutMs ?? 600000,
  network: config.network,
  binary: config.binary ?? "docker",
  pull: config.pull ?? true,
})

export const DockerConfigLive = (config: DockerConfig = {}) =>
  Layer.succeed(DockerConfigTag, resolveDockerConfig(config))
