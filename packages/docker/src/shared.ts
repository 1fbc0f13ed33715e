import { spawn } from "node:child_process"
import { Context, Effect, Layer } from "effect"
import {
  mapErrorWithContext,
  ErrorPatterns,
  type ImageError,
  type ImageErrorContext,
} from "@agent-image/core"
import { DockerConfigTag } from "./config"

export interface CommandResult {
  stdout: string
  stderr: string
  exitCode: number
}

export interface ExecOptions {
  /** Written to the process's stdin, which is then closed */
  stdin?: string
  timeoutMs?: number
}

/**
 * Runs engine CLI commands. Swapped for an in-process fake in tests.
 */
export interface CommandRunnerService {
  readonly exec: (cmd: string, args: ReadonlyArray<string>, options?: ExecOptions) => Promise<CommandResult>
}

export class CommandRunner extends Context.Tag("CommandRunner")<CommandRunner, CommandRunnerService>() {}

export const exec = (
  cmd: string,
  args: ReadonlyArray<string>,
  options: ExecOptions = {},
): Promise<CommandResult> =>
  new Promise((resolve, reject) => {
    const proc = spawn(cmd, [...args], {
      stdio: ["pipe", "pipe", "pipe"],
      timeout: options.timeoutMs,
    })
    let stdout = ""
    let stderr = ""
    proc.stdout.setEncoding("utf8").on("data", (chunk: string) => {
      stdout += chunk
    })
    proc.stderr.setEncoding("utf8").on("data", (chunk: string) => {
      stderr += chunk
    })
    proc.on("error", reject)
    proc.on("close", (code, signal) => {
      if (code === null) {
        reject(new Error(`${cmd} ${args[0] ?? ""} timed out (${signal ?? "killed"})`))
        return
      }
      resolve({ stdout, stderr, exitCode: code })
    })
    proc.stdin.end(options.stdin)
  })

export const NodeCommandRunnerLive = Layer.succeed(CommandRunner, { exec })

/**
 * Docker-specific error patterns extending the base patterns.
 */
export const dockerErrorPatterns = {
  ...ErrorPatterns,
  notFound: [...ErrorPatterns.notFound, "no such container", "no such image"],
}

export const dockerContext = (
  component: string,
  operation: string,
  ids: Pick<ImageErrorContext, "imageTag" | "containerId"> = {},
): ImageErrorContext => ({
  engine: "docker",
  component,
  operation,
  ...ids,
})

export const mapError = (err: unknown, context: ImageErrorContext, id?: string): ImageError =>
  mapErrorWithContext(err, { id, patterns: dockerErrorPatterns, context })

/**
 * Run the docker CLI with the configured binary and timeout.
 */
export const docker = (
  args: ReadonlyArray<string>,
  context: ImageErrorContext,
  options: Omit<ExecOptions, "timeoutMs"> = {},
): Effect.Effect<CommandResult, ImageError, CommandRunner | DockerConfigTag> =>
  Effect.gen(function* () {
    const runner = yield* CommandRunner
    const config = yield* DockerConfigTag
    yield* Effect.logDebug(`${config.binary} ${args.join(" ")}`)
    return yield* Effect.tryPromise({
      try: () => runner.exec(config.binary, args, { ...options, timeoutMs: config.timeoutMs }),
      catch: (err) => mapError(err, context),
    })
  })

/**
 * Failure output of a docker command, classified by its stderr.
 */
export const failureFrom = (result: CommandResult, context: ImageErrorContext, id?: string): ImageError =>
  mapError(new Error(result.stderr.trim() || `docker exited with code ${result.exitCode}`), context, id)

export interface PublishedPorts {
  /** The image's exposed port */
  exposedPort: number
  /** { containerPort: hostPort } */
  ports: Record<number, number>
}

/** Published ports per launched container */
export interface DockerState {
  portCache: Map<string, PublishedPorts>
}

export class DockerStateTag extends Context.Tag("DockerState")<DockerStateTag, DockerState>() {}

export const DockerStateLive = Layer.sync(DockerStateTag, () => ({ portCache: new Map() }))

/**
 * Resolve the runner and config once, for use inside a layer's services.
 */
export const makeDockerExec = Effect.gen(function* () {
  const config = yield* DockerConfigTag
  const runner = yield* CommandRunner
  return (args: ReadonlyArray<string>, context: ImageErrorContext, stdin?: string) =>
    docker(args, context, { stdin }).pipe(
      Effect.provideService(DockerConfigTag, config),
      Effect.provideService(CommandRunner, runner),
    )
})
