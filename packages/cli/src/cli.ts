import yargs from "yargs"
import chalk from "chalk"
import { Cause, ConfigProvider, Effect, Exit, Layer, Logger, LogLevel, Option } from "effect"
import {
  describeImageError,
  formatBaseRuntimeRef,
  isImageError,
  renderDockerfile,
  type ContainerLauncher,
  type ImageBuilder,
  type ImageError,
  type InstallVariant,
} from "@agent-image/core"
import { DockerRuntimeLive, type DockerConfig } from "@agent-image/docker"
import { CliEnv, type CliEnvValues } from "./env"
import { buildProgram, hostPortFrom, launchProgram, recipeFor, upProgram, type LaunchArgs } from "./programs"

export interface CliIO {
  readonly out: (line: string) => void
  readonly err: (line: string) => void
}

export type RuntimeFactory = (config: DockerConfig) => Layer.Layer<ImageBuilder | ContainerLauncher>

export interface CliOptions {
  io?: CliIO
  /** Engine behind the commands (default: docker CLI) */
  runtime?: RuntimeFactory
  /** Where CliEnv is read from (default: process environment) */
  configProvider?: ConfigProvider.ConfigProvider
}

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
}

/** Exit status for command failures */
export const EXIT_FAILURE = 1
/** Exit status for invalid arguments (sysexits EX_USAGE) */
export const EXIT_USAGE = 64

const VARIANTS: ReadonlyArray<InstallVariant> = ["package", "package+inmem-cli"]

const isVariant = (value: unknown): value is InstallVariant => VARIANTS.some((variant) => variant === value)

/**
 * Run the CLI and resolve to the process exit status. `up` exits with the
 * container's own exit code; argument errors exit with EXIT_USAGE.
 */
export const runCli = async (argv: ReadonlyArray<string>, options: CliOptions = {}): Promise<number> => {
  const io = options.io ?? consoleIO
  const runtime = options.runtime ?? ((config: DockerConfig) => DockerRuntimeLive(config))
  const configProvider = options.configProvider ?? ConfigProvider.fromEnv()
  let exitCode = 0

  const execute = async <A>(
    verbose: boolean,
    program: (env: CliEnvValues) => Effect.Effect<A, ImageError, ImageBuilder | ContainerLauncher>,
    render: (value: A) => number,
  ): Promise<void> => {
    const exit = await Effect.runPromiseExit(
      Effect.gen(function* () {
        const env = yield* CliEnv
        return yield* program(env).pipe(Effect.provide(runtime({ binary: env.binary })))
      }).pipe(
        Effect.withConfigProvider(configProvider),
        Logger.withMinimumLogLevel(verbose ? LogLevel.Debug : LogLevel.Info),
      ),
    )

    if (Exit.isSuccess(exit)) {
      exitCode = render(exit.value)
      return
    }
    const failure = Cause.failureOption(exit.cause)
    if (Option.isSome(failure) && isImageError(failure.value)) {
      io.err(chalk.red(`✗ ${describeImageError(failure.value)}`))
    } else {
      io.err(chalk.red(Cause.pretty(exit.cause)))
    }
    exitCode = EXIT_FAILURE
  }

  const variantOf = (value: unknown): InstallVariant => (isVariant(value) ? value : "package")

  await yargs([...argv])
    .scriptName("agent-image")
    .usage("$0 <cmd> [args]")
    .option("verbose", { type: "boolean", default: false, describe: "Log engine commands" })
    .command(
      "dockerfile",
      "Print the Dockerfile of the image recipe",
      (y) =>
        y
          .option("variant", { type: "string", choices: VARIANTS, default: "package", describe: "Install variant" })
          .option("base", { type: "string", describe: "Base runtime image (name:tag)" }),
      async (args) => {
        await execute(
          args.verbose,
          () => recipeFor({ variant: variantOf(args.variant), base: args.base }),
          (recipe) => {
            io.out(renderDockerfile(recipe).trimEnd())
            return 0
          },
        )
      },
    )
    .command(
      "build [context]",
      "Build the image from an application source tree",
      (y) =>
        y
          .positional("context", { type: "string", default: ".", describe: "Application source tree" })
          .option("tag", { alias: "t", type: "string", describe: "Image tag (default: $AGENT_IMAGE_TAG)" })
          .option("variant", { type: "string", choices: VARIANTS, default: "package", describe: "Install variant" })
          .option("base", { type: "string", describe: "Base runtime image (name:tag)" }),
      async (args) => {
        await execute(
          args.verbose,
          (env) =>
            buildProgram({
              context: args.context ?? ".",
              tag: args.tag ?? env.tag,
              variant: variantOf(args.variant),
              base: args.base,
            }),
          (image) => {
            io.out(chalk.green(`✓ Built ${image.tag} (${image.id})`))
            io.out(`  base     ${formatBaseRuntimeRef(image.base)}`)
            io.out(`  package  ${image.installedPackage.name} ${image.installedPackage.version}`)
            io.out(`  port     ${image.config.exposedPort}`)
            io.out(`  command  ${image.config.entryCommand.join(" ")}`)
            return 0
          },
        )
      },
    )
    .command(
      "launch [tag]",
      "Start one container from a built image",
      (y) =>
        y
          .positional("tag", { type: "string", describe: "Image tag (default: $AGENT_IMAGE_TAG)" })
          .option("name", { type: "string", describe: "Container name" })
          .option("host-port", { alias: "p", type: "number", describe: "Host port for the exposed port" })
          .option("env", { alias: "e", type: "string", array: true, describe: "KEY=VALUE" })
          .option("volume", { alias: "v", type: "string", array: true, describe: "HOST_PATH:CONTAINER_PATH" })
          .option("network", { type: "string", describe: "Network to join" }),
      async (args) => {
        await execute(
          args.verbose,
          (env) =>
            launchProgram(args.tag ?? env.tag, {
              name: args.name,
              hostPort: hostPortFrom(args["host-port"], env.hostPort),
              env: args.env,
              volume: args.volume,
              network: args.network,
            } satisfies LaunchArgs),
          ({ container, url }) => {
            io.out(chalk.green(`✓ Started ${container.id} from ${container.image}`))
            io.out(`  ${url}`)
            return 0
          },
        )
      },
    )
    .command(
      "up [context]",
      "Build the image, start it and wait for the process to exit",
      (y) =>
        y
          .positional("context", { type: "string", default: ".", describe: "Application source tree" })
          .option("tag", { alias: "t", type: "string", describe: "Image tag (default: $AGENT_IMAGE_TAG)" })
          .option("variant", { type: "string", choices: VARIANTS, default: "package", describe: "Install variant" })
          .option("base", { type: "string", describe: "Base runtime image (name:tag)" })
          .option("name", { type: "string", describe: "Container name" })
          .option("host-port", { alias: "p", type: "number", describe: "Host port for the exposed port" })
          .option("env", { alias: "e", type: "string", array: true, describe: "KEY=VALUE" })
          .option("volume", { alias: "v", type: "string", array: true, describe: "HOST_PATH:CONTAINER_PATH" })
          .option("network", { type: "string", describe: "Network to join" }),
      async (args) => {
        await execute(
          args.verbose,
          (env) =>
            upProgram(
              {
                context: args.context ?? ".",
                tag: args.tag ?? env.tag,
                variant: variantOf(args.variant),
                base: args.base,
                name: args.name,
                hostPort: hostPortFrom(args["host-port"], env.hostPort),
                env: args.env,
                volume: args.volume,
                network: args.network,
              },
              ({ container, url }) =>
                Effect.sync(() => {
                  io.out(chalk.green(`✓ Started ${container.id} from ${container.image}`))
                  io.out(`  ${url}`)
                }),
            ),
          (exited) => {
            const line = `Container exited with code ${exited.exitCode}`
            io.out(exited.exitCode === 0 ? line : chalk.yellow(line))
            return exited.exitCode
          },
        )
      },
    )
    .demandCommand(1, "Specify a command")
    .strict()
    .exitProcess(false)
    .fail((msg, err) => {
      io.err(chalk.red(msg || (err instanceof Error ? err.message : "Invalid arguments")))
      exitCode = EXIT_USAGE
    })
    .help()
    .parseAsync()

  return exitCode
}
