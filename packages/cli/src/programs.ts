import { resolve } from "node:path"
import { Effect, Option } from "effect"
import {
  ImageValidationError,
  buildAndLaunch,
  build,
  defaultRecipe,
  endpoint,
  inspectImage,
  launch,
  parseBaseRuntimeRef,
  waitForExit,
  type ContainerInfo,
  type ContainerLauncher,
  type ExitedState,
  type ImageBuilder,
  type ImageError,
  type ImageInfo,
  type InstallVariant,
  type LaunchOptions,
} from "@agent-image/core"

export interface RecipeArgs {
  variant: InstallVariant
  base?: string
}

export interface BuildArgs extends RecipeArgs {
  context: string
  tag: string
}

export interface LaunchArgs {
  name?: string
  hostPort?: number
  env?: ReadonlyArray<string>
  volume?: ReadonlyArray<string>
  network?: string
}

/**
 * Split `KEY<sep>VALUE` pairs into a record; the first separator wins.
 */
export const parsePairs = (
  values: ReadonlyArray<string>,
  sep: string,
  what: string,
): Effect.Effect<Record<string, string>, ImageValidationError> => {
  const pairs: Record<string, string> = {}
  for (const value of values) {
    const at = value.indexOf(sep)
    if (at <= 0) {
      return Effect.fail(new ImageValidationError({ message: `Expected ${what} as a${sep}b, got: "${value}"` }))
    }
    pairs[value.slice(0, at)] = value.slice(at + sep.length)
  }
  return Effect.succeed(pairs)
}

export const recipeFor = (args: RecipeArgs) =>
  Effect.gen(function* () {
    const base = args.base === undefined ? undefined : yield* parseBaseRuntimeRef(args.base)
    return defaultRecipe({ installVariant: args.variant, base })
  })

export const launchOptionsFor = (args: LaunchArgs): Effect.Effect<LaunchOptions, ImageValidationError> =>
  Effect.gen(function* () {
    return {
      name: args.name,
      hostPort: args.hostPort,
      env: yield* parsePairs(args.env ?? [], "=", "--env"),
      volumes: yield* parsePairs(args.volume ?? [], ":", "--volume"),
      network: args.network,
    }
  })

const requestFor = (args: BuildArgs) =>
  Effect.map(recipeFor(args), (recipe) => ({ recipe, context: resolve(args.context), tag: args.tag }))

export const buildProgram = (args: BuildArgs): Effect.Effect<ImageInfo, ImageError, ImageBuilder> =>
  Effect.flatMap(requestFor(args), build)

export interface Started {
  readonly container: ContainerInfo
  readonly url: string
}

export const launchProgram = (
  tag: string,
  args: LaunchArgs,
): Effect.Effect<Started, ImageError, ImageBuilder | ContainerLauncher> =>
  Effect.gen(function* () {
    const options = yield* launchOptionsFor(args)
    const image = yield* inspectImage(tag)
    const container = yield* launch(image, options)
    return { container, url: yield* endpoint(container.id) }
  })

/**
 * Build, launch, then block until the single process exits. The container's
 * exit is the command's result; nothing is restarted.
 */
export const upProgram = (
  args: BuildArgs & LaunchArgs,
  onStarted: (started: Started) => Effect.Effect<void>,
): Effect.Effect<ExitedState, ImageError, ImageBuilder | ContainerLauncher> =>
  Effect.gen(function* () {
    const request = yield* requestFor(args)
    const options = yield* launchOptionsFor(args)
    const { container } = yield* buildAndLaunch(request, options)
    yield* onStarted({ container, url: yield* endpoint(container.id) })
    return yield* waitForExit(container.id)
  })

export const hostPortFrom = (flag: number | undefined, env: Option.Option<number>): number | undefined =>
  flag ?? Option.getOrUndefined(env)
