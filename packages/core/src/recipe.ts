import { Effect } from "effect"
import { ImageValidationError, type ImageErrorContext } from "./errors"
import type {
  BaseRuntimeRef,
  EntryCommand,
  ImageRecipe,
  InstallStep,
  InstallVariant,
  RuntimeConfig,
} from "./types"

export const DEFAULT_BASE_IMAGE = "python:3.11-slim"
export const APP_DIR = "/app"
export const EXPOSED_PORT = 2024
export const ENTRY_COMMAND: EntryCommand = ["python", "/app/src/launch.py"]

const PACKAGE_INSTALL: InstallStep = { cmd: "pip", args: ["install", "."] }
const INMEM_CLI_INSTALL: InstallStep = { cmd: "pip", args: ["install", "-U", "langgraph-cli[inmem]"] }

/**
 * Parse `name[:tag]` into a base runtime reference. A missing tag means `latest`.
 * A colon before the last slash belongs to a registry host (`host:5000/img:tag`).
 */
export const parseBaseRuntimeRef = (
  ref: string,
  context?: ImageErrorContext,
): Effect.Effect<BaseRuntimeRef, ImageValidationError> => {
  const fail = (message: string) => Effect.fail(new ImageValidationError({ message, context }))

  if (ref.trim().length === 0) {
    return fail("Base image reference cannot be empty")
  }
  if (/\s/.test(ref)) {
    return fail(`Base image reference cannot contain whitespace, got: "${ref}"`)
  }

  const lastSlash = ref.lastIndexOf("/")
  const tail = ref.slice(lastSlash + 1)
  const parts = tail.split(":")
  if (parts.length > 2) {
    return fail(`Base image reference has more than one tag separator: "${ref}"`)
  }

  const [repo = "", tag] = parts
  const name = ref.slice(0, lastSlash + 1) + repo
  if (repo.length === 0) {
    return fail(`Base image reference has no name: "${ref}"`)
  }
  if (tag !== undefined && tag.length === 0) {
    return fail(`Base image reference has an empty tag: "${ref}"`)
  }

  return Effect.succeed({ name, tag: tag ?? "latest" })
}

export const formatBaseRuntimeRef = (base: BaseRuntimeRef): string => `${base.name}:${base.tag}`

export const installStepsFor = (variant: InstallVariant): ReadonlyArray<InstallStep> => {
  switch (variant) {
    case "package":
      return [PACKAGE_INSTALL]
    case "package+inmem-cli":
      return [PACKAGE_INSTALL, INMEM_CLI_INSTALL]
  }
}

export interface RecipeOptions {
  /** @default "package" */
  installVariant?: InstallVariant
  /** @default { name: "python", tag: "3.11-slim" } */
  base?: BaseRuntimeRef
}

/**
 * The image recipe: base runtime, application copied to /app, package
 * install, port 2024 and the launch script as the only process.
 */
export const defaultRecipe = (options: RecipeOptions = {}): ImageRecipe => ({
  base: options.base ?? { name: "python", tag: "3.11-slim" },
  copy: { source: ".", destination: APP_DIR },
  workdir: APP_DIR,
  install: installStepsFor(options.installVariant ?? "package"),
  exposedPort: EXPOSED_PORT,
  entryCommand: ENTRY_COMMAND,
})

const isAbsolute = (path: string) => path.startsWith("/")

/**
 * Check a recipe before any build step runs.
 */
export const validateRecipe = (
  recipe: ImageRecipe,
  context?: ImageErrorContext,
): Effect.Effect<ImageRecipe, ImageValidationError> => {
  const errors: string[] = []

  if (recipe.base.name.trim().length === 0 || recipe.base.tag.trim().length === 0) {
    errors.push("Base image needs a name and a tag")
  }
  if (!isAbsolute(recipe.copy.destination)) {
    errors.push(`Copy destination must be absolute, got: ${recipe.copy.destination}`)
  }
  if (!isAbsolute(recipe.workdir)) {
    errors.push(`Working directory must be absolute, got: ${recipe.workdir}`)
  }
  if (recipe.install.length === 0) {
    errors.push("At least one install step is required")
  }
  for (const step of recipe.install) {
    if (step.cmd.trim().length === 0) {
      errors.push("Install step command cannot be empty")
      break
    }
  }
  if (!Number.isInteger(recipe.exposedPort) || recipe.exposedPort < 1 || recipe.exposedPort > 65535) {
    errors.push(`Port must be an integer between 1 and 65535, got: ${recipe.exposedPort}`)
  }
  if (recipe.entryCommand.length !== 2) {
    errors.push(`Entry command must be [interpreter, scriptPath], got ${recipe.entryCommand.length} elements`)
  } else {
    const [interpreter, script] = recipe.entryCommand
    if (interpreter.trim().length === 0) errors.push("Entry command interpreter cannot be empty")
    if (!isAbsolute(script)) errors.push(`Entry script path must be absolute, got: ${script}`)
  }

  if (errors.length > 0) {
    return Effect.fail(new ImageValidationError({ message: errors.join("; "), context }))
  }
  return Effect.succeed(recipe)
}

/**
 * The runtime contract of a recipe as a frozen record.
 */
export const runtimeConfigOf = (recipe: ImageRecipe): RuntimeConfig =>
  Object.freeze({
    exposedPort: recipe.exposedPort,
    entryCommand: Object.freeze([recipe.entryCommand[0], recipe.entryCommand[1]] as const),
    workdir: recipe.workdir,
  })

// Characters that make a shell-form RUN argument need quoting.
const SHELL_SPECIAL = /[\s"'`$\\[\]*?!;&|<>(){}#~]/

const quoteArg = (arg: string) =>
  SHELL_SPECIAL.test(arg) ? `"${arg.replace(/(["\\$`])/g, "\\$1")}"` : arg

/**
 * Render the recipe as a Dockerfile. The entry command uses exec form so the
 * launch script is the container's only process.
 */
export const renderDockerfile = (recipe: ImageRecipe): string => {
  const lines = [
    `FROM ${formatBaseRuntimeRef(recipe.base)}`,
    "",
    `COPY ${recipe.copy.source} ${recipe.copy.destination}`,
    `WORKDIR ${recipe.workdir}`,
    "",
    ...recipe.install.map((step) => `RUN ${[step.cmd, ...step.args].map(quoteArg).join(" ")}`),
    "",
    `EXPOSE ${recipe.exposedPort}`,
    "",
    `CMD ${JSON.stringify(recipe.entryCommand)}`,
  ]
  return lines.join("\n") + "\n"
}
