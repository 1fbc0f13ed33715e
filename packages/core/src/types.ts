/**
 * Foundation runtime an image starts from, e.g. `python:3.11-slim`.
 */
export interface BaseRuntimeRef {
  readonly name: string
  readonly tag: string
}

export interface CopyStep {
  /** Path inside the build context, "." for the whole tree */
  readonly source: string
  /** Absolute destination inside the image */
  readonly destination: string
}

export interface InstallStep {
  readonly cmd: string
  readonly args: ReadonlyArray<string>
}

/**
 * Which install configuration the build uses.
 *
 * - `package`: install the application tree only.
 * - `package+inmem-cli`: also install the graph server CLI with its in-memory extra.
 */
export type InstallVariant = "package" | "package+inmem-cli"

/**
 * `[interpreter, scriptPath]`, run with no further arguments.
 */
export type EntryCommand = readonly [interpreter: string, scriptPath: string]

/**
 * Ordered description of how an image is built and how its single process starts.
 */
export interface ImageRecipe {
  readonly base: BaseRuntimeRef
  readonly copy: CopyStep
  readonly workdir: string
  readonly install: ReadonlyArray<InstallStep>
  readonly exposedPort: number
  readonly entryCommand: EntryCommand
}

/**
 * Process-wide configuration fixed at build time and attached to the image.
 */
export interface RuntimeConfig {
  readonly exposedPort: number
  readonly entryCommand: EntryCommand
  readonly workdir: string
}

export type ManifestKind = "pyproject.toml" | "setup.py" | "setup.cfg"

export interface InstalledPackage {
  readonly name: string
  readonly version: string
  /** Manifest file the identity was read from */
  readonly manifest: ManifestKind
}

export interface BuildRequest {
  readonly recipe: ImageRecipe
  /** Root of the application source tree (the build context) */
  readonly context: string
  /** Tag to give the built image */
  readonly tag: string
}

export interface ImageInfo {
  /** Engine-assigned image ID */
  readonly id: string
  readonly tag: string
  readonly base: BaseRuntimeRef
  readonly config: RuntimeConfig
  readonly installedPackage: InstalledPackage
  readonly createdAt: string
}

export type ContainerState =
  | { readonly _tag: "NotStarted" }
  | { readonly _tag: "Running"; readonly startedAt: string }
  | { readonly _tag: "Exited"; readonly exitCode: number; readonly finishedAt: string }

export interface LaunchOptions {
  /** Container name */
  name?: string
  /**
   * Host port to publish the exposed port on.
   * @default the exposed port itself; 0 lets the engine pick one
   */
  hostPort?: number
  /** Environment variables for the process */
  env?: Record<string, string>
  /** Bind mounts: { hostPath: containerPath } */
  volumes?: Record<string, string>
  /** Network to attach the container to */
  network?: string
}

export interface ContainerInfo {
  readonly id: string
  readonly name?: string
  /** Tag of the image the container runs */
  readonly image: string
  readonly engine: string
  readonly state: ContainerState
  /** Published ports: { containerPort: hostPort } */
  readonly ports: Readonly<Record<number, number>>
}

export interface ContainerLogs {
  readonly stdout: string
  readonly stderr: string
}

export type ExitedState = Extract<ContainerState, { readonly _tag: "Exited" }>
