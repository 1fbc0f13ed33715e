import { Context, Effect } from "effect"
import type { ImageError } from "./errors"
import type { ContainerInfo, ContainerLogs, ContainerState, ExitedState, ImageInfo, LaunchOptions } from "./types"

/**
 * Starts exactly one process from a built image and reports its lifecycle:
 * NotStarted → Running → Exited. There is no restart or health checking;
 * the container lives as long as its process.
 */
export interface ContainerLauncherService {
  /**
   * Start the image's entry command in its working directory with the exposed
   * port published. Returns once the process has started.
   */
  readonly launch: (image: ImageInfo, options?: LaunchOptions) => Effect.Effect<ContainerInfo, ImageError>

  readonly state: (id: string) => Effect.Effect<ContainerState, ImageError>

  /**
   * Wait for the process to exit.
   */
  readonly wait: (id: string) => Effect.Effect<ExitedState, ImageError>

  /**
   * Terminate the process and remove the container.
   */
  readonly stop: (id: string) => Effect.Effect<void, ImageError>

  /**
   * URL of the published port. A URL does not mean anything is listening.
   */
  readonly endpoint: (id: string) => Effect.Effect<string, ImageError>

  readonly logs: (id: string) => Effect.Effect<ContainerLogs, ImageError>
}

export class ContainerLauncher extends Context.Tag("ContainerLauncher")<
  ContainerLauncher,
  ContainerLauncherService
>() {}

export const launch = (
  image: ImageInfo,
  options?: LaunchOptions,
): Effect.Effect<ContainerInfo, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.launch(image, options))

export const containerState = (id: string): Effect.Effect<ContainerState, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.state(id))

export const waitForExit = (
  id: string,
): Effect.Effect<ExitedState, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.wait(id))

export const stopContainer = (id: string): Effect.Effect<void, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.stop(id))

export const endpoint = (id: string): Effect.Effect<string, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.endpoint(id))

export const containerLogs = (id: string): Effect.Effect<ContainerLogs, ImageError, ContainerLauncher> =>
  Effect.flatMap(ContainerLauncher, (svc) => svc.logs(id))
