import { describe, expect, it } from "vitest"
import { Effect, Either } from "effect"
import { ContainerLauncher, type ContainerLauncherService, type ImageInfo } from "@agent-image/core"
import { DockerRuntimeLive, labelsFor, type DockerConfig } from "../index"
import { failed, fakeRunner, imageInspectJson, ok, type FakeResponse } from "./fake-runner"

const image: ImageInfo = {
  id: "sha256:abc123",
  tag: "agent:dev",
  base: { name: "python", tag: "3.11-slim" },
  config: { exposedPort: 2024, entryCommand: ["python", "/app/src/launch.py"], workdir: "/app" },
  installedPackage: { name: "agent", version: "1.2.0", manifest: "pyproject.toml" },
  createdAt: "2024-01-15T10:00:00Z",
}

const imageLabels = Object.fromEntries(
  labelsFor(image).map((label): [string, string] => {
    const eq = label.indexOf("=")
    return [label.slice(0, eq), label.slice(eq + 1)]
  }),
)

const CONTAINER_ID = "0123456789abcdef0123"

const stateJson = (Status: string, ExitCode = 0) =>
  JSON.stringify({ Status, ExitCode, StartedAt: "2024-01-15T10:00:01Z", FinishedAt: "2024-01-15T10:05:00Z" })

/**
 * Docker holding `image`, where `docker run` starts one container.
 */
const runningDocker = (overrides: (args: string[]) => FakeResponse | undefined = () => undefined) =>
  fakeRunner((args) => {
    const override = overrides(args)
    if (override !== undefined) return override
    if (args[0] === "image") return ok(imageInspectJson(image.id, imageLabels))
    if (args[0] === "run") return ok(`${CONTAINER_ID}\n`)
    if (args[0] === "inspect" && args[2] === "{{json .NetworkSettings.Ports}}") {
      return ok('{"2024/tcp":[{"HostIp":"0.0.0.0","HostPort":"8080"}],"2024/udp":null}\n')
    }
    if (args[0] === "inspect" && args[2] === "{{json .Config.Labels}}") return ok(`${JSON.stringify(imageLabels)}\n`)
    if (args[0] === "inspect") return ok(stateJson("running"))
    return ok("")
  })

const withLauncher = <A>(
  use: (launcher: ContainerLauncherService) => Effect.Effect<A, unknown>,
  docker: ReturnType<typeof runningDocker>,
  config: DockerConfig = {},
) =>
  Effect.runPromise(
    Effect.either(Effect.flatMap(ContainerLauncher, use).pipe(Effect.provide(DockerRuntimeLive(config, docker.layer)))),
  )

describe("DockerContainerLauncherLive.launch", () => {
  it("should run the image detached with the exposed port published", async () => {
    const docker = runningDocker()
    const result = await withLauncher(
      (launcher) =>
        launcher.launch(image, {
          name: "agent",
          hostPort: 8080,
          env: { LOG_LEVEL: "debug" },
          volumes: { "/data": "/app/data" },
        }),
      docker,
    )

    expect(docker.calls.find((call) => call.args[0] === "run")?.args).toEqual([
      "run",
      "--detach",
      "--publish",
      "8080:2024",
      "--name",
      "agent",
      "--env",
      "LOG_LEVEL=debug",
      "--volume",
      "/data:/app/data",
      "agent:dev",
    ])
    expect(Either.isRight(result)).toBe(true)
    if (Either.isRight(result)) {
      expect(result.right.id).toBe("0123456789ab")
      expect(result.right.ports).toEqual({ 2024: 8080 })
      expect(result.right.state._tag).toBe("Running")
      expect(result.right.engine).toBe("docker")
    }
  })

  it("should publish on the exposed port by default and join the configured network", async () => {
    const docker = runningDocker()
    await withLauncher((launcher) => launcher.launch(image), docker, { network: "agents" })

    expect(docker.calls.find((call) => call.args[0] === "run")?.args).toEqual([
      "run",
      "--detach",
      "--publish",
      "2024:2024",
      "--network",
      "agents",
      "agent:dev",
    ])
  })

  it("should refuse an image whose build did not complete", async () => {
    const docker = runningDocker((args) => (args[0] === "image" ? ok(imageInspectJson("sha256:stale", imageLabels)) : undefined))
    const result = await withLauncher((launcher) => launcher.launch(image), docker)

    expect(Either.isLeft(result)).toBe(true)
    expect(docker.calls.some((call) => call.args[0] === "run")).toBe(false)
  })

  it("should refuse a tag that docker does not know", async () => {
    const docker = runningDocker((args) => (args[0] === "image" ? failed("No such image: agent:dev") : undefined))
    const result = await withLauncher(
      (launcher) => Effect.mapError(launcher.launch(image), (err) => err._tag),
      docker,
    )

    expect(Either.isLeft(result) && result.left).toBe("ContainerLaunch")
  })

  it("should report docker run failures as launch failures", async () => {
    const docker = runningDocker((args) =>
      args[0] === "run" ? failed("docker: Error response from daemon: port is already allocated.", 125) : undefined,
    )
    const result = await withLauncher(
      (launcher) =>
        Effect.mapError(launcher.launch(image), (err) => (err._tag === "ContainerLaunch" ? err.message : err._tag)),
      docker,
    )

    expect(Either.isLeft(result) && result.left).toBe("docker: Error response from daemon: port is already allocated.")
  })

  it("should reject an out of range host port without calling docker", async () => {
    const docker = runningDocker()
    const result = await withLauncher(
      (launcher) => Effect.mapError(launcher.launch(image, { hostPort: -1 }), (err) => err._tag),
      docker,
    )

    expect(Either.isLeft(result) && result.left).toBe("ImageValidation")
    expect(docker.calls).toEqual([])
  })
})

describe("DockerContainerLauncherLive with a process that exits at once", () => {
  // Docker drops the port bindings of a stopped container.
  const exitedDocker = () =>
    runningDocker((args) => {
      if (args[2] === "{{json .NetworkSettings.Ports}}") return ok("{}\n")
      if (args[0] === "wait") return ok("2\n")
      if (args[0] === "inspect") return ok(stateJson("exited", 2))
      return undefined
    })

  it("should keep the requested binding and still report the exit", async () => {
    const docker = exitedDocker()
    const result = await withLauncher(
      (launcher) =>
        Effect.gen(function* () {
          const container = yield* launcher.launch(image)
          const url = yield* launcher.endpoint(container.id)
          const exited = yield* launcher.wait(container.id)
          return { ports: container.ports, url, exited }
        }),
      docker,
    )

    expect(Either.isRight(result) && result.right).toEqual({
      ports: { 2024: 2024 },
      url: "http://127.0.0.1:2024",
      exited: { _tag: "Exited", exitCode: 2, finishedAt: "2024-01-15T10:05:00Z" },
    })
  })

  it("should have no binding to report when docker chose the host port", async () => {
    const docker = exitedDocker()
    const result = await withLauncher(
      (launcher) =>
        Effect.gen(function* () {
          const container = yield* launcher.launch(image, { hostPort: 0 })
          const endpoint = yield* Effect.either(launcher.endpoint(container.id))
          return { ports: container.ports, endpoint: Either.isLeft(endpoint) ? endpoint.left._tag : endpoint.right }
        }),
      docker,
    )

    expect(Either.isRight(result) && result.right).toEqual({ ports: {}, endpoint: "ContainerLaunch" })
  })
})

describe("DockerContainerLauncherLive lifecycle", () => {
  it("should reuse published ports for the endpoint", async () => {
    const docker = runningDocker()
    const result = await withLauncher(
      (launcher) =>
        Effect.flatMap(launcher.launch(image, { hostPort: 8080 }), (container) => launcher.endpoint(container.id)),
      docker,
      { advertiseHost: "localhost" },
    )

    expect(Either.isRight(result) && result.right).toBe("http://localhost:8080")
    expect(docker.calls.filter((call) => call.args[0] === "inspect")).toHaveLength(1)
  })

  it("should look up ports for containers it did not start", async () => {
    const docker = runningDocker()
    const result = await withLauncher((launcher) => launcher.endpoint("feedface0000"), docker)

    expect(Either.isRight(result) && result.right).toBe("http://127.0.0.1:8080")
    expect(docker.calls.map((call) => call.args)).toEqual([
      ["inspect", "--format", "{{json .Config.Labels}}", "feedface0000"],
      ["inspect", "--format", "{{json .NetworkSettings.Ports}}", "feedface0000"],
    ])
  })

  it("should pick the exposed port among several published ones", async () => {
    const docker = runningDocker((args) =>
      args[2] === "{{json .NetworkSettings.Ports}}"
        ? ok('{"5678/tcp":[{"HostIp":"0.0.0.0","HostPort":"5678"}],"2024/tcp":[{"HostIp":"0.0.0.0","HostPort":"9000"}]}')
        : undefined,
    )
    const result = await withLauncher((launcher) => launcher.endpoint("feedface0000"), docker)

    expect(Either.isRight(result) && result.right).toBe("http://127.0.0.1:9000")
  })

  it("should not serve endpoints for containers without a recipe image", async () => {
    const docker = runningDocker((args) => (args[2] === "{{json .Config.Labels}}" ? ok("null") : undefined))
    const result = await withLauncher(
      (launcher) => Effect.mapError(launcher.endpoint("feedface0000"), (err) => err._tag),
      docker,
    )

    expect(Either.isLeft(result) && result.left).toBe("ImageNotFound")
  })

  it("should map docker states onto the lifecycle", async () => {
    const docker = runningDocker((args) => (args[0] === "inspect" ? ok(stateJson("created")) : undefined))
    const result = await withLauncher((launcher) => launcher.state("feedface0000"), docker)

    expect(Either.isRight(result) && result.right).toEqual({ _tag: "NotStarted" })
  })

  it("should wait for the process and report its exit code", async () => {
    const docker = runningDocker((args) => {
      if (args[0] === "wait") return ok("3\n")
      if (args[0] === "inspect") return ok(stateJson("exited", 3))
      return undefined
    })
    const result = await withLauncher((launcher) => launcher.wait("feedface0000"), docker)

    expect(Either.isRight(result) && result.right).toEqual({
      _tag: "Exited",
      exitCode: 3,
      finishedAt: "2024-01-15T10:05:00Z",
    })
  })

  it("should force-remove on stop", async () => {
    const docker = runningDocker()
    await withLauncher((launcher) => launcher.stop("feedface0000"), docker)

    expect(docker.calls.map((call) => call.args)).toEqual([["rm", "--force", "feedface0000"]])
  })

  it("should report stopping an unknown container as not found", async () => {
    const docker = runningDocker((args) =>
      args[0] === "rm" ? failed("Error response from daemon: No such container: feedface0000") : undefined,
    )
    const result = await withLauncher(
      (launcher) => Effect.mapError(launcher.stop("feedface0000"), (err) => (err._tag === "ImageNotFound" ? err.id : "")),
      docker,
    )

    expect(Either.isLeft(result) && result.left).toBe("feedface0000")
  })

  it("should return both output streams", async () => {
    const docker = runningDocker((args) =>
      args[0] === "logs" ? { stdout: "Server listening on 0.0.0.0:2024\n", stderr: "warning: debug mode\n" } : undefined,
    )
    const result = await withLauncher((launcher) => launcher.logs("feedface0000"), docker)

    expect(Either.isRight(result) && result.right).toEqual({
      stdout: "Server listening on 0.0.0.0:2024\n",
      stderr: "warning: debug mode\n",
    })
  })
})
