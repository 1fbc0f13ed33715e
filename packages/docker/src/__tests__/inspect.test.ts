import { describe, expect, it } from "vitest"
import { Effect, Either } from "effect"
import { parseContainerState, parseImageInspect, parsePortBindings } from "../inspect"
import { imageInspectJson } from "./fake-runner"

const context = { engine: "docker" }

const state = (Status: string, ExitCode = 0) =>
  JSON.stringify({ Status, ExitCode, StartedAt: "2024-01-15T10:00:01Z", FinishedAt: "2024-01-15T10:05:00Z" })

describe("parseContainerState", () => {
  it.each([
    ["created", { _tag: "NotStarted" }],
    ["running", { _tag: "Running", startedAt: "2024-01-15T10:00:01Z" }],
    ["paused", { _tag: "Running", startedAt: "2024-01-15T10:00:01Z" }],
    ["exited", { _tag: "Exited", exitCode: 1, finishedAt: "2024-01-15T10:05:00Z" }],
    ["dead", { _tag: "Exited", exitCode: 1, finishedAt: "2024-01-15T10:05:00Z" }],
  ])("should map %s", (status, expected) => {
    expect(Effect.runSync(parseContainerState(state(status, 1), context))).toEqual(expected)
  })
})

describe("parsePortBindings", () => {
  it("should keep published ports only", () => {
    const json = '{"2024/tcp":[{"HostIp":"0.0.0.0","HostPort":"49153"},{"HostIp":"::","HostPort":"49153"}],"8000/tcp":null}'

    expect(Effect.runSync(parsePortBindings(json, context))).toEqual({ 2024: 49153 })
  })

  it("should accept a container without a network", () => {
    expect(Effect.runSync(parsePortBindings("null", context))).toEqual({})
  })
})

describe("parseImageInspect", () => {
  it("should reject labels that are not valid JSON", () => {
    const json = imageInspectJson("sha256:abc", {
      "agent-image.base": "python:3.11-slim",
      "agent-image.package": "{broken",
      "agent-image.runtime": "{}",
    })
    const result = Effect.runSync(Effect.either(parseImageInspect(json, "agent:dev", context)))

    expect(Either.isLeft(result) && result.left._tag === "ImageProvider" && result.left.message).toBe(
      "Unexpected package label from docker",
    )
  })
})
