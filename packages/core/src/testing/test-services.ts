import { Effect, Clock, Layer, Duration } from "effect"

/**
 * Clock service pinned to a fixed time, so timestamps and generated IDs in
 * tests are deterministic.
 *
 * @example
 * ```ts
 * const fixedTime = Date.parse("2024-01-15T10:00:00Z")
 * Effect.runPromise(Effect.withClock(makeTestClock(fixedTime))(program))
 * ```
 */
export const makeTestClock = (timeMs: number): Clock.Clock => ({
  currentTimeMillis: Effect.succeed(timeMs),
  currentTimeNanos: Effect.succeed(BigInt(timeMs * 1_000_000)),
  sleep: (_duration: Duration.Duration) => Effect.void,
  unsafeCurrentTimeMillis: () => timeMs,
  unsafeCurrentTimeNanos: () => BigInt(timeMs * 1_000_000),
  [Clock.ClockTypeId]: Clock.ClockTypeId,
})

export const TestClockLayer = (timeMs: number) => Layer.setClock(makeTestClock(timeMs))
