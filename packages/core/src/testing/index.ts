/**
 * Testing utilities: an in-memory engine behind the builder and launcher
 * services, and a fixed clock.
 *
 * @example
 * ```ts
 * import { MockRuntimeLive, TestClockLayer } from "@agent-image/core/testing"
 * ```
 */

export { makeTestClock, TestClockLayer } from "./test-services"

export {
  MockEngine,
  MockEngineLive,
  MockImageBuilderLive,
  MockContainerLauncherLive,
  MockRuntimeLive,
  type MockBuildStep,
  type MockContainer,
  type MockEngineConfig,
  type MockEngineState,
  type MockImage,
  type MockScriptBehavior,
} from "./mock-runtime"
