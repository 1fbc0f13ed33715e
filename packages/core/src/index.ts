// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────
export * from "./types"

// ─────────────────────────────────────────────────────────────────────────────
// Errors
// ─────────────────────────────────────────────────────────────────────────────
export * from "./errors"

// ─────────────────────────────────────────────────────────────────────────────
// Recipe & install manifest
// ─────────────────────────────────────────────────────────────────────────────
export {
  APP_DIR,
  DEFAULT_BASE_IMAGE,
  ENTRY_COMMAND,
  EXPOSED_PORT,
  defaultRecipe,
  formatBaseRuntimeRef,
  installStepsFor,
  parseBaseRuntimeRef,
  renderDockerfile,
  runtimeConfigOf,
  validateRecipe,
  type RecipeOptions,
} from "./recipe"
export { MANIFEST_FILES, findInstallManifest, parseInstallManifest, readPyProjectIdentity, type TreeReader } from "./manifest"

// ─────────────────────────────────────────────────────────────────────────────
// Services
// ─────────────────────────────────────────────────────────────────────────────
export {
  ImageBuilder,
  type ImageBuilderService,
  build,
  ensureImage,
  inspectImage,
  removeImage,
} from "./builder"
export {
  ContainerLauncher,
  type ContainerLauncherService,
  containerLogs,
  containerState,
  endpoint,
  launch,
  stopContainer,
  waitForExit,
} from "./launcher"

// ─────────────────────────────────────────────────────────────────────────────
// Pipeline
// ─────────────────────────────────────────────────────────────────────────────
export { acquireContainer, buildAndLaunch, withLaunchedContainer, type LaunchedImage } from "./pipeline"
