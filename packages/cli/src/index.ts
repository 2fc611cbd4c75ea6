export { DEFAULT_SCENECAST_CONFIG, parseCliConfig, renderHelpText } from "./config.js";
export type { GenerateMode, ParsedCliConfig, ScenecastConfig } from "./config.js";
export { EXIT_STALE, defaultIo, runScenecastCli } from "./scenecastCli.js";
export type { CliIo } from "./scenecastCli.js";
export { hashGeneratedBody, renderSummary } from "./hash.js";
export type { RunSummary } from "./hash.js";
