import { resolve } from "node:path";
import type { EmptyStringPolicy, FloatPrecision } from "@scenecast/codegen";

export type GenerateMode = "root" | "collection" | "anchors";

const MODES: readonly GenerateMode[] = ["root", "collection", "anchors"];

export interface ScenecastConfig {
  inPath: string;
  outputName: string;
  /** Node ids of the roots to rebuild, in output order. */
  roots: string[];
  mode: GenerateMode;
  /** Node ids of pre-built containers whose descendants are looked up, not rebuilt. */
  anchors: string[];
  outputDir: string;
  /** `null` supports every behavior type the document declares. */
  supported: string[] | null;
  expand: string[];
  behaviorModule: string;
  runtimeModule: string;
  emptyStrings: EmptyStringPolicy;
  floatPrecision: FloatPrecision;
  timestamp: boolean;
  check: boolean;
}

export interface ParsedCliConfig {
  config: ScenecastConfig;
  error?: string;
}

export const DEFAULT_SCENECAST_CONFIG: ScenecastConfig = {
  inPath: "",
  outputName: "",
  roots: [],
  mode: "root",
  anchors: [],
  outputDir: resolve(process.cwd(), "generated"),
  supported: null,
  expand: [],
  behaviorModule: "./behaviors.js",
  runtimeModule: "@scenecast/scene",
  emptyStrings: "skip",
  floatPrecision: "double",
  timestamp: true,
  check: false,
};

function parseList(value: string): string[] {
  return value
    .split(",")
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

function isMode(value: string): value is GenerateMode {
  return MODES.some((mode) => mode === value);
}

const VALUE_FLAGS = new Set([
  "--in",
  "--name",
  "--root",
  "--mode",
  "--anchor",
  "--out",
  "--supported",
  "--expand",
  "--behavior-module",
  "--runtime-module",
]);

export function parseCliConfig(argv: string[], env: NodeJS.ProcessEnv = process.env): ParsedCliConfig {
  const config: ScenecastConfig = {
    ...DEFAULT_SCENECAST_CONFIG,
    roots: [],
    anchors: [],
    expand: [],
  };

  if (env.SCENECAST_OUTPUT_DIR) config.outputDir = resolve(env.SCENECAST_OUTPUT_DIR);
  if (env.SCENECAST_BEHAVIOR_MODULE) config.behaviorModule = env.SCENECAST_BEHAVIOR_MODULE;
  if (env.SCENECAST_RUNTIME_MODULE) config.runtimeModule = env.SCENECAST_RUNTIME_MODULE;
  if (env.SCENECAST_NO_TIMESTAMP === "1") config.timestamp = false;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === "--") {
      continue;
    }
    if (arg === "--help" || arg === "-h") {
      return {
        config,
        error: "help",
      };
    }
    if (arg === "--keep-empty-strings") {
      config.emptyStrings = "compare";
      continue;
    }
    if (arg === "--single-precision") {
      config.floatPrecision = "single";
      continue;
    }
    if (arg === "--no-timestamp") {
      config.timestamp = false;
      continue;
    }
    if (arg === "--check") {
      config.check = true;
      continue;
    }
    if (arg === undefined || !VALUE_FLAGS.has(arg)) {
      return {
        config,
        error: `Unknown flag "${arg ?? ""}".`,
      };
    }

    const value = argv[index + 1];
    if (!value) {
      return {
        config,
        error: `${arg} requires a value.`,
      };
    }
    index += 1;

    switch (arg) {
      case "--in":
        config.inPath = resolve(value);
        break;
      case "--name":
        config.outputName = value;
        break;
      case "--root":
        config.roots.push(value);
        break;
      case "--mode":
        if (!isMode(value)) {
          return {
            config,
            error: `Invalid --mode value "${value}". Expected one of ${MODES.join(", ")}.`,
          };
        }
        config.mode = value;
        break;
      case "--anchor":
        config.anchors.push(value);
        break;
      case "--out":
        config.outputDir = resolve(value);
        break;
      case "--supported":
        config.supported = parseList(value);
        break;
      case "--expand":
        config.expand = parseList(value);
        break;
      case "--behavior-module":
        config.behaviorModule = value;
        break;
      case "--runtime-module":
        config.runtimeModule = value;
        break;
    }
  }

  if (!config.inPath) return { config, error: "--in is required." };
  if (!config.outputName) return { config, error: "--name is required." };
  if (config.roots.length === 0) return { config, error: "--root is required." };
  if (config.mode !== "collection" && config.roots.length > 1) {
    return {
      config,
      error: `--mode ${config.mode} takes exactly one --root.`,
    };
  }
  if (config.mode === "anchors" && config.anchors.length > 0) {
    return {
      config,
      error: "--anchor cannot be combined with --mode anchors.",
    };
  }

  return { config };
}

export function renderHelpText() {
  return [
    "scenecast",
    "",
    "Usage:",
    "  scenecast generate --in ./scene.json --name HandLayout --root hand",
    "  scenecast generate --in ./scene.json --name Sites --mode collection --root siteA --root siteB",
    "  scenecast generate --in ./scene.json --name CanvasAnchors --mode anchors --root canvas",
    "",
    "Command: generate",
    "  --in <path>              Scene document to read (required).",
    "  --name <Name>            Output module name; writes <Name>.ts (required).",
    "  --root <id>              Node id to rebuild; repeat for --mode collection.",
    "  --mode <mode>            root (default), collection or anchors.",
    "  --anchor <id>            Container node whose descendants are looked up by path.",
    "  --out <dir>              Output directory (default: ./generated, env SCENECAST_OUTPUT_DIR).",
    "  --supported <A,B>        Behavior types to rebuild (default: every declared type).",
    "  --expand <A,B>           Referenced behavior types whose fields are also emitted.",
    "  --behavior-module <spec> Import specifier for behavior types (env SCENECAST_BEHAVIOR_MODULE).",
    "  --runtime-module <spec>  Import specifier for the scene runtime (env SCENECAST_RUNTIME_MODULE).",
    "  --keep-empty-strings     Emit empty strings that differ from the default.",
    "  --single-precision       Print floats as their shortest 32-bit form.",
    "  --no-timestamp           Omit the generation time (env SCENECAST_NO_TIMESTAMP=1).",
    "  --check                  Exit 3 when the existing output is out of date; write nothing.",
    "  -h, --help               Show help.",
  ].join("\n");
}
