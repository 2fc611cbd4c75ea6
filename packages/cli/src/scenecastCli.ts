import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import {
  generateAnchorContainer,
  generateCollectionFactory,
  generateRootFactory,
  isGeneratorError,
  outputPathFor,
  stripTimestamp,
  type EmitOptions,
  type GeneratedSource,
} from "@scenecast/codegen";
import {
  SceneError,
  asSceneError,
  createSceneHost,
  loadSceneDocument,
  type Behavior,
  type LoadedScene,
  type SceneNode,
} from "@scenecast/scene";
import { parseCliConfig, renderHelpText, type ScenecastConfig } from "./config.js";
import { hashGeneratedBody, renderSummary } from "./hash.js";

export interface CliIo {
  writeStdout: (line: string) => void;
  writeStderr: (line: string) => void;
}

export const defaultIo: CliIo = {
  writeStdout: (line) => process.stdout.write(`${line}\n`),
  writeStderr: (line) => process.stderr.write(`${line}\n`),
};

export const EXIT_STALE = 3;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function formatFailure(error: unknown): string {
  if (isGeneratorError(error)) return error.format();
  return asSceneError(error, "Generation failed.").format();
}

function requireNodes(loaded: LoadedScene, ids: readonly string[]): SceneNode[] {
  return ids.map((id) => {
    const node = loaded.nodesById.get(id);
    if (!node) {
      throw new SceneError("SC_ERR_UNKNOWN_NODE", `Unknown node id "${id}".`);
    }
    return node;
  });
}

function generate(loaded: LoadedScene, config: ScenecastConfig, now: () => Date): GeneratedSource {
  const supported = new Set(config.supported ?? loaded.types.keys());
  const expand = new Set(config.expand);
  const roots = requireNodes(loaded, config.roots);
  const warnings = [...supported]
    .filter((typeName) => !loaded.types.has(typeName))
    .map((typeName) => `Behavior type "${typeName}" is not declared in the scene document`);

  const options: EmitOptions<SceneNode, Behavior> = {
    outputName: config.outputName,
    behaviorModule: config.behaviorModule,
    runtimeModule: config.runtimeModule,
    timestamp: config.timestamp ? now() : null,
    emptyStrings: config.emptyStrings,
    floatPrecision: config.floatPrecision,
    anchorBoundaries: requireNodes(loaded, config.anchors),
    isSupported: (behavior) => supported.has(behavior.behaviorType.typeName),
    expandBehavior: (behavior) => expand.has(behavior.behaviorType.typeName),
  };

  const host = createSceneHost(loaded.scene);
  const [firstRoot] = roots;
  let generated: GeneratedSource;
  if (config.mode === "collection") {
    generated = generateCollectionFactory(host, roots, options);
  } else if (!firstRoot) {
    throw new SceneError("SC_ERR_UNKNOWN_NODE", "No root node was given.");
  } else if (config.mode === "anchors") {
    generated = generateAnchorContainer(host, firstRoot, options);
  } else {
    generated = generateRootFactory(host, firstRoot, options);
  }
  return { ...generated, warnings: [...warnings, ...generated.warnings] };
}

async function readExisting(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") return null;
    throw error;
  }
}

export async function runScenecastCli(
  argv: string[],
  io: CliIo = defaultIo,
  now: () => Date = () => new Date(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<number> {
  if (argv.length === 0 || argv.includes("--help") || argv.includes("-h")) {
    io.writeStdout(renderHelpText());
    return 0;
  }

  const command = argv[0];
  if (command !== "generate") {
    io.writeStderr(`Unknown command "${command ?? ""}".`);
    io.writeStdout(renderHelpText());
    return 1;
  }

  const parsed = parseCliConfig(argv.slice(1), env);
  if (parsed.error) {
    io.writeStderr(parsed.error);
    io.writeStdout(renderHelpText());
    return 1;
  }
  const { config } = parsed;

  let json: string;
  try {
    json = await readFile(config.inPath, "utf8");
  } catch (error) {
    io.writeStderr(`SC_ERR_READ_INPUT: Failed to read scene document: ${errorMessage(error)}`);
    return 1;
  }

  let generated: GeneratedSource;
  let outPath: string;
  try {
    generated = generate(loadSceneDocument(json), config, now);
    outPath = outputPathFor(config.outputDir, config.outputName);
  } catch (error) {
    io.writeStderr(formatFailure(error));
    return 1;
  }

  let ok = true;
  if (config.check) {
    let existing: string | null;
    try {
      existing = await readExisting(outPath);
    } catch (error) {
      io.writeStderr(`SC_ERR_READ_OUTPUT: Failed to read ${outPath}: ${errorMessage(error)}`);
      return 1;
    }
    ok = existing !== null && stripTimestamp(existing) === stripTimestamp(generated.code);
  } else {
    try {
      await mkdir(dirname(outPath), { recursive: true });
      await writeFile(outPath, generated.code, "utf8");
    } catch (error) {
      io.writeStderr(`SC_ERR_WRITE_OUTPUT: Failed to write ${outPath}: ${errorMessage(error)}`);
      return 1;
    }
  }

  for (const warning of generated.warnings) {
    io.writeStderr(`warning: ${warning}`);
  }
  io.writeStdout(
    renderSummary({
      ok,
      outPath,
      mode: config.mode,
      warnings: generated.warnings,
      bodyHash: hashGeneratedBody(generated.code),
    }),
  );

  if (!ok) {
    io.writeStderr(`SC_ERR_STALE_OUTPUT: ${outPath} is missing or out of date.`);
    return EXIT_STALE;
  }
  return 0;
}
