import { join } from "node:path";
import { collectAnchoredDescendants } from "./anchors.js";
import { GeneratorError } from "./errors.js";
import type { SceneHost } from "./host.js";
import { renderImport } from "./imports.js";
import { formatString } from "./literals.js";
import { SourceBuilder } from "./sourceBuilder.js";
import {
  ANCHORS_PARAMETER,
  CREATED_OBJECTS_PARAMETER,
  createGraphWalker,
  type GraphWalker,
  type WalkerOptions,
} from "./walker.js";

export const GENERATED_BANNER = "// AUTO-GENERATED CODE - DO NOT EDIT";
export const DEFAULT_RUNTIME_MODULE = "@scenecast/scene";

const SOURCE_PREFIX = "// Generated from: ";
const TIMESTAMP_PREFIX = "// Generated at: ";
const HEADER_LINES = 3;
const OUTPUT_NAME = /^[A-Za-z_$][\w$]*$/;

export interface EmitOptions<TNode, TBehavior>
  extends Omit<WalkerOptions<TNode, TBehavior>, "createdObjectsParameter" | "anchorsParameter"> {
  /** Module name; the file is written as `<outputName>.ts`. */
  outputName: string;
  /** Module specifier the behavior and enum types are imported from. */
  behaviorModule: string;
  runtimeModule?: string;
  /** Provenance line; defaults to the first root's name. */
  sourceName?: string;
  /** Suggested variable name for the root; defaults to the root's name. */
  rootName?: string;
  /** `null` omits the timestamp line; `undefined` stamps the current time. */
  timestamp?: Date | null;
}

export interface GeneratedSource {
  fileName: string;
  code: string;
  warnings: string[];
}

function pad2(value: number): string {
  return value.toString().padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function outputFileName(outputName: string): string {
  if (!OUTPUT_NAME.test(outputName)) {
    throw new GeneratorError("SC_ERR_INVALID_OUTPUT_NAME", `Output name "${outputName}" is not a valid identifier.`);
  }
  return `${outputName}.ts`;
}

export function outputPathFor(outputDir: string, outputName: string): string {
  return join(outputDir, outputFileName(outputName));
}

/** Drops the timestamp line so two runs over the same graph compare equal. */
export function stripTimestamp(code: string): string {
  return code
    .split("\n")
    .filter((line, index) => !(index < HEADER_LINES && line.startsWith(TIMESTAMP_PREFIX)))
    .join("\n");
}

function toWalkerOptions<TNode, TBehavior>(
  options: EmitOptions<TNode, TBehavior>,
  anchorBoundaries: Iterable<TNode> | undefined,
): WalkerOptions<TNode, TBehavior> {
  return {
    isSupported: options.isSupported,
    expandBehavior: options.expandBehavior,
    anchorBoundaries,
    createdObjectsParameter: CREATED_OBJECTS_PARAMETER,
    anchorsParameter: ANCHORS_PARAMETER,
    skippedFields: options.skippedFields,
    reservedPrefixes: options.reservedPrefixes,
    emptyStrings: options.emptyStrings,
    floatPrecision: options.floatPrecision,
    onWarning: options.onWarning,
  };
}

function factorySignature<TNode>(walker: GraphWalker<TNode>, returnType: string, acceptsAnchors: boolean): string {
  walker.imports.useRuntime("SceneNode", "type");
  const parameters = [`${CREATED_OBJECTS_PARAMETER}: SceneNode[]`];
  if (acceptsAnchors) {
    walker.imports.useRuntime("AnchorContainer", "type");
    parameters.push(`${ANCHORS_PARAMETER}?: AnchorContainer | null`);
  }
  return `export function create(${parameters.join(", ")}): ${returnType}`;
}

function renderModule<TNode, TBehavior>(
  options: EmitOptions<TNode, TBehavior>,
  walker: GraphWalker<TNode>,
  sourceName: string,
  signature: string,
  body: SourceBuilder,
): string {
  const file = new SourceBuilder();
  file.statement(GENERATED_BANNER);
  file.statement(`${SOURCE_PREFIX}${sourceName.replace(/[\r\n]+/g, " ")}`);
  if (options.timestamp !== null) {
    file.statement(`${TIMESTAMP_PREFIX}${formatTimestamp(options.timestamp ?? new Date())}`);
  }
  file.blankLine();

  const imports = [
    renderImport(walker.imports.runtimeSymbols(), options.runtimeModule ?? DEFAULT_RUNTIME_MODULE),
    renderImport(walker.imports.behaviorModuleSymbols(), options.behaviorModule),
  ];
  for (const line of imports) {
    if (line !== null) file.statement(line);
  }
  file.blankLine();

  file.openBlock(signature);
  file.append(body);
  file.closeBlock();
  return file.toString();
}

/** Module whose `create` rebuilds `root` and returns its primary handle. */
export function generateRootFactory<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  root: TNode,
  options: EmitOptions<TNode, TBehavior>,
): GeneratedSource {
  const fileName = outputFileName(options.outputName);
  const body = new SourceBuilder();
  const walker = createGraphWalker(host, body, toWalkerOptions(options, options.anchorBoundaries));

  const handle = walker.emitNode(root, options.rootName ?? host.nodeName(root), true);
  body.blankLine();
  body.statement(`return ${handle};`);

  const signature = factorySignature(walker, walker.primaryTypeName(root) ?? "SceneNode", true);
  return {
    fileName,
    code: renderModule(options, walker, options.sourceName ?? host.nodeName(root), signature, body),
    warnings: [...walker.warnings],
  };
}

/** Module whose `create` rebuilds every root and returns their handles in order. */
export function generateCollectionFactory<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  roots: readonly TNode[],
  options: EmitOptions<TNode, TBehavior>,
): GeneratedSource {
  if (roots.length === 0) {
    throw new GeneratorError("SC_ERR_NO_ROOTS", "A collection needs at least one root.");
  }
  const fileName = outputFileName(options.outputName);
  const body = new SourceBuilder();
  const walker = createGraphWalker(host, body, toWalkerOptions(options, options.anchorBoundaries));
  const resultVar = walker.names.allocate("result");

  const elementTypes = [...new Set(roots.map((root) => walker.primaryTypeName(root) ?? "SceneNode"))];
  const arrayType = elementTypes.length === 1 ? `${elementTypes.join(" | ")}[]` : `Array<${elementTypes.join(" | ")}>`;
  body.statement(`const ${resultVar}: ${arrayType} = [];`);
  body.blankLine();

  for (const root of roots) {
    const handle = walker.emitNode(root, host.nodeName(root), true);
    body.statement(`${resultVar}.push(${handle});`);
    body.blankLine();
  }
  body.statement(`return ${resultVar};`);

  const firstRoot = roots[0];
  const sourceName = options.sourceName ?? (firstRoot === undefined ? options.outputName : host.nodeName(firstRoot));
  const signature = factorySignature(walker, arrayType, true);
  return {
    fileName,
    code: renderModule(options, walker, sourceName, signature, body),
    warnings: [...walker.warnings],
  };
}

/**
 * Module that rebuilds a pre-built container and registers each descendant
 * under its anchor path, for other generated modules to look up. Containers
 * do not nest, so `anchorBoundaries` must be empty.
 */
export function generateAnchorContainer<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  boundary: TNode,
  options: EmitOptions<TNode, TBehavior>,
): GeneratedSource {
  const [nested] = options.anchorBoundaries ?? [];
  if (nested !== undefined) {
    throw new GeneratorError(
      "SC_ERR_NESTED_ANCHORS",
      `Anchor container "${host.nodeName(boundary)}" cannot look up anchors in "${host.nodeName(nested)}".`,
    );
  }
  const fileName = outputFileName(options.outputName);
  const body = new SourceBuilder();
  const walker = createGraphWalker(host, body, toWalkerOptions(options, undefined));
  const resultVar = walker.names.allocate("result");

  const requireVariable = (node: TNode) => {
    const variable = walker.nodeVariable(node);
    if (variable === null) {
      throw new GeneratorError("SC_ERR_UNVISITED_NODE", `Node "${host.nodeName(node)}" was not emitted.`);
    }
    return variable;
  };

  walker.emitNode(boundary, options.rootName ?? host.nodeName(boundary), true);
  walker.imports.useRuntime("AnchorContainer");
  body.statement(`const ${resultVar} = new AnchorContainer(${requireVariable(boundary)});`);

  for (const { node, path } of collectAnchoredDescendants(host, boundary)) {
    body.blankLine();
    walker.emitNode(node, host.nodeName(node), false);
    body.statement(`${resultVar}.objects.set(${formatString(path)}, ${requireVariable(node)});`);
  }

  body.blankLine();
  body.statement(`return ${resultVar};`);

  const signature = factorySignature(walker, "AnchorContainer", false);
  return {
    fileName,
    code: renderModule(options, walker, options.sourceName ?? host.nodeName(boundary), signature, body),
    warnings: [...walker.warnings],
  };
}
