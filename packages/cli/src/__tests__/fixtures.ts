import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { CliIo } from "../scenecastCli.js";

export const ROUTE_DOCUMENT = {
  version: 1,
  behaviorTypes: [
    {
      name: "Site",
      fields: [
        { kind: "string", name: "_label" },
        { kind: "reference", name: "_next" },
        { kind: "asset", name: "_icon", typeName: "Sprite" },
      ],
    },
    { name: "Marker", fields: [{ kind: "float", name: "_size", default: 1 }] },
  ],
  nodes: [
    {
      id: "siteA",
      name: "Site A",
      behaviors: [{ type: "Site", fields: { _label: "North", _next: { node: "siteB", behavior: "Site" } } }],
    },
    { id: "siteB", name: "Site B", behaviors: [{ type: "Site", fields: { _label: "South" } }] },
    { id: "marker", name: "Marker", parent: "siteA", behaviors: [{ type: "Marker", fields: { _size: 2 } }] },
  ],
};

export const SITE_A_MODULE = [
  "// AUTO-GENERATED CODE - DO NOT EDIT",
  "// Generated from: Site A",
  "",
  'import { type AnchorContainer, SceneNode } from "@scenecast/scene";',
  'import { Site } from "./behaviors.js";',
  "",
  "export function create(createdObjects: SceneNode[], anchors?: AnchorContainer | null): Site {",
  '  const siteANode = new SceneNode("Site A");',
  "  createdObjects.push(siteANode);",
  "  const siteA = siteANode.addBehavior(Site);",
  '  siteA._label = "North";',
  "",
  '  const nextNode = new SceneNode("Site B");',
  "  createdObjects.push(nextNode);",
  "  const next = nextNode.addBehavior(Site);",
  '  next._label = "South";',
  "  siteA._next = next;",
  "",
  "  return siteA;",
  "}",
  "",
].join("\n");

export interface CapturedIo extends CliIo {
  stdout: string[];
  stderr: string[];
}

export function captureIo(): CapturedIo {
  const stdout: string[] = [];
  const stderr: string[] = [];
  return {
    stdout,
    stderr,
    writeStdout: (line) => stdout.push(line),
    writeStderr: (line) => stderr.push(line),
  };
}

/** Temporary directory holding `scene.json`; removed by `cleanup`. */
export async function createWorkspace(document: unknown = ROUTE_DOCUMENT) {
  const dir = await mkdtemp(join(tmpdir(), "scenecast-cli-"));
  const scenePath = join(dir, "scene.json");
  await writeFile(scenePath, JSON.stringify(document), "utf8");
  return {
    dir,
    scenePath,
    outDir: join(dir, "generated"),
    cleanup: () => rm(dir, { recursive: true, force: true }),
  };
}
