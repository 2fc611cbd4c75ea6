import { classifyReference, type LocalReference } from "./classify.js";
import { createDiffOptions, diffAgainstDefaults, type EmptyStringPolicy } from "./differ.js";
import { emitFrame } from "./frame.js";
import type { ReferenceValue, SceneHost } from "./host.js";
import { createImportTracker, GLOBAL_SYMBOLS, RUNTIME_SYMBOLS, type ImportTracker } from "./imports.js";
import { formatMemberAccess, formatPrimitive, formatString, type FloatPrecision } from "./literals.js";
import { createNameAllocator, hasIdentifierCharacters, type NameAllocator } from "./names.js";
import type { SourceBuilder } from "./sourceBuilder.js";

export const CREATED_OBJECTS_PARAMETER = "createdObjects";
export const ANCHORS_PARAMETER = "anchors";

export interface WalkerOptions<TNode, TBehavior> {
  /** Behaviors rejected here are neither attached nor diffed. */
  isSupported(behavior: TBehavior): boolean;
  /**
   * Behaviors that are only attached because something references them get
   * their fields and references emitted when this accepts them.
   */
  expandBehavior?(behavior: TBehavior): boolean;
  anchorBoundaries?: Iterable<TNode>;
  createdObjectsParameter?: string;
  anchorsParameter?: string;
  skippedFields?: ReadonlySet<string>;
  reservedPrefixes?: readonly string[];
  emptyStrings?: EmptyStringPolicy;
  /** Defaults to `double`, the precision JavaScript numbers carry. */
  floatPrecision?: FloatPrecision;
  onWarning?(message: string): void;
}

export interface GraphWalker<TNode> {
  /** Emits `node` at most once and returns the expression that refers to it. */
  emitNode(node: TNode, suggestedName: string, isRoot?: boolean): string;
  nodeVariable(node: TNode): string | null;
  /** Identifier of the node's primary behavior type in the generated module. */
  primaryTypeName(node: TNode): string | null;
  readonly names: NameAllocator;
  readonly imports: ImportTracker;
  readonly warnings: readonly string[];
}

interface NodeEntry {
  nodeVar: string;
  primaryVar: string | null;
  rectVar: string | null;
}

interface PendingReference<TNode, TBehavior> {
  target: string;
  fieldName: string;
  value: ReferenceValue<TNode, TBehavior>;
}

export function createGraphWalker<TNode extends object, TBehavior extends object>(
  host: SceneHost<TNode, TBehavior>,
  builder: SourceBuilder,
  options: WalkerOptions<TNode, TBehavior>,
): GraphWalker<TNode> {
  const createdObjectsParameter = options.createdObjectsParameter ?? CREATED_OBJECTS_PARAMETER;
  const anchorsParameter = options.anchorsParameter ?? ANCHORS_PARAMETER;
  const names = createNameAllocator([createdObjectsParameter, anchorsParameter, ...RUNTIME_SYMBOLS, ...GLOBAL_SYMBOLS]);
  const imports = createImportTracker(names);
  const floatPrecision = options.floatPrecision ?? "double";
  const boundaries = new Set<TNode>(options.anchorBoundaries ?? []);
  const warnings: string[] = [];

  const nodes = new Map<TNode, NodeEntry>();
  const behaviors = new Map<TBehavior, string>();
  const anchoredNodes = new Map<TNode, string>();
  const roots = new Set<TNode>();

  const warn = (message: string) => {
    warnings.push(message);
    options.onWarning?.(message);
  };

  const diffOptions = createDiffOptions({
    skippedFields: options.skippedFields,
    reservedPrefixes: options.reservedPrefixes,
    emptyStrings: options.emptyStrings,
    warn,
  });
  const frameContext = { builder, imports, names, floatPrecision };

  const supportedBehaviors = (node: TNode) => host.behaviorsOf(node).filter((behavior) => options.isSupported(behavior));

  const useBehaviorType = (behavior: TBehavior, usage: "value" | "type" = "value") =>
    imports.useBehaviorModule(host.behaviorTypeName(behavior), usage);

  const referenceName = (fieldName: string, node: TNode) =>
    hasIdentifierCharacters(fieldName) ? fieldName : host.nodeName(node);

  function emitParenting(node: TNode, entry: NodeEntry, isRoot: boolean) {
    if (!isRoot) {
      const parent = host.parentOf(node);
      const parentEntry = parent ? nodes.get(parent) : undefined;
      if (parentEntry) {
        builder.statement(`${entry.nodeVar}.setParent(${parentEntry.nodeVar});`);
      }
    }
    // Children reached through references before their parent existed.
    for (const child of host.childrenOf(node)) {
      if (roots.has(child)) continue;
      const childEntry = nodes.get(child);
      if (childEntry) {
        builder.statement(`${childEntry.nodeVar}.setParent(${entry.nodeVar});`);
      }
    }
  }

  function emitFieldAssignments(behavior: TBehavior, ownerVar: string): PendingReference<TNode, TBehavior>[] {
    const typeName = host.behaviorTypeName(behavior);
    const pending: PendingReference<TNode, TBehavior>[] = [];
    for (const difference of diffAgainstDefaults(host, behavior, diffOptions)) {
      const target = formatMemberAccess(ownerVar, difference.name);
      if (difference.value.kind === "reference") {
        pending.push({ target, fieldName: difference.name, value: difference.value });
        continue;
      }
      const expression = formatPrimitive(difference.value, imports, floatPrecision);
      if (expression === null) {
        warn(`Skipping ${typeName}.${difference.name}: value is not a member of its enum`);
        continue;
      }
      builder.statement(`${target} = ${expression};`);
    }
    return pending;
  }

  function ensureBehavior(behavior: TBehavior, entry: NodeEntry): string {
    const existing = behaviors.get(behavior);
    if (existing) return existing;

    const typeRef = useBehaviorType(behavior);
    const behaviorVar = names.allocate(host.behaviorTypeName(behavior));
    behaviors.set(behavior, behaviorVar);
    builder.statement(`const ${behaviorVar} = ${entry.nodeVar}.addBehavior(${typeRef});`);

    if (options.expandBehavior?.(behavior)) {
      for (const reference of emitFieldAssignments(behavior, behaviorVar)) {
        resolveReference(reference);
      }
    }
    return behaviorVar;
  }

  function localExpression(reference: LocalReference<TNode, TBehavior>, entry: NodeEntry): string {
    switch (reference.kind) {
      case "node":
        return entry.nodeVar;
      case "frame":
        return entry.rectVar ?? `${entry.nodeVar}.transform`;
      case "behavior":
        return ensureBehavior(reference.behavior, entry);
    }
  }

  function emitAnchorReference(
    target: string,
    fieldName: string,
    path: string,
    reference: LocalReference<TNode, TBehavior>,
  ) {
    let anchorVar = anchoredNodes.get(reference.node);
    if (!anchorVar) {
      anchorVar = names.allocate(`${referenceName(fieldName, reference.node)}Node`);
      anchoredNodes.set(reference.node, anchorVar);
      const lookup =
        path.length === 0 ? `${anchorsParameter}?.root` : `${anchorsParameter}?.objects.get(${formatString(path)})`;
      builder.blankLine();
      builder.statement(`const ${anchorVar} = ${lookup};`);
    }

    let expression: string;
    switch (reference.kind) {
      case "node":
        expression = anchorVar;
        break;
      case "frame":
        expression =
          host.frameOf(reference.node).kind === "rect" ? `${anchorVar}.rectTransform` : `${anchorVar}.transform`;
        break;
      case "behavior":
        expression = `${anchorVar}.getBehavior(${useBehaviorType(reference.behavior)})`;
        break;
    }
    builder.statement(`if (${anchorVar}) ${target} = ${expression};`);
  }

  function resolveReference(reference: PendingReference<TNode, TBehavior>) {
    const { target, fieldName, value } = reference;
    if (value.target === null) {
      builder.statement(`${target} = null;`);
      return;
    }

    const classified = classifyReference(host, value.target, boundaries);
    switch (classified.kind) {
      case "unsupported":
        warn(`Skipping unsupported reference: ${fieldName} -> ${classified.description}`);
        return;
      case "anchor":
        emitAnchorReference(target, fieldName, classified.path, classified.target);
        return;
      default: {
        let entry = nodes.get(classified.node);
        if (!entry) {
          builder.blankLine();
          entry = visit(classified.node, referenceName(fieldName, classified.node), false);
        }
        builder.statement(`${target} = ${localExpression(classified, entry)};`);
      }
    }
  }

  function visit(node: TNode, suggestedName: string, isRoot: boolean): NodeEntry {
    const existing = nodes.get(node);
    if (existing) return existing;

    const baseVar = names.allocate(suggestedName);
    const entry: NodeEntry = { nodeVar: names.allocate(`${baseVar}Node`), primaryVar: null, rectVar: null };
    // Recorded before anything below can reach this node again.
    nodes.set(node, entry);

    imports.useRuntime("SceneNode");
    builder.statement(`const ${entry.nodeVar} = new SceneNode(${formatString(host.nodeName(node))});`);
    builder.statement(`${createdObjectsParameter}.push(${entry.nodeVar});`);
    emitParenting(node, entry, isRoot);
    entry.rectVar = emitFrame(frameContext, host.frameOf(node), entry.nodeVar);

    const pending: PendingReference<TNode, TBehavior>[] = [];
    supportedBehaviors(node).forEach((behavior, index) => {
      const typeRef = useBehaviorType(behavior);
      const behaviorVar = index === 0 ? baseVar : names.allocate(`${baseVar}${host.behaviorTypeName(behavior)}`);
      behaviors.set(behavior, behaviorVar);
      builder.statement(`const ${behaviorVar} = ${entry.nodeVar}.addBehavior(${typeRef});`);
      if (entry.primaryVar === null) entry.primaryVar = behaviorVar;
      pending.push(...emitFieldAssignments(behavior, behaviorVar));
    });

    for (const reference of pending) {
      resolveReference(reference);
    }
    return entry;
  }

  return {
    emitNode(node, suggestedName, isRoot = false) {
      if (isRoot && !nodes.has(node)) roots.add(node);
      const entry = visit(node, suggestedName, isRoot);
      return entry.primaryVar ?? entry.nodeVar;
    },
    nodeVariable(node) {
      return nodes.get(node)?.nodeVar ?? null;
    },
    primaryTypeName(node) {
      const primary = supportedBehaviors(node)[0];
      return primary === undefined ? null : useBehaviorType(primary, "type");
    },
    names,
    imports,
    warnings,
  };
}
