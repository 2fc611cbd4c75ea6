import { GeneratorError } from "./errors.js";
import { isIdentifier, type NameAllocator } from "./names.js";

export type SymbolUsage = "value" | "type";

/** Names the generated code takes from the scene run-time module. */
export const RUNTIME_SYMBOLS = ["AnchorContainer", "Color", "SceneNode", "Vector2", "Vector3"] as const;
export type RuntimeSymbol = (typeof RUNTIME_SYMBOLS)[number];

/** Globals the generated code refers to by name. */
export const GLOBAL_SYMBOLS = ["Array", "Number"] as const;

export interface ImportedSymbol {
  name: string;
  /** Differs from `name` when the export collides with a generated identifier. */
  localName: string;
  typeOnly: boolean;
}

export interface ImportTracker {
  useRuntime(name: RuntimeSymbol, usage?: SymbolUsage): void;
  /**
   * Records a behavior or enum type exported by the behavior module and
   * returns the identifier the generated code uses for it.
   */
  useBehaviorModule(name: string, usage?: SymbolUsage): string;
  runtimeSymbols(): ImportedSymbol[];
  behaviorModuleSymbols(): ImportedSymbol[];
}

interface Usage {
  localName: string;
  typeOnly: boolean;
}

function record(target: Map<string, Usage>, name: string, localName: string, usage: SymbolUsage) {
  const typeOnly = usage === "type";
  const previous = target.get(name);
  target.set(name, { localName, typeOnly: previous === undefined ? typeOnly : previous.typeOnly && typeOnly });
}

function sorted(source: Map<string, Usage>): ImportedSymbol[] {
  return [...source.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([name, usage]) => ({ name, localName: usage.localName, typeOnly: usage.typeOnly }));
}

/**
 * Collects the imports of one generated module. With `names`, behavior module
 * symbols are claimed in the allocator so no variable shadows them; a symbol
 * whose name is already taken is imported under an alias.
 */
export function createImportTracker(names?: NameAllocator): ImportTracker {
  const runtime = new Map<string, Usage>();
  const behaviorModule = new Map<string, Usage>();

  const localNameFor = (name: string) => {
    const existing = behaviorModule.get(name);
    if (existing) return existing.localName;
    if (!isIdentifier(name)) {
      throw new GeneratorError("SC_ERR_INVALID_TYPE_NAME", `Type name "${name}" is not a valid identifier.`);
    }
    if (!names || names.reserve(name)) return name;
    return names.allocate(`${name}Type`);
  };

  return {
    useRuntime(name, usage = "value") {
      record(runtime, name, name, usage);
    },
    useBehaviorModule(name, usage = "value") {
      const localName = localNameFor(name);
      record(behaviorModule, name, localName, usage);
      return localName;
    },
    runtimeSymbols() {
      return sorted(runtime);
    },
    behaviorModuleSymbols() {
      return sorted(behaviorModule);
    },
  };
}

export function renderImport(symbols: readonly ImportedSymbol[], moduleSpecifier: string): string | null {
  if (symbols.length === 0) return null;
  const names = symbols.map((symbol) => {
    const binding = symbol.localName === symbol.name ? symbol.name : `${symbol.name} as ${symbol.localName}`;
    return symbol.typeOnly ? `type ${binding}` : binding;
  });
  return `import { ${names.join(", ")} } from ${JSON.stringify(moduleSpecifier)};`;
}
