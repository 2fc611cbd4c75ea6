export const PLACEHOLDER_IDENTIFIER = "item";

const RESERVED_WORDS = new Set([
  "arguments",
  "await",
  "break",
  "case",
  "catch",
  "class",
  "const",
  "continue",
  "debugger",
  "default",
  "delete",
  "do",
  "else",
  "enum",
  "eval",
  "export",
  "extends",
  "false",
  "finally",
  "for",
  "function",
  "if",
  "implements",
  "import",
  "in",
  "instanceof",
  "interface",
  "let",
  "new",
  "null",
  "package",
  "private",
  "protected",
  "public",
  "return",
  "static",
  "super",
  "switch",
  "this",
  "throw",
  "true",
  "try",
  "typeof",
  "undefined",
  "var",
  "void",
  "while",
  "with",
  "yield",
]);

const LETTER_OR_DIGIT = /[\p{L}\p{Nd}]/u;
const DIGIT = /\p{Nd}/u;
const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

export function isIdentifier(name: string): boolean {
  return IDENTIFIER.test(name) && !RESERVED_WORDS.has(name);
}

/** False when `sanitizeIdentifier` would have nothing to keep. */
export function hasIdentifierCharacters(name: string): boolean {
  return LETTER_OR_DIGIT.test(name);
}

/**
 * Turns an arbitrary display name into a camelCase identifier. Separators
 * upper-case the next kept character; a leading underscore is dropped without
 * affecting case.
 */
export function sanitizeIdentifier(name: string): string {
  let result = "";
  let capitalizeNext = false;

  for (const char of name) {
    if (LETTER_OR_DIGIT.test(char)) {
      if (result.length === 0) {
        result += char.toLowerCase();
      } else if (capitalizeNext) {
        result += char.toUpperCase();
      } else {
        result += char;
      }
      capitalizeNext = false;
    } else if (char === "_") {
      if (result.length > 0) capitalizeNext = true;
    } else {
      capitalizeNext = true;
    }
  }

  if (result.length === 0) return PLACEHOLDER_IDENTIFIER;
  if (DIGIT.test(result.charAt(0))) result = `n${result}`;
  if (RESERVED_WORDS.has(result)) result = `${result}_`;
  return result;
}

export interface NameAllocator {
  allocate(suggestedName: string): string;
  /** Claims `name` verbatim; false when it is already taken. */
  reserve(name: string): boolean;
  has(name: string): boolean;
}

export function createNameAllocator(reserved: Iterable<string> = []): NameAllocator {
  const used = new Set<string>(reserved);
  return {
    allocate(suggestedName) {
      const base = sanitizeIdentifier(suggestedName);
      let candidate = base;
      let counter = 1;
      while (used.has(candidate)) {
        candidate = `${base}${counter}`;
        counter += 1;
      }
      used.add(candidate);
      return candidate;
    },
    reserve(name) {
      if (used.has(name)) return false;
      used.add(name);
      return true;
    },
    has(name) {
      return used.has(name);
    },
  };
}
