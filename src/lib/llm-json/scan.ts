interface ObjectScanState {
  startIndex: number;
  depth: number;
  inString: boolean;
  escaped: boolean;
}

function createScanState(): ObjectScanState {
  return { startIndex: -1, depth: 0, inString: false, escaped: false };
}

// Returns true while the character belongs to a string literal.
function consumeStringChar(state: ObjectScanState, char: string): boolean {
  if (!state.inString) {
    if (char !== '"') return false;
    state.inString = true;
    return true;
  }
  if (state.escaped) {
    state.escaped = false;
  } else if (char === '\\') {
    state.escaped = true;
  } else if (char === '"') {
    state.inString = false;
  }
  return true;
}

function processScanChar(
  state: ObjectScanState,
  char: string,
  text: string,
  index: number
): string | null {
  if (state.startIndex === -1) {
    if (char !== '{') return null;
    state.startIndex = index;
    state.depth = 1;
    return null;
  }
  if (consumeStringChar(state, char)) return null;
  if (char === '{') {
    state.depth += 1;
    return null;
  }
  if (char !== '}') return null;
  state.depth -= 1;
  return state.depth === 0 ? text.slice(state.startIndex, index + 1) : null;
}

/**
 * Finds the first balanced `{...}` object in free-form model output.
 * Braces inside string literals are ignored; newlines are allowed anywhere.
 */
export function extractFirstJsonObject(text: string): string | null {
  const state = createScanState();

  for (let i = 0; i < text.length; i += 1) {
    const fragment = processScanChar(state, text.charAt(i), text, i);
    if (fragment) return fragment;
  }

  return null;
}

const CONTROL_ESCAPES: Readonly<Record<string, string>> = {
  '\n': '\\n',
  '\r': '\\r',
  '\t': '\\t',
};

/**
 * Escapes raw line breaks and tabs that appear inside string literals.
 * Models often emit multi-line prompt text without escaping it.
 */
export function escapeControlCharsInStrings(fragment: string): string {
  const state = createScanState();
  let result = '';

  for (const char of fragment) {
    const wasInString = state.inString;
    consumeStringChar(state, char);
    const escape = CONTROL_ESCAPES[char];
    result += wasInString && state.inString && escape ? escape : char;
  }

  return result;
}
