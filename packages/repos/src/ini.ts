/** One `[name]` block with its keys in file order. */
export interface IniSection {
  name: string;
  values: Map<string, string>;
}

export class IniSyntaxError extends Error {
  constructor(
    readonly line: number,
    message: string,
  ) {
    super(`line ${line}: ${message}`);
    this.name = "IniSyntaxError";
  }
}

const SECTION_RE = /^\[([^\]]*)\]$/;
const KEY_VALUE_RE = /^([^=]+?)\s*=\s*(.*)$/;

/**
 * Parse the INI dialect used by `.repo` files.
 *
 * Lines indented with whitespace continue the previous value and are joined
 * with a newline. Comments are full-line only, so `#` inside a URL is kept.
 * A repeated key overwrites the earlier one.
 */
export function parseIni(text: string): IniSection[] {
  const sections: IniSection[] = [];
  let current: IniSection | null = null;
  let lastKey: string | null = null;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const raw = lines[i] ?? "";
    const trimmed = raw.trim();

    if (trimmed === "" || trimmed.startsWith("#") || trimmed.startsWith(";")) {
      // Blank lines end a multi-line value
      if (trimmed === "") lastKey = null;
      continue;
    }

    if (/^\s/.test(raw) && current && lastKey !== null) {
      const previous = current.values.get(lastKey) ?? "";
      current.values.set(lastKey, previous === "" ? trimmed : `${previous}\n${trimmed}`);
      continue;
    }

    const section = SECTION_RE.exec(trimmed);
    if (section) {
      const name = (section[1] ?? "").trim();
      if (name === "") {
        throw new IniSyntaxError(lineNo, "empty section name");
      }
      current = { name, values: new Map() };
      sections.push(current);
      lastKey = null;
      continue;
    }

    const pair = KEY_VALUE_RE.exec(trimmed);
    if (!pair?.[1]) {
      throw new IniSyntaxError(lineNo, `unparseable line "${trimmed}"`);
    }
    if (!current) {
      throw new IniSyntaxError(lineNo, `key "${pair[1]}" outside of any section`);
    }

    lastKey = pair[1].trim();
    current.values.set(lastKey, (pair[2] ?? "").trim());
  }

  return sections;
}
