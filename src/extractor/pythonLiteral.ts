// Reads the literal subset of Python the smart fact source files are written in:
// strings, numbers, booleans, None, dotted names, lists, tuples, dicts and
// keyword calls. Anything else is a ParseError.

export type PyValue =
  | { kind: "string"; value: string }
  | { kind: "number"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "none" }
  | { kind: "name"; value: string }
  | { kind: "list"; items: PyValue[] }
  | { kind: "dict"; entries: Array<{ key: PyValue; value: PyValue }> }
  | PyCall;

export type PyCall = {
  kind: "call";
  callee: string;
  args: PyValue[];
  kwargs: Map<string, PyValue>;
};

export type FoundCall =
  | { ok: true; line: number; call: PyCall }
  | { ok: false; line: number; error: string };

export class ParseError extends Error {
  constructor(message: string, readonly line: number) {
    super(`${message} (line ${line})`);
    this.name = "ParseError";
  }
}

// A closing bracket of the wrong kind. The block it belongs to is still bounded.
export class MismatchedBracketError extends ParseError {
  constructor(bracket: string, line: number) {
    super(`Mismatched "${bracket}"`, line);
    this.name = "MismatchedBracketError";
  }
}

export const lineAt = (source: string, index: number) => {
  let line = 1;
  for (let i = 0; i < index && i < source.length; i += 1) {
    if (source[i] === "\n") line += 1;
  }
  return line;
};

const STRING_START = /([rRuUbBfF]{0,2})('''|"""|'|")/y;
const NUMBER = /-?\d[\d_]*(?:\.[\d_]+)?(?:[eE][+-]?\d+)?/y;
const IDENTIFIER = /[A-Za-z_]\w*(?:\.[A-Za-z_]\w*)*/y;

const matchAt = (pattern: RegExp, source: string, index: number) => {
  pattern.lastIndex = index;
  return pattern.exec(source);
};

const OPENERS: Record<string, string> = { "(": ")", "[": "]", "{": "}" };

/**
 * Returns a copy of `source` with string bodies and comments blanked out,
 * keeping every index and newline in place. Bracket matching and call
 * lookup run against the masked text so that quoted code is never seen.
 * An unterminated string masks everything up to the end.
 */
export const maskStringsAndComments = (source: string): string => {
  const out = source.split("");
  const blank = (from: number, to: number) => {
    for (let i = from; i < to; i += 1) {
      if (out[i] !== "\n") out[i] = " ";
    }
  };

  let i = 0;
  while (i < source.length) {
    const ch = source[i];
    if (ch === "#") {
      const end = source.indexOf("\n", i);
      const stop = end === -1 ? source.length : end;
      blank(i, stop);
      i = stop;
      continue;
    }
    if (ch === "'" || ch === '"') {
      const triple = source.startsWith(ch.repeat(3), i);
      const quote = triple ? ch.repeat(3) : ch;
      let j = i + quote.length;
      while (j < source.length) {
        if (source[j] === "\\") {
          j += 2;
          continue;
        }
        if (!triple && source[j] === "\n") break;
        if (source.startsWith(quote, j)) break;
        j += 1;
      }
      const closed = j < source.length && source.startsWith(quote, j);
      const stop = closed ? j + quote.length : Math.min(j, source.length);
      blank(i + quote.length, closed ? j : stop);
      i = stop;
      continue;
    }
    i += 1;
  }
  return out.join("");
};

/**
 * Index of the bracket that closes the one at `openIndex`.
 */
export const findBalancedEnd = (source: string, openIndex: number, masked = maskStringsAndComments(source)) => {
  const opener = masked[openIndex];
  if (!opener || !(opener in OPENERS)) {
    throw new ParseError(`Expected an opening bracket, found "${opener ?? "end of input"}"`, lineAt(source, openIndex));
  }
  const stack: string[] = [];
  for (let i = openIndex; i < masked.length; i += 1) {
    const ch = masked[i];
    if (ch in OPENERS) {
      stack.push(OPENERS[ch]);
    } else if (ch === ")" || ch === "]" || ch === "}") {
      const expected = stack.pop();
      if (ch !== expected) {
        throw new MismatchedBracketError(ch, lineAt(source, i));
      }
      if (stack.length === 0) return i;
    }
  }
  throw new ParseError(`Unterminated "${opener}"`, lineAt(source, openIndex));
};

const decodeEscapes = (body: string): string =>
  body.replace(/\\(\r?\n|u[0-9a-fA-F]{4}|x[0-9a-fA-F]{2}|.)/g, (whole, seq: string) => {
    if (seq === "\n" || seq === "\r\n") return "";
    if (seq.length > 1 && (seq[0] === "u" || seq[0] === "x")) {
      return String.fromCharCode(parseInt(seq.slice(1), 16));
    }
    switch (seq) {
      case "n":
        return "\n";
      case "t":
        return "\t";
      case "r":
        return "\r";
      case "\\":
      case "'":
      case '"':
        return seq;
      default:
        return whole;
    }
  });

class Scanner {
  pos: number;

  constructor(private readonly source: string, start = 0) {
    this.pos = start;
  }

  fail(message: string): never {
    throw new ParseError(message, lineAt(this.source, this.pos));
  }

  skipTrivia() {
    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];
      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.pos += 1;
      } else if (ch === "\\" && (this.source[this.pos + 1] === "\n" || this.source[this.pos + 1] === "\r")) {
        this.pos += 2;
      } else if (ch === "#") {
        const end = this.source.indexOf("\n", this.pos);
        this.pos = end === -1 ? this.source.length : end;
      } else {
        return;
      }
    }
  }

  peek() {
    this.skipTrivia();
    return this.source[this.pos];
  }

  expect(ch: string) {
    if (this.peek() !== ch) {
      this.fail(`Expected "${ch}", found ${this.describeNext()}`);
    }
    this.pos += 1;
  }

  describeNext() {
    const ch = this.source[this.pos];
    return ch === undefined ? "end of input" : `"${ch}"`;
  }

  atEnd() {
    this.skipTrivia();
    return this.pos >= this.source.length;
  }

  parseValue(): PyValue {
    const ch = this.peek();
    if (ch === undefined) this.fail("Unexpected end of input");

    if (matchAt(STRING_START, this.source, this.pos)) {
      return { kind: "string", value: this.parseStringRun() };
    }
    if (ch === "[") return this.parseList("[", "]");
    if (ch === "(") return this.parseParenthesized();
    if (ch === "{") return this.parseDict();

    const number = matchAt(NUMBER, this.source, this.pos);
    if (number) {
      this.pos += number[0].length;
      return { kind: "number", value: Number(number[0].replace(/_/g, "")) };
    }

    const ident = matchAt(IDENTIFIER, this.source, this.pos);
    if (ident) {
      this.pos += ident[0].length;
      const name = ident[0];
      if (name === "True" || name === "False") return { kind: "bool", value: name === "True" };
      if (name === "None") return { kind: "none" };
      if (this.peek() === "(") return this.parseCall(name);
      return { kind: "name", value: name };
    }

    return this.fail(`Unsupported expression starting with ${this.describeNext()}`);
  }

  // Adjacent literals and "+" join into one string.
  parseStringRun(): string {
    let value = this.parseString();
    for (;;) {
      this.skipTrivia();
      if (matchAt(STRING_START, this.source, this.pos)) {
        value += this.parseString();
        continue;
      }
      if (this.source[this.pos] === "+") {
        const save = this.pos;
        this.pos += 1;
        this.skipTrivia();
        if (matchAt(STRING_START, this.source, this.pos)) {
          value += this.parseString();
          continue;
        }
        this.pos = save;
      }
      return value;
    }
  }

  parseString(): string {
    const start = matchAt(STRING_START, this.source, this.pos);
    if (!start) return this.fail("Expected a string");
    const raw = /r/i.test(start[1]);
    const quote = start[2];
    const bodyStart = this.pos + start[0].length;
    let j = bodyStart;
    while (j < this.source.length) {
      if (this.source[j] === "\\") {
        j += 2;
        continue;
      }
      if (quote.length === 1 && this.source[j] === "\n") break;
      if (this.source.startsWith(quote, j)) {
        const body = this.source.slice(bodyStart, j);
        this.pos = j + quote.length;
        return raw ? body : decodeEscapes(body);
      }
      j += 1;
    }
    return this.fail("Unterminated string");
  }

  parseList(open: string, close: string): PyValue {
    this.expect(open);
    const items: PyValue[] = [];
    while (this.peek() !== close) {
      items.push(this.parseValue());
      if (this.peek() === ",") {
        this.pos += 1;
        continue;
      }
      if (this.peek() !== close) {
        this.fail(`Expected "," or "${close}", found ${this.describeNext()}`);
      }
    }
    this.pos += 1;
    return { kind: "list", items };
  }

  // "(x)" groups, "(x,)" and "(x, y)" are tuples, read as lists.
  parseParenthesized(): PyValue {
    this.expect("(");
    if (this.peek() === ")") {
      this.pos += 1;
      return { kind: "list", items: [] };
    }
    const first = this.parseValue();
    if (this.peek() === ")") {
      this.pos += 1;
      return first;
    }
    const items = [first];
    while (this.peek() === ",") {
      this.pos += 1;
      if (this.peek() === ")") break;
      items.push(this.parseValue());
    }
    this.expect(")");
    return { kind: "list", items };
  }

  parseDict(): PyValue {
    this.expect("{");
    const entries: Array<{ key: PyValue; value: PyValue }> = [];
    while (this.peek() !== "}") {
      const key = this.parseValue();
      this.expect(":");
      const value = this.parseValue();
      entries.push({ key, value });
      if (this.peek() === ",") {
        this.pos += 1;
        continue;
      }
      if (this.peek() !== "}") {
        this.fail(`Expected "," or "}", found ${this.describeNext()}`);
      }
    }
    this.pos += 1;
    return { kind: "dict", entries };
  }

  parseCall(callee: string): PyCall {
    this.expect("(");
    const args: PyValue[] = [];
    const kwargs = new Map<string, PyValue>();
    while (this.peek() !== ")") {
      if (this.source[this.pos] === "*") {
        this.fail("Star arguments are not supported");
      }
      const keyword = /([A-Za-z_]\w*)\s*=(?!=)/y;
      keyword.lastIndex = this.pos;
      const kw = keyword.exec(this.source);
      if (kw) {
        this.pos += kw[0].length;
        if (kwargs.has(kw[1])) {
          this.fail(`Repeated keyword argument "${kw[1]}"`);
        }
        kwargs.set(kw[1], this.parseValue());
      } else {
        if (kwargs.size > 0) {
          this.fail("Positional argument follows keyword argument");
        }
        args.push(this.parseValue());
      }
      if (this.peek() === ",") {
        this.pos += 1;
        continue;
      }
      if (this.peek() !== ")") {
        this.fail(`Expected "," or ")", found ${this.describeNext()}`);
      }
    }
    this.pos += 1;
    return { kind: "call", callee, args, kwargs };
  }
}

/**
 * Parses `text` as exactly one literal value. Line numbers in errors are
 * counted from `firstLine`.
 */
export const parseLiteral = (text: string, firstLine = 1): PyValue => {
  try {
    const scanner = new Scanner(text);
    const value = scanner.parseValue();
    if (!scanner.atEnd()) {
      scanner.fail(`Unexpected ${scanner.describeNext()} after value`);
    }
    return value;
  } catch (error) {
    if (error instanceof ParseError && firstLine !== 1) {
      throw new ParseError(error.message.replace(/ \(line \d+\)$/, ""), error.line + firstLine - 1);
    }
    throw error;
  }
};

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

/**
 * Every `callee(...)` in `source`, outside strings and comments and not a
 * `class`/`def` header. A block that never closes throws; a block with a
 * mismatched bracket, or one that closes but does not parse, comes back with
 * `ok: false` and scanning resumes after its opening bracket.
 */
export const findCalls = (source: string, callee: string): FoundCall[] => {
  const masked = maskStringsAndComments(source);
  const pattern = new RegExp(`(?<![\\w.])(?<!\\b(?:class|def)\\s+)${escapeRegExp(callee)}\\s*\\(`, "g");
  const found: FoundCall[] = [];
  let match: RegExpExecArray | null;
  while ((match = pattern.exec(masked)) !== null) {
    const start = match.index;
    const openIndex = start + match[0].length - 1;
    const line = lineAt(source, start);
    let end: number;
    try {
      end = findBalancedEnd(source, openIndex, masked);
    } catch (error) {
      if (!(error instanceof MismatchedBracketError)) throw error;
      found.push({ ok: false, line, error: error.message });
      pattern.lastIndex = openIndex + 1;
      continue;
    }
    try {
      const value = parseLiteral(source.slice(start, end + 1), line);
      if (value.kind !== "call") {
        found.push({ ok: false, line, error: `Expected a ${callee} call` });
      } else {
        found.push({ ok: true, line, call: value });
      }
    } catch (error) {
      if (!(error instanceof ParseError)) throw error;
      found.push({ ok: false, line, error: error.message });
    }
    pattern.lastIndex = end + 1;
  }
  return found;
};

/**
 * The value assigned to a top-level `name = ...` (an annotation such as
 * `name: dict[str, str] = ...` is allowed), or null when `name` is never
 * assigned.
 */
export const findAssignment = (source: string, name: string): { line: number; value: PyValue } | null => {
  const masked = maskStringsAndComments(source);
  const pattern = new RegExp(`^${escapeRegExp(name)}\\s*(?::[^=\\n]+)?=(?!=)\\s*`, "m");
  const match = pattern.exec(masked);
  if (!match) return null;
  const start = match.index + match[0].length;
  const line = lineAt(source, start);
  const scanner = new Scanner(source, start);
  const value = scanner.parseValue();
  return { line, value };
};
