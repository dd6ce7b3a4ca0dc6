/**
 * Arithmetic for the local responder: spoken-operator normalization, expression extraction,
 * and a recursive-descent evaluator (no eval). Supports + - * / // ** parentheses and unary signs.
 */

const EXPRESSION_RUN = /[0-9.+\-*/() ]+/g;
const ALLOWED = /^[0-9.+\-*/() ]+$/;

const SPOKEN_OPERATORS: ReadonlyArray<[RegExp, string]> = [
  [/\bmultiplied by\b/g, "*"],
  [/\bdivided by\b/g, "/"],
  [/\btimes\b/g, "*"],
  [/\bplus\b/g, "+"],
  [/\bminus\b/g, "-"],
  [/\bover\b/g, "/"],
  [/(\d)\s*x\s*(?=\d)/g, "$1*"],
];

/** "x" or "over" between two numbers: operators with no keyword of their own. */
const OPERATOR_BETWEEN_NUMBERS = /\d\s*(?:x|over)\s*\d/;

export function hasOperatorBetweenNumbers(text: string): boolean {
  return OPERATOR_BETWEEN_NUMBERS.test(text.toLowerCase());
}

export function normalizeSpokenOperators(text: string): string {
  let out = text.toLowerCase();
  for (const [pattern, replacement] of SPOKEN_OPERATORS) out = out.replace(pattern, replacement);
  return out;
}

/**
 * Longest run of expression characters (first one on ties), trimmed.
 * Null when there is no run with a digit in it.
 */
export function extractExpression(text: string): string | null {
  let longest = "";
  for (const match of text.matchAll(EXPRESSION_RUN)) {
    if (match[0].length > longest.length) longest = match[0];
  }
  const expression = longest.trim();
  if (!expression || !/\d/.test(expression) || !ALLOWED.test(expression)) return null;
  return expression;
}

type Token = { kind: "num"; value: number } | { kind: "op"; value: string };

function tokenize(expression: string): Token[] {
  const tokens: Token[] = [];
  const re = /\s*(\d+\.?\d*|\.\d+|\*\*|\/\/|[-+*/()])/y;
  let pos = 0;
  while (pos < expression.length) {
    if (expression.slice(pos).trim() === "") break;
    re.lastIndex = pos;
    const m = re.exec(expression);
    if (!m) throw new SyntaxError(`unexpected input at ${pos}`);
    const text = m[1];
    tokens.push(/^[\d.]/.test(text) ? { kind: "num", value: Number(text) } : { kind: "op", value: text });
    pos = re.lastIndex;
  }
  return tokens;
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): number {
    const value = this.expression();
    if (this.pos !== this.tokens.length) throw new SyntaxError("trailing input");
    return value;
  }

  private peekOp(): string | undefined {
    const t = this.tokens[this.pos];
    return t && t.kind === "op" ? t.value : undefined;
  }

  private expression(): number {
    let value = this.term();
    for (let op = this.peekOp(); op === "+" || op === "-"; op = this.peekOp()) {
      this.pos++;
      const rhs = this.term();
      value = op === "+" ? value + rhs : value - rhs;
    }
    return value;
  }

  private term(): number {
    let value = this.unary();
    for (let op = this.peekOp(); op === "*" || op === "/" || op === "//"; op = this.peekOp()) {
      this.pos++;
      const rhs = this.unary();
      if ((op === "/" || op === "//") && rhs === 0) throw new RangeError("division by zero");
      value = op === "*" ? value * rhs : op === "/" ? value / rhs : Math.floor(value / rhs);
    }
    return value;
  }

  private unary(): number {
    const op = this.peekOp();
    if (op === "+" || op === "-") {
      this.pos++;
      const value = this.unary();
      return op === "-" ? -value : value;
    }
    return this.power();
  }

  private power(): number {
    const base = this.primary();
    if (this.peekOp() === "**") {
      this.pos++;
      return base ** this.unary();
    }
    return base;
  }

  private primary(): number {
    const t = this.tokens[this.pos];
    if (!t) throw new SyntaxError("unexpected end of expression");
    this.pos++;
    if (t.kind === "num") {
      if (Number.isNaN(t.value)) throw new SyntaxError("bad number");
      return t.value;
    }
    if (t.value === "(") {
      const value = this.expression();
      if (this.peekOp() !== ")") throw new SyntaxError("missing )");
      this.pos++;
      return value;
    }
    throw new SyntaxError(`unexpected '${t.value}'`);
  }
}

/** Throws on malformed input or division by zero. */
export function evaluateExpression(expression: string): number {
  const value = new Parser(tokenize(expression)).parse();
  if (!Number.isFinite(value)) throw new RangeError("result is not finite");
  return value;
}

/** Result of the math handler; null means "reply with the help string". */
export function solveSpokenMath(utterance: string): number | null {
  const expression = extractExpression(normalizeSpokenOperators(utterance));
  if (expression === null) return null;
  try {
    return evaluateExpression(expression);
  } catch {
    return null;
  }
}
