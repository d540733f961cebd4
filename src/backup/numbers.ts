// Number literals that a JavaScript number cannot hold exactly

const NUMBER_LITERAL = /[+-]?(?:0[xX][0-9a-fA-F]+|(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?)/y;
const HEX_LITERAL = /^[+-]?0[xX]([0-9a-fA-F]+)$/;
const DECIMAL_LITERAL = /^([+-]?)(\d*)(?:\.(\d*))?(?:[eE]([+-]?\d+))?$/;
const IDENTIFIER_START = /[\p{L}\p{Nl}_$\\]/u;
const IDENTIFIER_PART = /[\p{L}\p{Nl}\p{Mn}\p{Mc}\p{Nd}\p{Pc}$\\\u200C\u200D]/u;

function skipString(text: string, start: number): number {
  const quote = text[start];
  let i = start + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === "\\") {
      i += 2;
    } else if (ch === quote) {
      return i + 1;
    } else {
      i++;
    }
  }
  return text.length;
}

function skipIdentifier(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length && IDENTIFIER_PART.test(text[i])) i++;
  return i;
}

/**
 * Number literals of a JSON or JSON5 document in source order. Strings,
 * comments and unquoted keys are skipped. Assumes `text` already parsed.
 */
export function numberLiterals(text: string): string[] {
  const literals: string[] = [];
  let i = 0;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '"' || ch === "'") {
      i = skipString(text, i);
      continue;
    }
    if (ch === "/" && text[i + 1] === "/") {
      const end = text.indexOf("\n", i);
      i = end < 0 ? text.length : end;
      continue;
    }
    if (ch === "/" && text[i + 1] === "*") {
      const end = text.indexOf("*/", i + 2);
      i = end < 0 ? text.length : end + 2;
      continue;
    }
    if (IDENTIFIER_START.test(ch)) {
      i = skipIdentifier(text, i);
      continue;
    }
    NUMBER_LITERAL.lastIndex = i;
    const match = NUMBER_LITERAL.exec(text);
    if (match) {
      literals.push(match[0]);
      i += match[0].length;
      continue;
    }
    i++;
  }
  return literals;
}

/** `digits` + `e` + exponent with no leading or trailing zeros; `"0"` for any zero. */
function normalizeDecimal(literal: string): string | undefined {
  const match = DECIMAL_LITERAL.exec(literal);
  if (!match) return undefined;
  const [, sign = "", whole = "", fraction = "", exponent = "0"] = match;
  const digits = (whole + fraction).replace(/^0+/, "");
  if (digits === "") return "0";
  const significant = digits.replace(/0+$/, "");
  const scale = Number(exponent) - fraction.length + (digits.length - significant.length);
  return `${sign === "-" ? "-" : ""}${significant}e${scale}`;
}

/**
 * Whether parsing `literal` into a number and printing it back keeps its
 * value. `1.0` and `1e2` do; `123456789012345678901` and `1e400` do not.
 */
export function isExactNumber(literal: string): boolean {
  const hex = HEX_LITERAL.exec(literal);
  if (hex) {
    const exact = BigInt(`0x${hex[1]}`);
    const value = Number(exact);
    return Number.isFinite(value) && BigInt(value) === exact;
  }
  const value = Number(literal);
  if (!Number.isFinite(value)) return false;
  const expected = normalizeDecimal(literal);
  return expected !== undefined && expected === normalizeDecimal(String(value));
}
