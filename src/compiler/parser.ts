import type { LiteralValue, ValueType } from "../ir/types.js";

export interface Span {
  line: number;
  column: number;
}

export interface ImportDirective {
  uri: string;
  alias: string;
  span: Span;
}

export type ParsedExpression =
  | { kind: "literal"; value: LiteralValue; span: Span }
  | { kind: "name"; prefix?: string; name: string; span: Span };

export interface ParsedDeclaration {
  name: string;
  kind: "const" | "let";
  type: ValueType;
  exported: boolean;
  initializer: ParsedExpression;
  span: Span;
}

export interface ParseProblem {
  message: string;
  span: Span;
}

export interface ParsedModule {
  imports: ImportDirective[];
  declarations: ParsedDeclaration[];
  problems: ParseProblem[];
}

type Token =
  | { kind: "ident"; text: string; span: Span }
  | { kind: "string"; text: string; span: Span }
  | { kind: "int"; value: number; text: string; span: Span }
  | { kind: "punct"; text: ";" | ":" | "=" | "."; span: Span }
  | { kind: "eof"; text: ""; span: Span };

const VALUE_TYPES: readonly string[] = ["int", "string", "bool"];

class ParseError extends Error {
  constructor(
    message: string,
    readonly span: Span,
  ) {
    super(message);
    this.name = "ParseError";
  }
}

function isValueType(text: string): text is ValueType {
  return VALUE_TYPES.includes(text);
}

function tokenize(text: string, problems: ParseProblem[]): Token[] {
  const tokens: Token[] = [];
  let line = 1;
  let lineStart = 0;
  let i = 0;

  while (i < text.length) {
    const ch = text.charAt(i);
    const span = { line, column: i - lineStart + 1 };

    if (ch === "\n") {
      line++;
      i++;
      lineStart = i;
    } else if (/\s/.test(ch)) {
      i++;
    } else if (ch === "/" && text.charAt(i + 1) === "/") {
      while (i < text.length && text.charAt(i) !== "\n") i++;
    } else if (/[A-Za-z_]/.test(ch)) {
      const match = /^[A-Za-z_][A-Za-z0-9_]*/.exec(text.slice(i));
      const word = match?.[0] ?? ch;
      tokens.push({ kind: "ident", text: word, span });
      i += word.length;
    } else if (/[0-9]/.test(ch) || (ch === "-" && /[0-9]/.test(text.charAt(i + 1)))) {
      const match = /^-?[0-9]+/.exec(text.slice(i));
      const digits = match?.[0] ?? ch;
      const value = Number.parseInt(digits, 10);
      if (!Number.isSafeInteger(value)) {
        problems.push({ message: `Integer literal '${digits}' can't be represented exactly.`, span });
      }
      tokens.push({ kind: "int", value, text: digits, span });
      i += digits.length;
    } else if (ch === '"') {
      let value = "";
      let j = i + 1;
      let closed = false;
      while (j < text.length && text.charAt(j) !== "\n") {
        const c = text.charAt(j);
        if (c === "\\" && j + 1 < text.length) {
          value += text.charAt(j + 1);
          j += 2;
        } else if (c === '"') {
          closed = true;
          j++;
          break;
        } else {
          value += c;
          j++;
        }
      }
      if (!closed) {
        problems.push({ message: "String starting with \" must end with \".", span });
      }
      tokens.push({ kind: "string", text: value, span });
      i = j;
    } else if (ch === ";" || ch === ":" || ch === "=" || ch === ".") {
      tokens.push({ kind: "punct", text: ch, span });
      i++;
    } else {
      problems.push({ message: `The character '${ch}' isn't expected here.`, span });
      i++;
    }
  }

  tokens.push({ kind: "eof", text: "", span: { line, column: i - lineStart + 1 } });
  return tokens;
}

/** Recursive-descent parser; recovers at the next `;` after an error. */
class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly problems: ParseProblem[],
  ) {}

  private peek(): Token {
    const token = this.tokens[this.pos] ?? this.tokens.at(-1);
    if (!token) throw new Error("token stream is empty");
    return token;
  }

  private next(): Token {
    const token = this.peek();
    if (token.kind !== "eof") this.pos++;
    return token;
  }

  private describe(token: Token): string {
    return token.kind === "eof" ? "end of file" : `'${token.text}'`;
  }

  private expectPunct(text: ";" | ":" | "=" | "."): void {
    const token = this.next();
    if (token.kind !== "punct" || token.text !== text) {
      throw new ParseError(`Expected '${text}' before ${this.describe(token)}.`, token.span);
    }
  }

  private expectIdent(what: string): Extract<Token, { kind: "ident" }> {
    const token = this.next();
    if (token.kind !== "ident") {
      throw new ParseError(`Expected ${what}, but got ${this.describe(token)}.`, token.span);
    }
    return token;
  }

  private recover(): void {
    for (;;) {
      const token = this.next();
      if (token.kind === "eof") return;
      if (token.kind === "punct" && token.text === ";") return;
    }
  }

  parse(): ParsedModule {
    const imports: ImportDirective[] = [];
    const declarations: ParsedDeclaration[] = [];

    while (this.peek().kind !== "eof") {
      try {
        const token = this.peek();
        if (token.kind === "ident" && token.text === "import") {
          imports.push(this.parseImport());
        } else {
          declarations.push(this.parseDeclaration());
        }
      } catch (error) {
        if (!(error instanceof ParseError)) throw error;
        this.problems.push({ message: error.message, span: error.span });
        this.recover();
      }
    }
    return { imports, declarations, problems: this.problems };
  }

  private parseImport(): ImportDirective {
    const keyword = this.next();
    const uri = this.next();
    if (uri.kind !== "string") {
      throw new ParseError(`Expected a URI string, but got ${this.describe(uri)}.`, uri.span);
    }
    const as = this.expectIdent("'as'");
    if (as.text !== "as") {
      throw new ParseError(`Expected 'as', but got '${as.text}'.`, as.span);
    }
    const alias = this.expectIdent("an import prefix");
    this.expectPunct(";");
    return { uri: uri.text, alias: alias.text, span: keyword.span };
  }

  private parseDeclaration(): ParsedDeclaration {
    let first = this.expectIdent("a declaration");
    const span = first.span;
    let exported = false;
    if (first.text === "export") {
      exported = true;
      first = this.expectIdent("'const' or 'let'");
    }
    if (first.text !== "const" && first.text !== "let") {
      throw new ParseError(`Expected 'const' or 'let', but got '${first.text}'.`, first.span);
    }
    const kind = first.text;

    const name = this.expectIdent("a name");
    this.expectPunct(":");
    const type = this.expectIdent("a type");
    if (!isValueType(type.text)) {
      throw new ParseError(`Type '${type.text}' not found.`, type.span);
    }
    this.expectPunct("=");
    const initializer = this.parseExpression();
    this.expectPunct(";");

    return { name: name.text, kind, type: type.text, exported, initializer, span };
  }

  private parseExpression(): ParsedExpression {
    const token = this.next();
    switch (token.kind) {
      case "int":
        return { kind: "literal", value: token.value, span: token.span };
      case "string":
        return { kind: "literal", value: token.text, span: token.span };
      case "ident": {
        if (token.text === "true" || token.text === "false") {
          return { kind: "literal", value: token.text === "true", span: token.span };
        }
        const dot = this.peek();
        if (dot.kind === "punct" && dot.text === ".") {
          this.next();
          const member = this.expectIdent("a name");
          return { kind: "name", prefix: token.text, name: member.text, span: token.span };
        }
        return { kind: "name", name: token.text, span: token.span };
      }
      default:
        throw new ParseError(`Expected an expression, but got ${this.describe(token)}.`, token.span);
    }
  }
}

/** Parse one `.mod` source. Never throws on bad input; see `problems`. */
export function parseModule(text: string): ParsedModule {
  const problems: ParseProblem[] = [];
  const tokens = tokenize(text, problems);
  return new Parser(tokens, problems).parse();
}
