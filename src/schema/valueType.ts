/**
 * Value type expressions: `Name` or `Name<Arg, ...>`.
 *
 * Examples: `string`, `xsd:dateTime`, `Remotable<Or<Link, Object>>`.
 */

export interface ValueTypeExpr {
  name: string;
  args: ValueTypeExpr[];
}

export type ValueTypeParseResult =
  | { success: true; expr: ValueTypeExpr }
  | { success: false; error: string };

const TOKEN = /\s*([A-Za-z_][\w:.-]*|[<>,])/y;

class ExprParser {
  private readonly tokens: string[] = [];
  private position = 0;

  constructor(private readonly source: string) {}

  parse(): ValueTypeExpr {
    this.tokenize();
    const expr = this.expr();
    if (this.position < this.tokens.length) {
      throw new Error(`unexpected \`${this.tokens[this.position] ?? ''}\``);
    }
    return expr;
  }

  private tokenize(): void {
    TOKEN.lastIndex = 0;
    while (TOKEN.lastIndex < this.source.length) {
      const start = TOKEN.lastIndex;
      const match = TOKEN.exec(this.source);
      if (match === null) {
        if (this.source.slice(start).trim() === '') {
          return;
        }
        throw new Error(`unexpected character at offset ${start}`);
      }
      const [, token] = match;
      if (token !== undefined) {
        this.tokens.push(token);
      }
    }
  }

  private next(): string | undefined {
    return this.tokens[this.position++];
  }

  private peek(): string | undefined {
    return this.tokens[this.position];
  }

  private expr(): ValueTypeExpr {
    const name = this.next();
    if (name === undefined || name === '<' || name === '>' || name === ',') {
      throw new Error(name === undefined ? 'unexpected end of expression' : `unexpected \`${name}\``);
    }
    const args: ValueTypeExpr[] = [];
    if (this.peek() === '<') {
      this.position++;
      args.push(this.expr());
      while (this.peek() === ',') {
        this.position++;
        args.push(this.expr());
      }
      const close = this.next();
      if (close !== '>') {
        throw new Error(`expected \`>\` after arguments of ${name}`);
      }
    }
    return { name, args };
  }
}

export function parseValueType(source: string): ValueTypeParseResult {
  try {
    return { success: true, expr: new ExprParser(source).parse() };
  } catch (err) {
    return { success: false, error: `${source}: ${err instanceof Error ? err.message : String(err)}` };
  }
}

/**
 * Render an expression back to text, normalizing whitespace.
 */
export function formatValueType(expr: ValueTypeExpr): string {
  if (expr.args.length === 0) {
    return expr.name;
  }
  return `${expr.name}<${expr.args.map(formatValueType).join(', ')}>`;
}
