import { tokenize, ParseError, type Token } from './tokenize';

export type AttributeValue = string | number | boolean | null;

export interface ParsedBlock {
  type: string;
  labels: string[];
  /** Literal attributes; complex expressions (lists, maps, calls) map to null. */
  attributes: Record<string, AttributeValue>;
  blocks: ParsedBlock[];
  line: number;
}

export interface ParsedDocument {
  attributes: Record<string, AttributeValue>;
  blocks: ParsedBlock[];
}

class Parser {
  private pos = 0;

  constructor(private readonly tokens: Token[]) {}

  parse(): ParsedDocument {
    const body = this.parseBody(false);
    return { attributes: body.attributes, blocks: body.blocks };
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
  }

  private next(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length - 1) this.pos++;
    return tok;
  }

  private skipNewlines(): void {
    while (this.peek().type === 'newline') this.pos++;
  }

  private parseBody(nested: boolean): Pick<ParsedBlock, 'attributes' | 'blocks'> {
    const attributes: Record<string, AttributeValue> = {};
    const blocks: ParsedBlock[] = [];

    for (;;) {
      this.skipNewlines();
      const tok = this.peek();

      if (tok.type === 'eof') {
        if (nested) throw new ParseError('unexpected end of file, missing "}"', tok.line);
        break;
      }
      if (tok.type === 'rbrace') {
        if (!nested) throw new ParseError('unexpected "}"', tok.line);
        this.next();
        break;
      }
      if (tok.type !== 'ident') {
        throw new ParseError(`expected attribute or block, found "${tok.value}"`, tok.line);
      }

      this.next();
      if (this.peek().type === 'equals') {
        this.next();
        attributes[tok.value] = this.parseExpression();
        continue;
      }

      blocks.push(this.parseBlock(tok));
    }

    return { attributes, blocks };
  }

  private parseBlock(typeToken: Token): ParsedBlock {
    const labels: string[] = [];
    while (this.peek().type === 'string' || this.peek().type === 'ident') {
      labels.push(this.next().value);
    }
    const open = this.next();
    if (open.type !== 'lbrace') {
      throw new ParseError(`expected "{" after block "${typeToken.value}"`, open.line);
    }
    const body = this.parseBody(true);
    return { type: typeToken.value, labels, ...body, line: typeToken.line };
  }

  private parseExpression(): AttributeValue {
    const first = this.peek();
    if (first.type === 'newline' || first.type === 'eof' || first.type === 'rbrace') {
      throw new ParseError('missing attribute value', first.line);
    }

    const consumed: Token[] = [];
    let depth = 0;
    for (;;) {
      const tok = this.peek();
      if (tok.type === 'eof') {
        if (depth > 0) throw new ParseError('unbalanced brackets in expression', first.line);
        break;
      }
      if (depth === 0 && (tok.type === 'newline' || tok.type === 'rbrace')) break;
      if (tok.type === 'open' || tok.type === 'lbrace') depth++;
      if (tok.type === 'close' || tok.type === 'rbrace') depth--;
      consumed.push(this.next());
    }

    if (consumed.length !== 1) return null;
    const only = consumed[0];
    switch (only.type) {
      case 'string':
      case 'heredoc':
        return only.value;
      case 'number':
        return Number(only.value);
      case 'ident':
        if (only.value === 'true') return true;
        if (only.value === 'false') return false;
        return null;
      default:
        return null;
    }
  }
}

/**
 * Parse HCL-style source into its block tree.
 * Throws ParseError with a line number on malformed input.
 */
export function parseDocument(source: string): ParsedDocument {
  return new Parser(tokenize(source)).parse();
}
