import type { GSymbol, Production } from './grammar.js';
import { iter, type Iter } from '../utils/iter.js';
import { colors } from '../utils/debug.js';

export type ParseTreeJSON = {
  symbol: GSymbol;
  production: string | null;
  children: ParseTreeJSON[];
};

export class ParseNode {
  readonly symbol: GSymbol;
  /**
   * The production this node was reduced by, null for terminal leaves.
   */
  readonly production: Production | null;
  readonly children: ParseNode[];
  /**
   * Index of the input token a leaf was shifted from.
   */
  readonly position?: number;

  constructor(
    symbol: GSymbol,
    production: Production | null,
    children: ParseNode[] = [],
    position?: number
  ) {
    this.symbol = symbol;
    this.production = production;
    this.children = children;
    this.position = position;
  }

  static forToken(token: GSymbol, position: number) {
    return new ParseNode(token, null, [], position);
  }

  get isLeaf(): boolean {
    return this.production === null;
  }

  /**
   * Iterator over every node in the parse tree, parents before children
   */
  iterTree(): Iter<ParseNode> {
    return iter<ParseNode>([this]).chain(
      ...this.children.map((c) => c.iterTree())
    );
  }

  /**
   * The terminal leaves, left to right. Nodes for ϵ productions have no
   * children and contribute nothing.
   */
  leaves(): GSymbol[] {
    return this.iterTree()
      .filter((node) => node.isLeaf)
      .map((node) => node.symbol)
      .toArray();
  }

  toJSON(): ParseTreeJSON {
    return {
      symbol: this.symbol,
      production: this.production ? this.production.toString() : null,
      children: this.children.map((c) => c.toJSON()),
    };
  }

  pretty(indent: string = ''): string {
    let out = '';
    if (indent == '') {
      out += '\n';
    }
    if (this.isLeaf) {
      out += `${indent}${colors.green(this.symbol)}\n`;
      return out;
    }
    out += `${indent}<${this.symbol}>\n`;
    const childIndent = indent + '|  ';
    this.children.forEach((child) => {
      out += child.pretty(childIndent);
    });
    out += `${indent}</${this.symbol}>\n`;
    return out;
  }

  toString(): string {
    if (this.isLeaf) {
      return this.symbol;
    }
    return `${this.symbol}[${this.children.map((c) => c.toString()).join(', ')}]`;
  }
}
