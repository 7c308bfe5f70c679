import Parser from 'tree-sitter';
import Go from 'tree-sitter-go';

export type SyntaxNode = Parser.SyntaxNode;

/** Go tree-sitter node types used by the indexer and resolver */
export const GoNodes = {
  SOURCE_FILE: 'source_file',
  PACKAGE_CLAUSE: 'package_clause',
  PACKAGE_IDENTIFIER: 'package_identifier',
  IMPORT_DECLARATION: 'import_declaration',
  IMPORT_SPEC_LIST: 'import_spec_list',
  IMPORT_SPEC: 'import_spec',
  FUNCTION_DECLARATION: 'function_declaration',
  METHOD_DECLARATION: 'method_declaration',
  PARAMETER_LIST: 'parameter_list',
  PARAMETER_DECLARATION: 'parameter_declaration',
  VARIADIC_PARAMETER_DECLARATION: 'variadic_parameter_declaration',
  FUNC_LITERAL: 'func_literal',
  CALL_EXPRESSION: 'call_expression',
  SELECTOR_EXPRESSION: 'selector_expression',
  PARENTHESIZED_EXPRESSION: 'parenthesized_expression',
  DEFER_STATEMENT: 'defer_statement',
  GO_STATEMENT: 'go_statement',
  IDENTIFIER: 'identifier',
  COMMENT: 'comment',
  ERROR: 'ERROR',
} as const;

/**
 * Creates a Go parser instance.
 *
 * tree-sitter-go's typings do not extend tree-sitter's Language type even
 * though the two are compatible at runtime, hence the double assertion.
 */
export function createGoParser(): Parser {
  const parser = new Parser();
  parser.setLanguage(Go as unknown as Parser.Language);
  return parser;
}

/**
 * Parse Go source. The native binding copies a string input through a fixed
 * 32 KiB buffer by default and rejects anything longer, so the buffer is
 * sized to the input.
 */
export function parseGo(parser: Parser, source: string): Parser.Tree {
  return parser.parse(source, undefined, { bufferSize: Buffer.byteLength(source, 'utf8') * 2 + 1 });
}

/** Convert a node's 0-based row to a 1-based line */
export function lineOf(node: SyntaxNode): number {
  return node.startPosition.row + 1;
}

export function endLineOf(node: SyntaxNode): number {
  return node.endPosition.row + 1;
}

/** Node text on a single line: each line break and the indentation around it is dropped */
export function renderText(node: SyntaxNode): string {
  return node.text.replace(/[ \t]*\r?\n[ \t]*/g, '');
}

/** Walks the tree depth-first; returning false from the callback skips the children */
export function walkTree(node: SyntaxNode, callback: (node: SyntaxNode) => boolean | void): void {
  if (callback(node) === false) return;
  for (const child of node.children) {
    walkTree(child, callback);
  }
}

/** First ERROR node or inserted MISSING token in the tree, if any */
export function findSyntaxError(root: SyntaxNode): SyntaxNode | null {
  let found: SyntaxNode | null = null;
  walkTree(root, (node) => {
    if (found) return false;
    if (node.type === GoNodes.ERROR || node.isMissing) {
      found = node;
      return false;
    }
    return true;
  });
  return found;
}

export function getChildrenOfType(node: SyntaxNode, type: string): SyntaxNode[] {
  return node.children.filter((child) => child.type === type);
}

/** Strip any number of enclosing parentheses */
export function unwrapParentheses(node: SyntaxNode): SyntaxNode {
  let current = node;
  while (current.type === GoNodes.PARENTHESIZED_EXPRESSION) {
    const inner = current.namedChildren.find((c) => c.type !== GoNodes.COMMENT);
    if (!inner) break;
    current = inner;
  }
  return current;
}

/** Top-level function and method declarations of a file */
export function functionDeclarations(root: SyntaxNode): SyntaxNode[] {
  return root.children.filter(
    (c) => c.type === GoNodes.FUNCTION_DECLARATION || c.type === GoNodes.METHOD_DECLARATION
  );
}
