// ---------------------------------------------------------------------------
// node-sql-parser's AST shapes vary between grammars and releases (a column
// may be a string or { expr: { value } }, a function name a string or
// { name: [{ value }] }). These helpers narrow `unknown` nodes instead of
// trusting any one shape.
// ---------------------------------------------------------------------------

export type Node = Record<string, unknown>;

export function isNode(value: unknown): value is Node {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function child(node: Node, key: string): Node | null {
  const v = node[key];
  return isNode(v) ? v : null;
}

export function children(node: Node, key: string): Node[] {
  const v = node[key];
  if (Array.isArray(v)) return v.filter(isNode);
  return isNode(v) ? [v] : [];
}

export function str(node: Node, key: string): string | null {
  const v = node[key];
  return typeof v === 'string' ? v : null;
}

export function nodeType(node: unknown): string | null {
  return isNode(node) ? str(node, 'type') : null;
}

/** Resolve an identifier-ish value: 'x', { value: 'x' }, { expr: { value } }, { name: [...] } */
export function identifier(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (!isNode(value)) return null;
  if (typeof value.value === 'string') return value.value;
  if (isNode(value.expr)) return identifier(value.expr);
  if (Array.isArray(value.name)) {
    const parts = value.name.map(identifier).filter((p): p is string => p !== null);
    return parts.length > 0 ? parts.join('.') : null;
  }
  if (value.name !== undefined) return identifier(value.name);
  if (value.column !== undefined) return identifier(value.column);
  return null;
}

export function isSelect(node: unknown): boolean {
  return nodeType(node) === 'select';
}

/** A nested statement may be the statement itself or wrapped as { ast }. */
export function unwrapStatement(node: unknown): Node | null {
  if (!isNode(node)) return null;
  if (isNode(node.ast)) return node.ast;
  return node;
}

/**
 * Depth-first walk over every node. `visit` returning false stops descent
 * into that node's children.
 */
export function walk(value: unknown, visit: (node: Node) => boolean | void): void {
  if (Array.isArray(value)) {
    for (const item of value) walk(item, visit);
    return;
  }
  if (!isNode(value)) return;
  if (visit(value) === false) return;
  for (const key of Object.keys(value)) {
    const v = value[key];
    if (typeof v === 'object' && v !== null) walk(v, visit);
  }
}

/** Every node matching `predicate`, without descending into matches. */
export function collect(value: unknown, predicate: (node: Node) => boolean): Node[] {
  const found: Node[] = [];
  walk(value, (node) => {
    if (predicate(node)) {
      found.push(node);
      return false;
    }
    return true;
  });
  return found;
}
