/** Rendering descriptor of one layout node. */
export interface VesperExpr {
  /** Field, variant or role name; `data` for the root. */
  readonly name: string;
  /** Kind label (`rec`, `list`, `prim`, ...). */
  readonly kind: string;
  readonly params: string;
  readonly typeName?: string;
}

/** One rebuilt layout node and its children, in traversal order. */
export interface TypeVesper {
  readonly expr: VesperExpr;
  readonly content: TypeVesper[];
}

/** A flattened layout entry: descriptor plus depth below the root. */
export interface LayoutItem {
  readonly depth: number;
  readonly expr: VesperExpr;
}

export function formatVesperExpr(expr: VesperExpr): string {
  let line = `${expr.name} ${expr.kind}`;
  if (expr.params) line += ` ${expr.params}`;
  if (expr.typeName) line += ` -- ${expr.typeName}`;
  return line;
}

/** Two spaces of indent per level, one node per line. */
export function renderVesper(vesper: TypeVesper): string {
  const lines: string[] = [];
  const walk = (node: TypeVesper, depth: number): void => {
    lines.push(`${"  ".repeat(depth)}${formatVesperExpr(node.expr)}`);
    for (const child of node.content) walk(child, depth + 1);
  };
  walk(vesper, 0);
  return lines.join("\n") + "\n";
}

/** Preorder flattening with explicit depths; `TypeLayout.fromItems` inverts it. */
export function flattenVesper(vesper: TypeVesper): LayoutItem[] {
  const items: LayoutItem[] = [];
  const walk = (node: TypeVesper, depth: number): void => {
    items.push({ depth, expr: node.expr });
    for (const child of node.content) walk(child, depth + 1);
  };
  walk(vesper, 0);
  return items;
}
