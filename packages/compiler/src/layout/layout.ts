import { LIMITS } from "../shared/confined.js";
import { debug } from "../shared/debug.js";
import { LayoutError } from "../shared/errors.js";
import type { TypeInfo, TypeTree } from "./type-tree.js";
import { renderVesper, type LayoutItem, type TypeVesper, type VesperExpr } from "./vesper.js";

function describe(info: TypeInfo): VesperExpr {
  return {
    name: info.fieldName ?? "data",
    kind: info.kind,
    params: info.params,
    ...(info.typeName === undefined ? {} : { typeName: info.typeName }),
  };
}

/**
 * A flat, depth-annotated preorder listing of one type. Depth is the only
 * structural signal; `toVesper` rebuilds the tree from it.
 */
export class TypeLayout {
  private constructor(readonly items: readonly LayoutItem[]) {
    Object.freeze(this);
  }

  static fromTree(tree: TypeTree): TypeLayout {
    return new TypeLayout(tree.items.map((info) => ({ depth: info.depth, expr: describe(info) })));
  }

  static fromItems(items: readonly LayoutItem[]): TypeLayout {
    return new TypeLayout([...items]);
  }

  /**
   * `path` holds one child index per ancestor level. Each item at depth `d`
   * truncates `path` to `d - 1`, walks it down from the root to find the
   * parent, appends itself there and pushes its own index.
   */
  toVesper(): TypeVesper {
    let root: TypeVesper | null = null;
    let path: number[] = [];

    for (const [index, item] of this.items.entries()) {
      const node: TypeVesper = { expr: item.expr, content: [] };
      const d = item.depth;
      if (!Number.isInteger(d) || d < 0) {
        throw new LayoutError(`item ${index} has depth ${d}, not a non-negative integer`, "layout/invalid-depth", index);
      }

      if (d === 0) {
        if (root) {
          throw new LayoutError(`item ${index} is a second root`, "layout/duplicate-root", index);
        }
        root = node;
        path = [];
        continue;
      }

      if (!root || path.length < d - 1) {
        throw new LayoutError(
          `item ${index} at depth ${d} skips a level below nesting ${root ? path.length + 1 : 0}`,
          "layout/skipped-level",
          index,
        );
      }

      path = path.slice(0, d - 1);
      let parent: TypeVesper = root;
      for (const step of path) {
        const next: TypeVesper | undefined = parent.content[step];
        if (!next) throw new LayoutError(`item ${index} has no parent at depth ${d - 1}`, "layout/skipped-level", index);
        parent = next;
      }
      if (parent.content.length >= LIMITS.vesperChildren) {
        throw new LayoutError(
          `item ${index} would be child ${parent.content.length + 1} of one node, above ${LIMITS.vesperChildren}`,
          "layout/too-many-children",
          index,
        );
      }
      parent.content.push(node);
      path.push(parent.content.length - 1);
    }

    if (!root) throw new LayoutError("layout has no items", "layout/zero-items", 0);
    debug.layout("vesper", { items: this.items.length });
    return root;
  }

  toString(): string {
    return renderVesper(this.toVesper());
  }
}
