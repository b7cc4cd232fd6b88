import type { SemId } from "../identity/id.js";
import { tyChildren, tyKindLabel } from "../model/ty.js";
import { debug } from "../shared/debug.js";
import { formatTyParams } from "../typesys/display.js";
import type { TypeSystem } from "../typesys/type-system.js";

/** Structural description of one position in a type's composition. */
export interface TypeInfo {
  readonly depth: number;
  /** Label of the edge that led here; absent for the root. */
  readonly fieldName?: string;
  readonly kind: string;
  readonly params: string;
  readonly typeName?: string;
  readonly id: SemId;
}

export type TypeNamer = (id: SemId) => string | undefined;

/**
 * Preorder traversal of one compiled type. The target of a `ref` node and any
 * id already on the current path are listed but not expanded, so recursive
 * types produce finite trees.
 */
export class TypeTree {
  readonly items: readonly TypeInfo[];

  private constructor(
    readonly root: SemId,
    items: TypeInfo[],
  ) {
    this.items = items;
    Object.freeze(this);
  }

  /** `nameOf` supplies the `-- Name` shown next to named types. */
  static build(system: TypeSystem, root: SemId, nameOf: TypeNamer = () => undefined): TypeTree {
    const items: TypeInfo[] = [];
    const path = new Set<string>();

    const visit = (id: SemId, depth: number, fieldName: string | undefined, expand: boolean): void => {
      const ty = system.index(id);
      const typeName = nameOf(id);
      items.push({
        depth,
        kind: tyKindLabel(ty),
        params: formatTyParams(ty),
        id,
        ...(fieldName === undefined ? {} : { fieldName }),
        ...(typeName === undefined ? {} : { typeName }),
      });
      if (!expand || path.has(id.hex)) return;
      path.add(id.hex);
      for (const child of tyChildren(ty)) {
        visit(child.ref, depth + 1, child.label, !child.indirect);
      }
      path.delete(id.hex);
    };

    visit(root, 0, undefined, true);
    debug.layout("tree", { root: root.format("urn"), items: items.length });
    return new TypeTree(root, items);
  }
}
