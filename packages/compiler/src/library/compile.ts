/* =============================================================================
 * COMPILE STAGE
 * -----------------------------------------------------------------------------
 * SymbolicLib → TypeLib.
 *
 * 1. Lower: every declaration and every inline node becomes a graph node
 *    whose references point at other nodes or at dependency ids.
 * 2. Order: strongly connected components, dependencies first.
 * 3. Assign ids:
 *    - a node outside any cycle hashes its canonical encoding;
 *    - a cycle with an edge set that still cycles without `ref` nodes is a
 *      recursive composition and gets no id;
 *    - a cycle broken by `ref` nodes is hashed as a group: each member gets a
 *      structural key refined through the keys of the members it references,
 *      in-cycle references are encoded as those keys, and each member id
 *      commits to the digest of the sorted encodings and to its own key.
 * 4. Collect: identical structures collapse to one entry with merged
 *    provenance.
 * ============================================================================= */

import { compileDiagnostics } from "../diagnostics/catalog.js";
import { createDiagnosticEmitter } from "../diagnostics/emitter.js";
import { writeTy } from "../encoding/ty-codec.js";
import { StrictWriter } from "../encoding/writer.js";
import { computeSemId } from "../identity/commit.js";
import { ID_TAGS, sha256, taggedHash } from "../identity/hash.js";
import { SemId } from "../identity/id.js";
import { formatTypeFqn, type TypeName } from "../model/ident.js";
import { mapTyRefs, tyChildren, type Ty } from "../model/ty.js";
import { LIMITS } from "../shared/confined.js";
import { debug } from "../shared/debug.js";
import { ConfinementError, InconsistencyError } from "../shared/errors.js";
import { DiagnosticAccumulator, type Result } from "../shared/result.js";
import { mergeSymTy, symTy, type SymTy } from "../typesys/sym-ty.js";
import type { SymbolicLib, SymbolRef } from "./symbolic.js";
import { TypeLib } from "./type-lib.js";

type NodeRef =
  | { readonly kind: "node"; readonly index: number }
  | { readonly kind: "id"; readonly id: SemId }
  /** Unresolvable; only exists until the lowering diagnostics are returned. */
  | { readonly kind: "missing" };

interface GraphNode {
  /** `Lib.Name` for declarations, `Lib.Name.path` for inline nodes. */
  readonly label: string;
  readonly name?: TypeName;
  ty: Ty<NodeRef>;
}

interface Edge {
  readonly to: number;
  /** Edge leaves a `ref` node; allowed to close a cycle. */
  readonly indirect: boolean;
}

const BLANK_REF = new Uint8Array(32);

export function compileLibrary(lib: SymbolicLib): Result<TypeLib> {
  const emitter = createDiagnosticEmitter(compileDiagnostics, { stage: "compile" });
  const acc = new DiagnosticAccumulator();

  // ===========================================================================
  // Lowering
  // ===========================================================================

  const nodes: GraphNode[] = [];
  const byName = new Map<TypeName, number>();
  for (const entry of lib.entries) {
    byName.set(entry.fqn.name, nodes.length);
    nodes.push({ label: formatTypeFqn(entry.fqn), name: entry.fqn.name, ty: { kind: "unicode" } });
  }

  const resolveRef = (ref: SymbolRef, from: string): NodeRef => {
    switch (ref.kind) {
      case "inline":
        return { kind: "node", index: lower(ref.ty, from) };
      case "named": {
        const index = byName.get(ref.name);
        if (index !== undefined) return { kind: "node", index };
        acc.push(
          emitter.emit("tessera/compile/unresolved-reference", {
            message: `cannot resolve type '${ref.name}' referenced from '${from}'`,
            data: { name: ref.name, from },
          }),
        );
        return { kind: "missing" };
      }
      case "extern": {
        const id = lib.dependency(ref.lib)?.types.get(ref.name);
        if (id) return { kind: "id", id };
        acc.push(
          emitter.emit("tessera/compile/unresolved-reference", {
            message: `cannot resolve type '${ref.lib}.${ref.name}' referenced from '${from}'`,
            data: { name: `${ref.lib}.${ref.name}`, from },
          }),
        );
        return { kind: "missing" };
      }
    }
  };

  const lowerInto = (index: number, ty: Ty<SymbolRef>, label: string): void => {
    const children = tyChildren(ty);
    let i = 0;
    const node = nodes[index];
    if (!node) throw new InconsistencyError(`graph node ${index} vanished while lowering`);
    node.ty = mapTyRefs(ty, (ref) => {
      const child = children[i++];
      return resolveRef(ref, child ? `${label}.${child.label}` : label);
    });
  };

  const lower = (ty: Ty<SymbolRef>, label: string): number => {
    const index = nodes.length;
    nodes.push({ label, ty: { kind: "unicode" } });
    lowerInto(index, ty, label);
    return index;
  };

  lib.entries.forEach((entry, index) => lowerInto(index, entry.ty, formatTypeFqn(entry.fqn)));

  if (lib.dependencies.length > LIMITS.libDependencies) {
    acc.push(
      emitter.emit("tessera/compile/limit-exceeded", {
        message: `library '${lib.name}' declares ${lib.dependencies.length} dependencies, more than ${LIMITS.libDependencies}`,
        data: { limit: "libDependencies", detail: String(lib.dependencies.length) },
      }),
    );
  }
  if (acc.hasErrors) return acc.finish(unreachable);

  // ===========================================================================
  // Ordering and id assignment
  // ===========================================================================

  const edges: Edge[][] = nodes.map((node) =>
    tyChildren(node.ty).flatMap((child) =>
      child.ref.kind === "node" ? [{ to: child.ref.index, indirect: child.indirect }] : [],
    ),
  );

  const ids: (SemId | undefined)[] = new Array<SemId | undefined>(nodes.length);
  const idOf = (ref: NodeRef): SemId => {
    switch (ref.kind) {
      case "id":
        return ref.id;
      case "node": {
        const id = ids[ref.index];
        if (!id) throw new InconsistencyError(`node ${ref.index} referenced before its id was assigned`);
        return id;
      }
      case "missing":
        throw new InconsistencyError("unresolved reference survived lowering");
    }
  };

  let composable = true;
  for (const component of stronglyConnected(edges)) {
    const cyclic = component.length > 1 || edges[component[0] ?? 0]?.some((e) => e.to === component[0]) === true;
    if (!cyclic) {
      if (!composable) continue;
      const index = component[0] ?? 0;
      const node = nodes[index];
      if (!node) continue;
      const id = computeSemId(mapTyRefs(node.ty, idOf));
      ids[index] = id;
      debug.compile("id.assigned", { node: node.label, id: id.format("urn") });
      continue;
    }

    const hardCycle = findHardCycle(component, edges);
    if (hardCycle) {
      composable = false;
      const cycle = hardCycle.map((i) => nodes[i]?.label ?? String(i));
      acc.push(
        emitter.emit("tessera/compile/recursive-composition", {
          message: `types compose each other without a reference node: ${cycle.join(" -> ")}`,
          data: { cycle },
        }),
      );
      continue;
    }
    if (!composable) continue;
    assignCycleIds(component, nodes, ids, idOf);
  }
  if (acc.hasErrors) return acc.finish(unreachable);

  // ===========================================================================
  // Collection
  // ===========================================================================

  const entries = new Map<string, readonly [SemId, SymTy]>();
  const exports = new Map<TypeName, SemId>();
  nodes.forEach((node, index) => {
    const id = idOf({ kind: "node", index });
    const next = symTy(mapTyRefs(node.ty, idOf), lib.name, node.name);
    const existing = entries.get(id.hex);
    entries.set(id.hex, [id, existing ? mergeSymTy(id, existing[1], next) : next]);
    if (node.name) exports.set(node.name, id);
  });

  try {
    const compiled = new TypeLib({
      name: lib.name,
      dependencies: lib.dependencies,
      exports,
      entries: [...entries.values()],
    });
    debug.compile("library", { lib: lib.name, nodes: nodes.length, entries: entries.size });
    return acc.finish(() => compiled);
  } catch (error) {
    if (!(error instanceof ConfinementError)) throw error;
    acc.push(
      emitter.emit("tessera/compile/limit-exceeded", {
        message: `library '${lib.name}': ${error.message}`,
        data: { limit: error.limit, detail: error.message },
      }),
    );
    return acc.finish(unreachable);
  }
}

function unreachable(): never {
  throw new InconsistencyError("result value requested despite collected errors");
}

// =============================================================================
// Cycle ids
// =============================================================================

function assignCycleIds(
  component: readonly number[],
  nodes: readonly GraphNode[],
  ids: (SemId | undefined)[],
  idOf: (ref: NodeRef) => SemId,
): void {
  const members = new Set(component);
  const inCycle = (ref: NodeRef): ref is { kind: "node"; index: number } =>
    ref.kind === "node" && members.has(ref.index);

  const encode = (index: number, placeholder: (ref: { kind: "node"; index: number }) => Uint8Array): Uint8Array => {
    const node = nodes[index];
    if (!node) throw new InconsistencyError(`cycle member ${index} is not a graph node`);
    const writer = new StrictWriter();
    writeTy(writer, node.ty, (ref) => writer.bytes(inCycle(ref) ? placeholder(ref) : idOf(ref).toBytes()));
    return writer.finish();
  };

  // Keys start from each member's own shape and are refined with the keys of
  // the members it references until the partition stops splitting. Members
  // left with equal keys are indistinguishable from inside the cycle.
  let keys = new Map(component.map((index) => [index, sha256(encode(index, () => BLANK_REF))] as const));
  const keyOf = (index: number): Uint8Array => {
    const key = keys.get(index);
    if (!key) throw new InconsistencyError(`cycle member ${index} has no key`);
    return key;
  };
  const classes = (): number => new Set([...keys.values()].map(hex)).size;

  let count = classes();
  for (let round = 0; round < component.length; round++) {
    keys = new Map(
      component.map((index) => {
        const content = new StrictWriter().bytes(keyOf(index)).bytes(encode(index, (ref) => keyOf(ref.index))).finish();
        return [index, sha256(content)] as const;
      }),
    );
    const next = classes();
    if (next === count) break;
    count = next;
  }

  // One encoding per key class, so a cycle and its unrolled copies hash alike.
  const encodings = component
    .map((index) => encode(index, (ref) => keyOf(ref.index)))
    .sort(compareBytes)
    .filter((encoding, i, all) => i === 0 || compareBytes(all[i - 1] ?? encoding, encoding) !== 0);
  const writer = new StrictWriter();
  writer.u16(encodings.length);
  for (const encoding of encodings) writer.bytes(encoding);
  const digest = taggedHash(ID_TAGS.cycle, writer.finish());

  for (const index of component) {
    const content = new StrictWriter().bytes(digest).bytes(keyOf(index)).finish();
    const id = SemId.fromBytes(taggedHash(ID_TAGS.semId, content));
    ids[index] = id;
    debug.compile("id.assigned", { node: nodes[index]?.label, id: id.format("urn"), cycle: component.length });
  }
}

function hex(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString("hex");
}

function compareBytes(a: Uint8Array, b: Uint8Array): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const d = (a[i] ?? 0) - (b[i] ?? 0);
    if (d !== 0) return d;
  }
  return a.length - b.length;
}

// =============================================================================
// Graph algorithms
// =============================================================================

/** Tarjan's algorithm; a component is emitted only after every component it reaches. */
function stronglyConnected(edges: readonly (readonly Edge[])[]): number[][] {
  const order: number[] = new Array<number>(edges.length).fill(-1);
  const low: number[] = new Array<number>(edges.length).fill(0);
  const onStack: boolean[] = new Array<boolean>(edges.length).fill(false);
  const stack: number[] = [];
  const components: number[][] = [];
  let counter = 0;

  const visit = (v: number): void => {
    order[v] = counter;
    low[v] = counter;
    counter++;
    stack.push(v);
    onStack[v] = true;
    for (const { to } of edges[v] ?? []) {
      if ((order[to] ?? -1) < 0) {
        visit(to);
        low[v] = Math.min(low[v] ?? 0, low[to] ?? 0);
      } else if (onStack[to]) {
        low[v] = Math.min(low[v] ?? 0, order[to] ?? 0);
      }
    }
    if (low[v] === order[v]) {
      const component: number[] = [];
      let w: number | undefined;
      do {
        w = stack.pop();
        if (w === undefined) break;
        onStack[w] = false;
        component.push(w);
      } while (w !== v);
      components.push(component.sort((a, b) => a - b));
    }
  };

  for (let v = 0; v < edges.length; v++) {
    if ((order[v] ?? -1) < 0) visit(v);
  }
  return components;
}

/** A cycle inside `component` that uses no indirect edge, as node indices. */
function findHardCycle(component: readonly number[], edges: readonly (readonly Edge[])[]): number[] | null {
  const members = new Set(component);
  const state = new Map<number, "open" | "done">();
  const path: number[] = [];

  const visit = (v: number): number[] | null => {
    state.set(v, "open");
    path.push(v);
    for (const { to, indirect } of edges[v] ?? []) {
      if (indirect || !members.has(to)) continue;
      const s = state.get(to);
      if (s === "open") return [...path.slice(path.indexOf(to)), to];
      if (s === undefined) {
        const found = visit(to);
        if (found) return found;
      }
    }
    path.pop();
    state.set(v, "done");
    return null;
  };

  for (const v of component) {
    if (state.has(v)) continue;
    const found = visit(v);
    if (found) return found;
  }
  return null;
}
