/**
 * Parameter Set
 *
 * Named, hierarchical configuration. Interior nodes are nested
 * ParameterSets keyed by name (usually a module name), leaves are plain
 * values. Paths use "." to descend, e.g. "camera1.exposure_time".
 */

import type { ParameterTree, ParameterValue } from "@filmbus/types";

type ParameterNode = ParameterValue | ParameterSet;

export class UnknownParameterError extends Error {
  public readonly path: string;

  constructor(path: string, reason: string) {
    super(`Parameter "${path}" ${reason}`);
    this.name = "UnknownParameterError";
    this.path = path;
    Object.setPrototypeOf(this, UnknownParameterError.prototype);
  }
}

function isTree(value: ParameterValue | ParameterTree): value is ParameterTree {
  return typeof value === "object" && value !== null;
}

export class ParameterSet {
  public readonly name: string;
  private readonly entries = new Map<string, ParameterNode>();

  constructor(name: string) {
    this.name = name;
  }

  static fromObject(name: string, tree: ParameterTree): ParameterSet {
    const set = new ParameterSet(name);
    for (const [key, value] of Object.entries(tree)) {
      set.entries.set(
        key,
        isTree(value) ? ParameterSet.fromObject(key, value) : value,
      );
    }
    return set;
  }

  /**
   * Names of the direct children, in insertion order
   */
  names(): string[] {
    return [...this.entries.keys()];
  }

  has(path: string): boolean {
    return this.lookup(path) !== undefined;
  }

  /**
   * True when `path` names a leaf, false for sets and missing paths
   */
  hasValue(path: string): boolean {
    const node = this.lookup(path);
    return node !== undefined && !(node instanceof ParameterSet);
  }

  /**
   * Dotted paths of every leaf, depth first in insertion order
   */
  leafPaths(): string[] {
    const paths: string[] = [];
    for (const [key, node] of this.entries) {
      if (node instanceof ParameterSet) {
        paths.push(...node.leafPaths().map((path) => `${key}.${path}`));
      } else {
        paths.push(key);
      }
    }
    return paths;
  }

  /**
   * Get the sub-tree at `path`. Fails when it does not exist or is a leaf.
   */
  get(path: string): ParameterSet {
    const node = this.lookup(path);
    if (node === undefined) {
      throw new UnknownParameterError(path, `does not exist in "${this.name}"`);
    }
    if (!(node instanceof ParameterSet)) {
      throw new UnknownParameterError(path, "is a value, not a parameter set");
    }
    return node;
  }

  getValue(path: string): ParameterValue {
    const node = this.lookup(path);
    if (node === undefined) {
      throw new UnknownParameterError(path, `does not exist in "${this.name}"`);
    }
    if (node instanceof ParameterSet) {
      throw new UnknownParameterError(path, "is a parameter set, not a value");
    }
    return node;
  }

  /**
   * Set a leaf value. Intermediate sets along the path must already exist.
   */
  set(path: string, value: ParameterValue): void {
    const segments = path.split(".");
    const leaf = segments.pop();
    if (!leaf) {
      throw new UnknownParameterError(path, "is not a valid path");
    }
    const parent = segments.length > 0 ? this.get(segments.join(".")) : this;
    if (parent.entries.get(leaf) instanceof ParameterSet) {
      throw new UnknownParameterError(path, "is a parameter set, not a value");
    }
    parent.entries.set(leaf, value);
  }

  /**
   * Add (or replace) a named sub-tree
   */
  add(subset: ParameterSet): void {
    this.entries.set(subset.name, subset);
  }

  /**
   * Deep, independent clone
   */
  copy(): ParameterSet {
    const clone = new ParameterSet(this.name);
    for (const [key, node] of this.entries) {
      clone.entries.set(key, node instanceof ParameterSet ? node.copy() : node);
    }
    return clone;
  }

  toObject(): ParameterTree {
    const tree: ParameterTree = {};
    for (const [key, node] of this.entries) {
      tree[key] = node instanceof ParameterSet ? node.toObject() : node;
    }
    return tree;
  }

  private lookup(path: string): ParameterNode | undefined {
    let node: ParameterNode | undefined = this;
    for (const segment of path.split(".")) {
      if (!(node instanceof ParameterSet)) {
        return undefined;
      }
      node = node.entries.get(segment);
    }
    return node;
  }
}
