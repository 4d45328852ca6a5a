/**
 * Computation Graph Node
 *
 * A node records one scalar produced while arithmetic runs: its value, the
 * operation that made it and the nodes it was made from. Operands are shared
 * references, so one node can feed many consumers and the recorded graph is
 * a DAG. A node can only point at nodes that already existed, which makes
 * cycles impossible.
 *
 * @module dagrad/engine/node
 */

import type { Operation } from "../core/types.ts";
import { UsageError } from "../core/errors.ts";

let nextId = 0;

const LEAF: Operation = { kind: "leaf" };

export class Node {
  /** Creation index, unique per process */
  readonly id: number;
  /** Forward value, fixed at construction */
  readonly value: number;
  readonly operation: Operation;
  readonly operands: readonly Node[];
  /** Optional name, mostly for leaves */
  readonly label?: string;

  /**
   * d(root)/d(this) for the root of the last backward pass.
   * Only backward() and zeroGrad() write it.
   */
  gradient = 0;

  constructor(
    value: number,
    operation: Operation = LEAF,
    operands: readonly Node[] = [],
    label?: string,
  ) {
    this.id = nextId++;
    this.value = value;
    this.operation = operation;
    this.operands = operands;
    this.label = label;
  }

  get isLeaf(): boolean {
    return this.operation.kind === "leaf";
  }

  toString(): string {
    const name = this.label ?? `${this.operation.kind}#${this.id}`;
    return `Node(${name}, value=${this.value}, gradient=${this.gradient})`;
  }
}

/**
 * Create a leaf node (constant, input or parameter)
 */
export function leaf(value: number, label?: string): Node {
  return new Node(value, LEAF, [], label);
}

/**
 * Lift plain numbers into leaf nodes
 */
export function leaves(values: readonly number[]): Node[] {
  return values.map((v) => leaf(v));
}

/**
 * Reject anything that is not a graph node
 *
 * Guards the entry points that walk a graph, since JavaScript callers can
 * hand over undefined or a plain `{ value }` object.
 */
export function assertNode(candidate: unknown, what: string): asserts candidate is Node {
  if (!(candidate instanceof Node)) {
    throw new UsageError(`${what} must be a graph Node, got ${describe(candidate)}`);
  }
}

function describe(candidate: unknown): string {
  if (candidate === null) return "null";
  if (typeof candidate === "object") return candidate.constructor?.name ?? "object";
  return typeof candidate;
}
