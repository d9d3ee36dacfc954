/**
 * Conversions from arbitrary data to the structured content the
 * Renderer draws (tree nodes, dictionary cells).
 */

import type { StyleDescriptor, StyledSpan, TreeNode } from '../models/index.js';

const BRANCH_LABEL_STYLE = 'bold';
const CONTAINER_TYPE_STYLE = 'dim';

type Entries = [string, unknown][];

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/** Key/value entries for mapping-like values, or null */
function mappingEntries(value: unknown): Entries | null {
  if (value instanceof Map) {
    return [...value.entries()].map(([k, v]): [string, unknown] => [String(k), v]);
  }
  if (isPlainRecord(value)) {
    return Object.entries(value);
  }
  return null;
}

/** Items of sequence-like values, or null */
function sequenceItems(value: unknown): unknown[] | null {
  if (Array.isArray(value)) return value;
  if (value instanceof Set) return [...value];
  return null;
}

function containerTypeName(value: unknown): string {
  if (Array.isArray(value)) return 'array';
  if (value instanceof Set) return 'Set';
  if (value instanceof Map) return 'Map';
  return 'object';
}

/** Plain string form of a scalar */
export function stringifyScalar(value: unknown): string {
  if (typeof value === 'string') return value;
  if (value === undefined) return 'undefined';
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

function jsonReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Map) return Object.fromEntries(value);
  if (value instanceof Set) return [...value];
  if (typeof value === 'bigint') return value.toString();
  return value;
}

/** Compact JSON, tolerant of Map, Set and bigint */
export function toJson(value: unknown, indent?: number): string {
  return JSON.stringify(value, jsonReplacer, indent) ?? stringifyScalar(value);
}

/**
 * Dictionary cell for a value: containers show their type name dimmed
 * followed by their compact JSON, scalars show as text.
 */
export function describeValue(value: unknown): StyledSpan[] {
  if (mappingEntries(value) !== null || sequenceItems(value) !== null) {
    return [
      { text: containerTypeName(value), style: CONTAINER_TYPE_STYLE },
      { text: ` ${toJson(value)}` },
    ];
  }
  return [{ text: stringifyScalar(value) }];
}

function addToTree(node: TreeNode, value: unknown, name?: string): void {
  const label: StyledSpan[] = name !== undefined ? [{ text: name, style: BRANCH_LABEL_STYLE }] : [];

  const entries = mappingEntries(value);
  if (entries !== null) {
    let branch = node;
    if (label.length > 0) {
      branch = { label, children: [] };
      node.children.push(branch);
    }
    for (const [key, child] of entries) {
      addToTree(branch, child, key);
    }
    return;
  }

  const items = sequenceItems(value);
  if (items !== null) {
    const branch: TreeNode = {
      label: label.length > 0
        ? label
        : [{ text: containerTypeName(value), style: BRANCH_LABEL_STYLE }, { text: ` (${items.length})` }],
      children: [],
    };
    node.children.push(branch);
    items.forEach((item, index) => addToTree(branch, item, String(index)));
    return;
  }

  const text = stringifyScalar(value);
  node.children.push({
    label: label.length > 0 ? [...label, { text: `: ${text}` }] : [{ text }],
    children: [],
  });
}

/**
 * Build a tree from arbitrary nested data.
 * Mappings become named branches, sequences become indexed branches,
 * scalars become `name: value` leaves.
 */
export function buildTree(data: unknown, title: string, titleStyle: StyleDescriptor): TreeNode {
  const root: TreeNode = { label: [{ text: title, style: titleStyle }], children: [] };
  addToTree(root, data);
  return root;
}
