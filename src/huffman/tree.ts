/**
 * tree.ts - Deterministic Huffman tree construction
 *
 * Nodes are compared by weight, then by tie-break key: a leaf's byte value,
 * or 256 for any internal node (internal nodes rank above every byte).
 * Two internal nodes of equal weight compare equal, so the order in which
 * they leave the queue is decided by the binary heap's sift rules. The heap
 * below follows those rules step for step; changing it changes tree shapes,
 * and with them the meaning of every stored container, since decoding
 * rebuilds the tree from the stored counts.
 */

import { EmptyAlphabetError } from './errors.js';
import type { FrequencyTable } from './frequency.js';

/** Tie-break key shared by every internal node */
export const INTERNAL_TIE_KEY = 256;

export interface HuffmanLeaf {
  kind: 'leaf';
  symbol: number;
  weight: number;
}

export interface HuffmanInternal {
  kind: 'internal';
  weight: number;
  left: HuffmanNode;
  right: HuffmanNode;
}

export type HuffmanNode = HuffmanLeaf | HuffmanInternal;

export function tieKey(node: HuffmanNode): number {
  return node.kind === 'leaf' ? node.symbol : INTERNAL_TIE_KEY;
}

/**
 * Node order: weight, then tie-break key.
 * @returns negative if `a` comes first, positive if `b` does, 0 on a tie
 */
export function compareNodes(a: HuffmanNode, b: HuffmanNode): number {
  if (a.weight !== b.weight) return a.weight - b.weight;
  return tieKey(a) - tieKey(b);
}

function less(a: HuffmanNode, b: HuffmanNode): boolean {
  return compareNodes(a, b) < 0;
}

/**
 * Move heap[pos] up towards startPos while it is smaller than its parent.
 */
function siftDown(heap: HuffmanNode[], startPos: number, pos: number): void {
  const item = heap[pos];
  while (pos > startPos) {
    const parentPos = (pos - 1) >> 1;
    const parent = heap[parentPos];
    if (!less(item, parent)) break;
    heap[pos] = parent;
    pos = parentPos;
  }
  heap[pos] = item;
}

/**
 * Move the smaller child up until heap[pos]'s item reaches a leaf slot,
 * then settle it with siftDown.
 */
function siftUp(heap: HuffmanNode[], pos: number): void {
  const end = heap.length;
  const startPos = pos;
  const item = heap[pos];
  let child = 2 * pos + 1;
  while (child < end) {
    const right = child + 1;
    if (right < end && !less(heap[child], heap[right])) {
      child = right;
    }
    heap[pos] = heap[child];
    pos = child;
    child = 2 * pos + 1;
  }
  heap[pos] = item;
  siftDown(heap, startPos, pos);
}

function heapify(heap: HuffmanNode[]): void {
  for (let i = (heap.length >> 1) - 1; i >= 0; i--) {
    siftUp(heap, i);
  }
}

function heapPop(heap: HuffmanNode[]): HuffmanNode | undefined {
  const last = heap.pop();
  if (last === undefined || heap.length === 0) return last;
  const top = heap[0];
  heap[0] = last;
  siftUp(heap, 0);
  return top;
}

function heapPush(heap: HuffmanNode[], node: HuffmanNode): void {
  heap.push(node);
  siftDown(heap, 0, heap.length - 1);
}

/**
 * Build the Huffman tree for a frequency table.
 *
 * Leaves enter the heap in ascending byte order. Bytes with a zero count
 * get no leaf. With a single distinct byte the leaf itself is the root.
 */
export function buildHuffmanTree(frequencies: FrequencyTable): HuffmanNode {
  const heap: HuffmanNode[] = [];
  for (let symbol = 0; symbol < frequencies.length; symbol++) {
    const weight = frequencies[symbol];
    if (weight > 0) {
      heap.push({ kind: 'leaf', symbol, weight });
    }
  }
  heapify(heap);

  while (heap.length > 1) {
    const left = heapPop(heap);
    const right = heapPop(heap);
    if (left === undefined || right === undefined) break;
    heapPush(heap, { kind: 'internal', weight: left.weight + right.weight, left, right });
  }

  const root = heap.at(0);
  if (root === undefined) {
    throw new EmptyAlphabetError();
  }
  return root;
}

/**
 * Count leaves and measure depth, for statistics and tests.
 */
export function treeStats(root: HuffmanNode): { leafCount: number; depth: number } {
  if (root.kind === 'leaf') {
    return { leafCount: 1, depth: 0 };
  }
  const left = treeStats(root.left);
  const right = treeStats(root.right);
  return {
    leafCount: left.leafCount + right.leafCount,
    depth: 1 + Math.max(left.depth, right.depth),
  };
}
