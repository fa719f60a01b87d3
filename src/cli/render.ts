import type { Alert } from '../brokers/adapter.js';
import { MAGNITUDE_UNKNOWN } from '../brokers/adapter.js';
import type { AggregationNode, AggregationTree } from '../classification/types.js';

export interface TreeLine {
  text: string;
  node: AggregationNode;
}

/**
 * Indented outline of an aggregation tree, heaviest children first.
 */
export function renderTree(tree: AggregationTree): TreeLine[] {
  const children = new Map<string, AggregationNode[]>();
  let root: AggregationNode | undefined;

  for (const node of tree.nodes) {
    if (node.parent === '') {
      root = node;
      continue;
    }
    const siblings = children.get(node.parent) ?? [];
    siblings.push(node);
    children.set(node.parent, siblings);
  }

  const lines: TreeLine[] = [];
  const visit = (node: AggregationNode, depth: number): void => {
    const suffix = node.mapped ? '' : ' (unmapped)';
    lines.push({ text: `${'  '.repeat(depth)}${node.label} ${node.weight.toFixed(2)}${suffix}`, node });
    const kids = [...(children.get(node.label) ?? [])].sort(
      (a, b) => b.weight - a.weight || a.label.localeCompare(b.label),
    );
    for (const kid of kids) visit(kid, depth + 1);
  };

  if (root) visit(root, 0);
  return lines;
}

/**
 * One summary line per alert.
 */
export function formatAlert(alert: Alert): string {
  const mag = alert.magnitude === MAGNITUDE_UNKNOWN ? '   --' : alert.magnitude.toFixed(2);
  return [
    alert.sourceId.padEnd(14),
    `ra=${alert.ra.toFixed(5)}`,
    `dec=${alert.dec.toFixed(5)}`,
    `mjd=${alert.detectionTime.toFixed(4)}`,
    `mag=${mag}`,
    alert.displayUrl,
  ].join('  ');
}
