/**
 * Node and edge identifiers.
 *
 * Node IDs are `<scope>;<kind>`, or a bare `<kind>` with an empty scope.
 * Edge keys join two node IDs with `|`, which node IDs may not contain, so
 * an edge key always splits back into its source and destination.
 */

export const SCOPE_DELIMITER = ';';
export const EDGE_DELIMITER = '|';

export interface EdgeEndpoints {
  src: string;
  dst: string;
}

export interface NodeIDParts {
  scope: string;
  kind: string;
}

/**
 * Identifier format used by `Topology.validate`.
 */
export interface IDCodec {
  parseEdgeID(edgeID: string): EdgeEndpoints | null;
  parseNodeID(nodeID: string): NodeIDParts | null;
}

export function makeNodeID(scope: string, kind: string): string {
  return scope === '' ? kind : `${scope}${SCOPE_DELIMITER}${kind}`;
}

export function parseNodeID(nodeID: string): NodeIDParts | null {
  if (nodeID === '' || nodeID.includes(EDGE_DELIMITER)) {
    return null;
  }
  const idx = nodeID.indexOf(SCOPE_DELIMITER);
  const scope = idx === -1 ? '' : nodeID.slice(0, idx);
  const kind = idx === -1 ? nodeID : nodeID.slice(idx + 1);
  if (kind === '') {
    return null;
  }
  return { scope, kind };
}

export function makeEdgeID(src: string, dst: string): string {
  return `${src}${EDGE_DELIMITER}${dst}`;
}

export function parseEdgeID(edgeID: string): EdgeEndpoints | null {
  const fields = edgeID.split(EDGE_DELIMITER);
  if (fields.length !== 2) {
    return null;
  }
  const [src, dst] = fields;
  if (src === '' || dst === '') {
    return null;
  }
  return { src, dst };
}

export const defaultIDCodec: IDCodec = {
  parseEdgeID,
  parseNodeID,
};
