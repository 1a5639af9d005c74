export interface Bounds {
  x1: number;
  y1: number;
  x2: number;
  y2: number;
}

export interface UiNode {
  text: string;
  resourceId: string;
  contentDesc: string;
  className: string;
  clickable: boolean;
  enabled: boolean;
  bounds?: Bounds;
}

export interface ElementCriteria {
  text?: string;
  resourceId?: string;
  className?: string;
  contentDesc?: string;
}

const CRITERIA_KEYS = ['text', 'resourceId', 'className', 'contentDesc'] as const;

const XML_ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&apos;': "'",
};

const ENTITY_PATTERN = /&(#x[0-9a-fA-F]+|#\d+|amp|lt|gt|quot|apos);/g;
const MAX_CODE_POINT = 0x10ffff;

// Single pass, so a decoded '&' never starts another entity
function decodeEntities(value: string): string {
  return value.replace(ENTITY_PATTERN, (entity, body: string) => {
    if (!body.startsWith('#')) {
      return XML_ENTITIES[entity] ?? entity;
    }
    const code = body.startsWith('#x') ? parseInt(body.slice(2), 16) : parseInt(body.slice(1), 10);
    return code <= MAX_CODE_POINT ? String.fromCodePoint(code) : entity;
  });
}

function attribute(node: string, name: string): string {
  const match = node.match(new RegExp(`\\s${name}="([^"]*)"`));
  return match ? decodeEntities(match[1]) : '';
}

// Flat list of <node> elements from a uiautomator dump, in document order
export function extractUiNodes(xml: string): UiNode[] {
  const nodes: UiNode[] = [];
  const nodeRegex = /<node\b[^>]*>/g;
  let match: RegExpExecArray | null;

  while ((match = nodeRegex.exec(xml))) {
    const node = match[0];
    const boundsMatch = node.match(/bounds="\[(-?\d+),(-?\d+)\]\[(-?\d+),(-?\d+)\]"/);

    nodes.push({
      text: attribute(node, 'text'),
      resourceId: attribute(node, 'resource-id'),
      contentDesc: attribute(node, 'content-desc'),
      className: attribute(node, 'class'),
      clickable: attribute(node, 'clickable') === 'true',
      enabled: attribute(node, 'enabled') !== 'false',
      bounds: boundsMatch
        ? {
            x1: parseInt(boundsMatch[1], 10),
            y1: parseInt(boundsMatch[2], 10),
            x2: parseInt(boundsMatch[3], 10),
            y2: parseInt(boundsMatch[4], 10),
          }
        : undefined,
    });
  }

  return nodes;
}

// Every supplied criterion must match exactly
export function findNodes(nodes: UiNode[], criteria: ElementCriteria): UiNode[] {
  const checks = CRITERIA_KEYS.filter(key => criteria[key] !== undefined);
  if (checks.length === 0) {
    return [];
  }

  return nodes.filter(node => checks.every(key => node[key] === criteria[key]));
}

export function centerOfBounds(bounds: Bounds): { x: number; y: number } {
  return {
    x: Math.floor((bounds.x1 + bounds.x2) / 2),
    y: Math.floor((bounds.y1 + bounds.y2) / 2),
  };
}
