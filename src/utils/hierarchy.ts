import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { HierarchyNode, MalformedHierarchyError } from '../types';

const ATTRIBUTES_KEY = ':@';
const TEXT_KEY = '#text';

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  preserveOrder: true,
  parseAttributeValue: false,
  parseTagValue: false,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toAttributes(value: unknown): Record<string, string> {
  const attributes: Record<string, string> = {};
  if (!isRecord(value)) {
    return attributes;
  }
  for (const [name, attr] of Object.entries(value)) {
    attributes[name] = String(attr);
  }
  return attributes;
}

// preserveOrder yields [{ tag: [...children], ':@': { attr } }, ...]
function toNodes(entries: unknown): HierarchyNode[] {
  if (!Array.isArray(entries)) {
    return [];
  }
  const nodes: HierarchyNode[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) {
      continue;
    }
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRIBUTES_KEY || key === TEXT_KEY || key.startsWith('?')) {
        continue;
      }
      nodes.push({
        tag: key,
        attributes: toAttributes(entry[ATTRIBUTES_KEY]),
        children: toNodes(value),
      });
    }
  }
  return nodes;
}

export function parseHierarchy(xml: string): HierarchyNode {
  const source = xml.trim();
  if (source.length === 0) {
    throw new MalformedHierarchyError('empty dump', xml);
  }

  const validation = XMLValidator.validate(source);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedHierarchyError(`${msg} (line ${line}, column ${col})`, xml);
  }

  const parsed: unknown = parser.parse(source);
  const [root] = toNodes(parsed);
  if (!root) {
    throw new MalformedHierarchyError('no root element', xml);
  }
  return root;
}

function collapseWhitespace(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

// Copy of the tree with attribute whitespace collapsed
export function normalizeHierarchy(node: HierarchyNode): HierarchyNode {
  const attributes: Record<string, string> = {};
  for (const [name, value] of Object.entries(node.attributes)) {
    attributes[name] = collapseWhitespace(value);
  }
  return {
    tag: node.tag,
    attributes,
    children: node.children.map(normalizeHierarchy),
  };
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

export function renderHierarchy(node: HierarchyNode, depth = 0, indent = '  '): string {
  const pad = indent.repeat(depth);
  const attributes = Object.entries(node.attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join('');

  if (node.children.length === 0) {
    return `${pad}<${node.tag}${attributes} />`;
  }

  return [
    `${pad}<${node.tag}${attributes}>`,
    ...node.children.map(child => renderHierarchy(child, depth + 1, indent)),
    `${pad}</${node.tag}>`,
  ].join('\n');
}

export function formatHierarchy(node: HierarchyNode): string {
  return renderHierarchy(normalizeHierarchy(node));
}
