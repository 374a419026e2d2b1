/**
 * Canonical source printer. Re-parsing the output yields the same AST,
 * apart from source positions.
 */

import type { ContentNode, PropertyBlock, Slide, StyleValue } from '../types/nodes.js';

const INDENT = '  ';

/**
 * Prints a whole document, one slide per bracket block.
 */
export function printDocument(slides: readonly Slide[]): string {
  return slides.map(printSlide).join('\n\n') + (slides.length > 0 ? '\n' : '');
}

/**
 * Prints one slide: content root first, then its style blocks in source order.
 */
export function printSlide(slide: Slide): string {
  const lines = ['[', INDENT + printContent(slide.root, 1)];

  for (const block of slide.styleBlocks) {
    lines.push(`${INDENT}${block.target} ${printBlock(block)}`);
  }

  lines.push(']');
  return lines.join('\n');
}

/**
 * Prints a content expression, breaking row and column arguments onto their own lines.
 */
export function printContent(node: ContentNode, depth: number = 0): string {
  const head = node.name !== undefined ? `${node.name} :: ${node.kind}` : node.kind;
  const params = Object.keys(node.params.properties).length > 0 ? ` ${printBlock(node.params)}` : '';

  switch (node.kind) {
    case 'text':
      return `${head}(${quote(node.value)})${params}`;
    case 'centre':
    case 'padding':
      return `${head}(${printContent(node.child, depth)})${params}`;
    case 'row':
    case 'column': {
      const inner = INDENT.repeat(depth + 1);
      const outer = INDENT.repeat(depth);
      const args = node.children.map((child) => inner + printContent(child, depth + 1));
      return `${head}(\n${args.join(',\n')}\n${outer})${params}`;
    }
  }
}

function printBlock(block: PropertyBlock): string {
  const entries = Object.entries(block.properties).map(([key, value]) => `${key}: ${printValue(value)}`);
  return entries.length > 0 ? `{ ${entries.join(', ')} }` : '{}';
}

function printValue(value: StyleValue): string {
  switch (value.type) {
    case 'number':
      return formatNumber(value.value);
    case 'string':
    case 'colour':
      return quote(value.value);
  }
}

/**
 * Formats a number as a plain decimal literal; the lexer has no exponent syntax.
 */
function formatNumber(value: number): string {
  const text = String(value);
  const match = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/.exec(text);
  if (!match) {
    return text;
  }

  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);

  if (point <= 0) {
    return `${sign}0.${'0'.repeat(-point)}${digits}`;
  }
  if (point >= digits.length) {
    return sign + digits + '0'.repeat(point - digits.length);
  }
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/**
 * Quotes a string using the escapes the lexer understands.
 */
function quote(value: string): string {
  const escaped = value
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n')
    .replace(/\t/g, '\\t');
  return `"${escaped}"`;
}
