/**
 * Navigation summary (`SUMMARY.md`) rendering
 */

import { inlineCode } from './markdown.js';

export const DEFAULT_SUMMARY_MARKER = '{{toc}}';

interface TocNode {
  path: string | null;
  children: Map<string, TocNode>;
}

function buildTree(entries: ReadonlyMap<string, string>): TocNode {
  const root: TocNode = { path: null, children: new Map() };
  for (const [name, docPath] of entries) {
    let node = root;
    for (const segment of name.split('.')) {
      let child = node.children.get(segment);
      if (!child) {
        child = { path: null, children: new Map() };
        node.children.set(segment, child);
      }
      node = child;
    }
    node.path = docPath;
  }
  return root;
}

function writeTree(node: TocNode, depth: number, lines: string[]): void {
  for (const segment of [...node.children.keys()].sort()) {
    const child = node.children.get(segment);
    if (!child) continue;
    // An empty link is an mdBook draft chapter
    lines.push(`${'  '.repeat(depth)}- [${inlineCode(segment)}](${child.path ?? ''})`);
    writeTree(child, depth + 1, lines);
  }
}

/**
 * Nested bullet list, one level per dotted segment
 */
export function renderToc(entries: ReadonlyMap<string, string>): string {
  const lines: string[] = [];
  writeTree(buildTree(entries), 0, lines);
  return lines.join('\n');
}

/**
 * Render the summary for `entries` (display name -> document path)
 *
 * With a template, its first `marker` is replaced by the nested list; a
 * template without the marker gets the list appended. Without a template
 * the result is a flat list sorted by module name.
 */
export function renderSummary(
  entries: ReadonlyMap<string, string>,
  template?: string | null,
  marker: string = DEFAULT_SUMMARY_MARKER
): string {
  if (template == null) {
    const items = [...entries.keys()]
      .sort()
      .map(name => `- [${inlineCode(name)}](${entries.get(name) ?? ''})`);
    return ['# Summary', '', ...items, ''].join('\n');
  }

  const toc = renderToc(entries);
  if (!template.includes(marker)) {
    const separator = template === '' || template.endsWith('\n') ? '' : '\n';
    return `${template}${separator}\n${toc}\n`;
  }
  return template.replace(marker, () => toc);
}
