/**
 * Docstring section parsing
 *
 * Understands Google (`Args:`), NumPy (underlined titles), reST
 * (`:param x:`) and epydoc (`@param x:`) markup. Parsed sections are taken
 * out of the prose; anything unrecognised stays in it.
 */

export type FieldKind = 'instance' | 'class' | 'module' | 'unknown';

export interface DocParam {
  name: string;
  type: string | null;
  default: string | null;
  description: string;
}

export interface DocReturns {
  type: string | null;
  description: string;
}

export interface DocRaises {
  type: string;
  description: string;
}

export interface DocAttribute {
  name: string;
  type: string | null;
  description: string;
  kind: FieldKind;
}

export interface ParsedDocstring {
  /** Prose with the parsed sections removed */
  description: string;
  params: DocParam[];
  returns: DocReturns | null;
  raises: DocRaises[];
  attributes: DocAttribute[];
}

/**
 * What a docstring says about a callable, keyed for lookup by argument name
 */
export interface Signature {
  args: ReadonlyMap<string, DocParam>;
  returns: DocReturns | null;
  raises: DocRaises[];
  docstring: string;
}

type SectionKind = 'params' | 'returns' | 'raises' | 'attributes';

const SECTION_TITLES: Record<string, SectionKind> = {
  args: 'params',
  arguments: 'params',
  parameters: 'params',
  params: 'params',
  'keyword args': 'params',
  'keyword arguments': 'params',
  'other parameters': 'params',
  returns: 'returns',
  return: 'returns',
  yields: 'returns',
  yield: 'returns',
  raises: 'raises',
  raise: 'raises',
  exceptions: 'raises',
  attributes: 'attributes',
};

const META_FIELD = /^[:@]([A-Za-z]+)([^:]*):\s*(.*)$/;
const UNDERLINE = /^\s*-{3,}\s*$/;

interface Entry {
  head: string;
  continuation: string[];
}

export function fieldKind(tag: string): FieldKind {
  switch (tag) {
    case 'ivar':
      return 'instance';
    case 'cvar':
      return 'class';
    case 'var':
      return 'module';
    default:
      return 'unknown';
  }
}

function isIndented(line: string): boolean {
  return /^\s/.test(line);
}

function isNumpyTitle(lines: string[], i: number): boolean {
  const line = lines[i] ?? '';
  return line.trim() !== '' && !isIndented(line) && UNDERLINE.test(lines[i + 1] ?? '');
}

function sectionTitle(lines: string[], i: number): { kind: SectionKind; numpy: boolean } | null {
  const line = lines[i] ?? '';
  if (isIndented(line)) return null;

  const google = line.trim().match(/^([A-Za-z][A-Za-z ]*):$/);
  const googleKind = google?.[1] ? SECTION_TITLES[google[1].toLowerCase()] : undefined;
  if (googleKind) return { kind: googleKind, numpy: false };

  const numpyKind = isNumpyTitle(lines, i) ? SECTION_TITLES[line.trim().toLowerCase()] : undefined;
  if (numpyKind) return { kind: numpyKind, numpy: true };

  return null;
}

/**
 * Split a section body into entries: a line at the section's base
 * indentation starts one, deeper lines continue it
 */
function entries(lines: string[]): Entry[] {
  const content = lines.filter(line => line.trim() !== '');
  const base = Math.min(...content.map(line => line.length - line.trimStart().length));

  const result: Entry[] = [];
  for (const line of content) {
    const indent = line.length - line.trimStart().length;
    const last = result[result.length - 1];
    if (indent > base && last) {
      last.continuation.push(line.trim());
    } else {
      result.push({ head: line.trim(), continuation: [] });
    }
  }
  return result;
}

function joinDescription(parts: string[]): string {
  return parts.filter(Boolean).join(' ').trim();
}

/**
 * `int, optional` / `int, default 3` / `int, default=3`
 */
function parseTypeSpec(spec: string | undefined): { type: string | null; default: string | null } {
  if (!spec) return { type: null, default: null };

  let type = spec.trim();
  let defaultValue: string | null = null;

  const withDefault = type.match(/^(.*?),?\s*\bdefault\b\s*[:=]?\s*(.+)$/i);
  if (withDefault) {
    type = withDefault[1] ?? '';
    defaultValue = withDefault[2]?.trim() ?? null;
  }
  type = type.replace(/,?\s*optional\s*$/i, '').trim();

  return { type: type || null, default: defaultValue };
}

function defaultFromDescription(description: string): string | null {
  const match = description.match(/\b[Dd]efaults? to\s+`*([^`]+?)`*\.?\s*$/);
  return match?.[1] ?? null;
}

/**
 * True when text before a colon reads as a type rather than prose
 */
function looksLikeType(text: string): boolean {
  const flattened = text
    .replace(/\[[^\]]*\]/g, '')
    .replace(/\s*([|,])\s*/g, '$1')
    .trim();
  return flattened !== '' && !/\s/.test(flattened);
}

function stripStars(name: string): string {
  return name.replace(/^\*{1,2}/, '');
}

function parseParams(lines: string[], numpy: boolean): DocParam[] {
  const params: DocParam[] = [];

  for (const entry of entries(lines)) {
    const match = numpy
      ? entry.head.match(/^(\*{0,2}[\w.]+)\s*(?::\s*(.*))?$/)
      : entry.head.match(/^(\*{0,2}[\w.]+)\s*(?:\(([^)]*)\))?\s*:\s*(.*)$/);
    if (!match?.[1]) continue;

    const spec = parseTypeSpec(match[2]);
    const description = numpy
      ? joinDescription(entry.continuation)
      : joinDescription([match[3] ?? '', ...entry.continuation]);

    params.push({
      name: stripStars(match[1]),
      type: spec.type,
      default: spec.default ?? defaultFromDescription(description),
      description,
    });
  }

  return params;
}

function parseReturns(lines: string[], numpy: boolean): DocReturns | null {
  const [first, ...rest] = entries(lines);
  if (!first) return null;

  const continuation = [...first.continuation, ...rest.flatMap(e => [e.head, ...e.continuation])];

  if (numpy) {
    const named = first.head.match(/^\w+\s*:\s*(.+)$/);
    const type = named?.[1] ?? (looksLikeType(first.head) ? first.head : null);
    const description = type === null ? [first.head, ...continuation] : continuation;
    return { type, description: joinDescription(description) };
  }

  const typed = first.head.match(/^([^:]+):\s*(.*)$/);
  if (typed?.[1] && looksLikeType(typed[1])) {
    return { type: typed[1].trim(), description: joinDescription([typed[2] ?? '', ...continuation]) };
  }
  return { type: null, description: joinDescription([first.head, ...continuation]) };
}

function parseRaises(lines: string[], numpy: boolean): DocRaises[] {
  return entries(lines).map(entry => {
    if (numpy) {
      return { type: entry.head, description: joinDescription(entry.continuation) };
    }
    const match = entry.head.match(/^([\w.]+)\s*:\s*(.*)$/);
    return match?.[1]
      ? { type: match[1], description: joinDescription([match[2] ?? '', ...entry.continuation]) }
      : { type: '', description: joinDescription([entry.head, ...entry.continuation]) };
  });
}

function upsert<T extends { name: string }>(items: T[], name: string, create: () => T): T {
  const existing = items.find(item => item.name === name);
  if (existing) return existing;

  const item = create();
  items.push(item);
  return item;
}

function newParam(name: string): DocParam {
  return { name, type: null, default: null, description: '' };
}

/**
 * Apply one reST or epydoc field (`:param int x: ...`, `@rtype: ...`)
 */
function applyMetaField(tag: string, argText: string, description: string, result: ParsedDocstring): void {
  const args = argText.trim().split(/\s+/).filter(Boolean);

  switch (tag) {
    case 'param':
    case 'parameter':
    case 'arg':
    case 'argument':
    case 'key':
    case 'keyword': {
      const name = args[args.length - 1];
      if (!name) return;
      const param = upsert(result.params, stripStars(name), () => newParam(stripStars(name)));
      if (args.length > 1) param.type = args.slice(0, -1).join(' ');
      param.description = description;
      param.default ??= defaultFromDescription(description);
      return;
    }
    case 'type': {
      const name = args[0];
      if (!name) return;
      const attribute = result.attributes.find(a => a.name === name);
      if (attribute && !result.params.some(p => p.name === name)) {
        attribute.type = description;
      } else {
        upsert(result.params, stripStars(name), () => newParam(stripStars(name))).type = description;
      }
      return;
    }
    case 'return':
    case 'returns':
      result.returns = { type: result.returns?.type ?? null, description };
      return;
    case 'rtype':
      result.returns = { type: description, description: result.returns?.description ?? '' };
      return;
    case 'raise':
    case 'raises':
    case 'except':
    case 'exception':
      result.raises.push({ type: args[0] ?? '', description });
      return;
    case 'ivar':
    case 'cvar':
    case 'var': {
      const name = args[0];
      if (!name) return;
      const attribute = upsert(result.attributes, name, () => ({
        name,
        type: null,
        description: '',
        kind: fieldKind(tag),
      }));
      attribute.description = description;
      attribute.kind = fieldKind(tag);
      if (args[1]) attribute.type = args[1];
      return;
    }
    default:
      // unknown fields are left out of the prose too
      return;
  }
}

function applySection(kind: SectionKind, lines: string[], numpy: boolean, result: ParsedDocstring): void {
  if (lines.every(line => line.trim() === '')) return;

  switch (kind) {
    case 'params':
      result.params.push(...parseParams(lines, numpy));
      break;
    case 'returns':
      result.returns = parseReturns(lines, numpy);
      break;
    case 'raises':
      result.raises.push(...parseRaises(lines, numpy));
      break;
    case 'attributes':
      result.attributes.push(
        ...parseParams(lines, numpy).map(p => ({
          name: p.name,
          type: p.type,
          description: p.description,
          kind: 'unknown' as const,
        }))
      );
      break;
  }
}

export function parseDocstring(docstring: string): ParsedDocstring {
  const result: ParsedDocstring = { description: '', params: [], returns: null, raises: [], attributes: [] };
  const lines = docstring.split('\n');
  const prose: string[] = [];

  let i = 0;
  while (i < lines.length) {
    const header = sectionTitle(lines, i);
    if (header) {
      i += header.numpy ? 2 : 1;
      const start = i;
      while (i < lines.length) {
        const line = lines[i] ?? '';
        const ends = header.numpy
          ? isNumpyTitle(lines, i) || META_FIELD.test(line)
          : line.trim() !== '' && !isIndented(line);
        if (ends) break;
        i++;
      }
      applySection(header.kind, lines.slice(start, i), header.numpy, result);
      continue;
    }

    const line = lines[i] ?? '';
    const meta = isIndented(line) ? null : line.match(META_FIELD);
    if (meta?.[1]) {
      const description = [meta[3] ?? ''];
      i++;
      while (i < lines.length && isIndented(lines[i] ?? '') && (lines[i] ?? '').trim() !== '') {
        description.push((lines[i] ?? '').trim());
        i++;
      }
      applyMetaField(meta[1].toLowerCase(), meta[2] ?? '', joinDescription(description), result);
      continue;
    }

    prose.push(line);
    i++;
  }

  result.description = prose.join('\n').replace(/\n{3,}/g, '\n\n').trim();
  return result;
}

export function toSignature(parsed: ParsedDocstring): Signature {
  return {
    args: new Map(parsed.params.map(p => [p.name, p])),
    returns: parsed.returns,
    raises: parsed.raises,
    docstring: parsed.description,
  };
}

export function parseSignature(docstring: string | null): Signature {
  return toSignature(parseDocstring(docstring ?? ''));
}
