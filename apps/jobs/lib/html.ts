/**
 * Minimal HTML helpers for pulling values out of server-rendered pages.
 * Regex based; the pages are read for embedded scripts, data attributes and
 * links, never laid out.
 */

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: "'",
  nbsp: ' ',
};

export function decodeEntities(text: string): string {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (whole, code: string) => {
    if (code[0] === '#') {
      const n = code[1] === 'x' || code[1] === 'X' ? parseInt(code.slice(2), 16) : parseInt(code.slice(1), 10);
      return Number.isFinite(n) ? String.fromCodePoint(n) : whole;
    }
    return NAMED_ENTITIES[code.toLowerCase()] ?? whole;
  });
}

/** Bodies of every <script> element, optionally filtered by its type attribute */
export function scriptBodies(html: string, type?: string): string[] {
  const bodies: string[] = [];
  const re = /<script\b([^>]*)>([\s\S]*?)<\/script>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(html)) !== null) {
    if (type !== undefined) {
      const declared = extractAttr(`<script${m[1]}>`, 'type');
      if (declared !== type) continue;
    }
    bodies.push(m[2]);
  }
  return bodies;
}

export function allScriptText(html: string): string {
  return scriptBodies(html).join('\n');
}

export function extractAttr(tag: string, name: string): string | null {
  const re = new RegExp(`\\s${name}\\s*=\\s*("([^"]*)"|'([^']*)')`, 'i');
  const m = re.exec(tag);
  if (!m) return null;
  return decodeEntities(m[2] ?? m[3] ?? '');
}

/** Opening tag of the first element carrying id="<id>" */
export function elementById(html: string, id: string): string | null {
  const re = new RegExp(`<[a-z][a-z0-9-]*\\b[^>]*\\sid\\s*=\\s*["']${id}["'][^>]*>`, 'i');
  return re.exec(html)?.[0] ?? null;
}

export function anchorHrefs(html: string): string[] {
  const hrefs: string[] = [];
  const re = /<a\b[^>]*>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(html)) !== null) {
    const href = extractAttr(m[0], 'href');
    if (href) hrefs.push(href);
  }
  return hrefs;
}

/** Values of every <option>, e.g. the entries of a season dropdown */
export function optionValues(html: string): string[] {
  const values: string[] = [];
  const re = /<option\b[^>]*>/gi;
  let m: RegExpExecArray | null;
  while ((m = re.exec(html)) !== null) {
    const value = extractAttr(m[0], 'value');
    if (value) values.push(value);
  }
  return values;
}

export function absoluteUrl(href: string, base: string): string {
  return new URL(href, base).toString();
}
