/**
 * Minimal text templates for generated project files.
 *
 * Syntax:
 *   {{name}}             substitute a string field
 *   {{#if flag}}...{{/if}}       keep the body when the field is true / non-empty
 *   {{#unless flag}}...{{/unless}} keep the body when it is not
 *
 * A block tag alone on its line takes the whole line with it, so conditional
 * rows of a markdown table leave no blank lines behind.
 */

export type TemplateValue = string | boolean;
export type TemplateContext = Readonly<Record<string, TemplateValue>>;

export class TemplateError extends Error {
  constructor(
    message: string,
    readonly templateName: string,
    readonly line?: number
  ) {
    super(line === undefined ? `${templateName}: ${message}` : `${templateName}:${line}: ${message}`);
    this.name = 'TemplateError';
  }
}

type Node =
  | { type: 'text'; value: string }
  | { type: 'field'; name: string; line: number }
  | { type: 'block'; kind: 'if' | 'unless'; name: string; line: number; body: Node[] };

export interface Template {
  name: string;
  nodes: Node[];
}

type Token =
  | { type: 'text'; value: string }
  | { type: 'field'; name: string; line: number }
  | { type: 'open'; kind: 'if' | 'unless'; name: string; line: number }
  | { type: 'close'; kind: 'if' | 'unless'; line: number };

const IDENT = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function parseTemplate(source: string, name: string): Template {
  const tokens = tokenize(source, name);
  const root: Node[] = [];
  const stack: Array<{ kind: 'if' | 'unless'; name: string; line: number; body: Node[] }> = [];

  for (const tok of tokens) {
    const target = stack.length > 0 ? stack[stack.length - 1].body : root;
    switch (tok.type) {
      case 'text':
      case 'field':
        target.push(tok);
        break;
      case 'open':
        stack.push({ kind: tok.kind, name: tok.name, line: tok.line, body: [] });
        break;
      case 'close': {
        const open = stack.pop();
        if (!open) throw new TemplateError(`unexpected {{/${tok.kind}}}`, name, tok.line);
        if (open.kind !== tok.kind) {
          throw new TemplateError(`{{/${tok.kind}}} closes {{#${open.kind}}} opened on line ${open.line}`, name, tok.line);
        }
        const parent = stack.length > 0 ? stack[stack.length - 1].body : root;
        parent.push({ type: 'block', ...open });
        break;
      }
    }
  }

  const unclosed = stack.pop();
  if (unclosed) throw new TemplateError(`{{#${unclosed.kind} ${unclosed.name}}} is never closed`, name, unclosed.line);

  return { name, nodes: root };
}

export function renderTemplate(template: Template, ctx: TemplateContext): string {
  return renderNodes(template.nodes, ctx, template.name);
}

/** Parse and render in one go. */
export function render(source: string, name: string, ctx: TemplateContext): string {
  return renderTemplate(parseTemplate(source, name), ctx);
}

function renderNodes(nodes: Node[], ctx: TemplateContext, templateName: string): string {
  let out = '';
  for (const node of nodes) {
    if (node.type === 'text') {
      out += node.value;
      continue;
    }
    const value = lookup(ctx, node.name, templateName, node.line);
    if (node.type === 'field') {
      if (typeof value !== 'string') {
        throw new TemplateError(`{{${node.name}}} is a flag, not a text field`, templateName, node.line);
      }
      out += value;
      continue;
    }
    const truthy = typeof value === 'boolean' ? value : value.length > 0;
    if (truthy === (node.kind === 'if')) {
      out += renderNodes(node.body, ctx, templateName);
    }
  }
  return out;
}

function lookup(ctx: TemplateContext, key: string, templateName: string, line: number): TemplateValue {
  if (!Object.hasOwn(ctx, key)) throw new TemplateError(`unknown field "${key}"`, templateName, line);
  return ctx[key];
}

function tokenize(source: string, name: string): Token[] {
  const tokens: Token[] = [];
  let pos = 0;
  let line = 1;

  const pushText = (value: string) => {
    if (value.length === 0) return;
    tokens.push({ type: 'text', value });
    line += countNewlines(value);
  };

  while (pos < source.length) {
    const start = source.indexOf('{{', pos);
    if (start === -1) {
      pushText(source.slice(pos));
      break;
    }
    const end = source.indexOf('}}', start + 2);
    if (end === -1) throw new TemplateError('unterminated tag', name, line + countNewlines(source.slice(pos, start)));

    let before = source.slice(pos, start);
    let next = end + 2;
    const tagLine = line + countNewlines(before);
    const tag = parseTag(source.slice(start + 2, end).trim(), name, tagLine);

    if (tag.type === 'open' || tag.type === 'close') {
      const standalone = standaloneSpan(source, start, next);
      if (standalone) {
        before = source.slice(pos, standalone.lineStart);
        next = standalone.after;
      }
    }

    pushText(before);
    tokens.push(tag);
    line += countNewlines(source.slice(start, next));
    pos = next;
  }

  return tokens;
}

function parseTag(body: string, name: string, line: number): Exclude<Token, { type: 'text' }> {
  const open = /^#(if|unless)\s+(\S+)$/.exec(body);
  if (open) {
    const kind = open[1] === 'if' ? 'if' : 'unless';
    const field = open[2];
    if (!IDENT.test(field)) throw new TemplateError(`invalid field name "${field}"`, name, line);
    return { type: 'open', kind, name: field, line };
  }
  const close = /^\/(if|unless)$/.exec(body);
  if (close) {
    return { type: 'close', kind: close[1] === 'if' ? 'if' : 'unless', line };
  }
  if (IDENT.test(body)) return { type: 'field', name: body, line };
  throw new TemplateError(`malformed tag {{${body}}}`, name, line);
}

/**
 * If the tag spanning [start, end) is the only thing on its line, return the
 * offsets that swallow the line's leading whitespace and trailing newline.
 */
function standaloneSpan(source: string, start: number, end: number): { lineStart: number; after: number } | null {
  let lineStart = start;
  while (lineStart > 0 && (source[lineStart - 1] === ' ' || source[lineStart - 1] === '\t')) lineStart--;
  if (lineStart > 0 && source[lineStart - 1] !== '\n') return null;

  let after = end;
  while (after < source.length && (source[after] === ' ' || source[after] === '\t')) after++;
  if (after === source.length) return { lineStart, after };
  if (source[after] === '\n') return { lineStart, after: after + 1 };
  if (source[after] === '\r' && source[after + 1] === '\n') return { lineStart, after: after + 2 };
  return null;
}

function countNewlines(s: string): number {
  let n = 0;
  for (const ch of s) if (ch === '\n') n++;
  return n;
}
