/**
 * Binds template bodies against a flat record of named values.
 *
 * Supported actions:
 *   {{ .Field }}  {{ $.Field }}  {{ . }}  {{ $var }}
 *   {{ indent 4 .Field }}  {{ add $i 1 }}
 *   {{ range $i, $v := .List }} … {{ end }}   (also `range $v := .List`, `range .List`)
 *   {{/* comment *\/}}
 * `{{-` and `-}}` trim the whitespace before and after the action.
 */

import { BindingError } from '@asset-graph/core';

export type TemplateData = Readonly<Record<string, unknown>>;

type Operand =
  | { kind: 'int'; value: number }
  | { kind: 'string'; value: string }
  | { kind: 'ref'; base: 'dot' | 'root' | 'var'; variable?: string; path: string[]; source: string };

interface Expression {
  fn?: string;
  args: Operand[];
}

type TemplateNode =
  | { type: 'text'; text: string }
  | { type: 'output'; expr: Expression; line: number }
  | RangeNode;

interface RangeNode {
  type: 'range';
  indexVar?: string;
  valueVar?: string;
  source: Operand;
  body: TemplateNode[];
  line: number;
}

type Segment = { type: 'text'; text: string } | { type: 'action'; source: string; line: number };

interface Scope {
  dot: unknown;
  root: TemplateData;
  vars: ReadonlyMap<string, unknown>;
}

interface TemplateFunction {
  arity: number;
  call(args: unknown[], fail: (message: string) => never): unknown;
}

/**
 * Prefix every line after the first with `width` spaces
 */
export function indent(width: number, text: string): string {
  return text.split('\n').join('\n' + ' '.repeat(width));
}

function expectInt(value: unknown, fail: (message: string) => never): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    fail(`expected an integer, got ${describe(value)}`);
  }
  return value;
}

function expectString(value: unknown, fail: (message: string) => never): string {
  if (typeof value !== 'string') {
    fail(`expected a string, got ${describe(value)}`);
  }
  return value;
}

const FUNCTIONS: Readonly<Record<string, TemplateFunction>> = {
  indent: {
    arity: 2,
    call: ([width, text], fail) => {
      const columns = expectInt(width, fail);
      if (columns < 0) fail('indent width must not be negative');
      return indent(columns, expectString(text, fail));
    },
  },
  add: {
    arity: 2,
    call: ([a, b], fail) => expectInt(a, fail) + expectInt(b, fail),
  },
};

function describe(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'list';
  return typeof value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function countNewlines(text: string, from: number, to: number): number {
  let count = 0;
  for (let i = from; i < to; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}

class Binder {
  constructor(
    private readonly name: string,
    private readonly body: string
  ) {}

  error(line: number, message: string): BindingError {
    return new BindingError(this.name, `line ${line}: ${message}`);
  }

  lex(): Segment[] {
    const { body } = this;
    const segments: Segment[] = [];
    let pos = 0;
    // line of `pos`, advanced over each scanned span
    let line = 1;

    while (pos < body.length) {
      const open = body.indexOf('{{', pos);
      if (open === -1) {
        segments.push({ type: 'text', text: body.slice(pos) });
        break;
      }
      segments.push({ type: 'text', text: body.slice(pos, open) });

      line += countNewlines(body, pos, open);
      const actionLine = line;
      const close = body.indexOf('}}', open + 2);
      if (close === -1) throw this.error(actionLine, 'unterminated action');

      let inner = body.slice(open + 2, close);
      if (/^-\s/.test(inner)) {
        const previous = segments[segments.length - 1];
        if (previous?.type === 'text') previous.text = previous.text.replace(/\s+$/, '');
        inner = inner.slice(1);
      }
      const trimAfter = /\s-$/.test(inner);
      if (trimAfter) inner = inner.slice(0, -1);

      segments.push({ type: 'action', source: inner.trim(), line: actionLine });
      const end = close + 2;
      line += countNewlines(body, open, end);
      pos = end;
      if (trimAfter) {
        while (pos < body.length && /\s/.test(body.charAt(pos))) {
          if (body.charCodeAt(pos) === 10) line++;
          pos++;
        }
      }
    }
    return segments;
  }

  parse(segments: Segment[]): TemplateNode[] {
    const root: TemplateNode[] = [];
    const stack: Array<{ body: TemplateNode[]; line: number }> = [{ body: root, line: 0 }];

    for (const segment of segments) {
      const frame = stack[stack.length - 1] ?? { body: root, line: 0 };
      if (segment.type === 'text') {
        if (segment.text) frame.body.push(segment);
        continue;
      }

      const { source, line } = segment;
      if (source.startsWith('/*')) {
        if (!source.endsWith('*/')) throw this.error(line, 'unterminated comment');
        continue;
      }

      const words = source.match(/"(?:[^"\\]|\\.)*"|\S+/g) ?? [];
      const [head, ...rest] = words;
      if (head === undefined) throw this.error(line, 'empty action');

      if (head === 'end') {
        if (rest.length) throw this.error(line, `unexpected "${rest.join(' ')}" after end`);
        if (stack.length === 1) throw this.error(line, 'unexpected {{end}}');
        stack.pop();
      } else if (head === 'range') {
        const node = this.parseRange(rest.join(' '), line);
        frame.body.push(node);
        stack.push({ body: node.body, line });
      } else {
        frame.body.push({ type: 'output', expr: this.parseExpression(words, line), line });
      }
    }

    const open = stack[stack.length - 1];
    if (stack.length > 1 && open) throw this.error(open.line, 'missing {{end}} for range');
    return root;
  }

  private parseRange(clause: string, line: number): RangeNode {
    const match = /^(?:(\$\w+)\s*(?:,\s*(\$\w+))?\s*:=\s*)?(\S+)$/.exec(clause);
    if (!match) throw this.error(line, `malformed range "${clause}"`);
    const [, first, second, source = ''] = match;

    const node: RangeNode = { type: 'range', source: this.parseOperand(source, line), body: [], line };
    if (second !== undefined) {
      node.indexVar = first;
      node.valueVar = second;
    } else if (first !== undefined) {
      node.valueVar = first;
    }
    return node;
  }

  private parseExpression(words: string[], line: number): Expression {
    const [head = '', ...rest] = words;
    if (/^[A-Za-z_]\w*$/.test(head)) {
      const fn = FUNCTIONS[head];
      if (!fn) throw this.error(line, `function "${head}" not defined`);
      if (rest.length !== fn.arity) {
        throw this.error(line, `${head} expects ${fn.arity} arguments, got ${rest.length}`);
      }
      return { fn: head, args: rest.map((word) => this.parseOperand(word, line)) };
    }
    if (rest.length) throw this.error(line, `unexpected "${rest.join(' ')}" in action`);
    return { args: [this.parseOperand(head, line)] };
  }

  private parseOperand(word: string, line: number): Operand {
    if (/^-?\d+$/.test(word)) return { kind: 'int', value: Number.parseInt(word, 10) };
    if (word.startsWith('"')) {
      try {
        const value: unknown = JSON.parse(word);
        if (typeof value === 'string') return { kind: 'string', value };
      } catch {
        // reported below
      }
      throw this.error(line, `malformed string ${word}`);
    }

    const fields = (rest: string): string[] => rest.split('.').filter(Boolean);
    if (word === '.') return { kind: 'ref', base: 'dot', path: [], source: word };
    if (/^(\.\w+)+$/.test(word)) return { kind: 'ref', base: 'dot', path: fields(word), source: word };
    if (word === '$') return { kind: 'ref', base: 'root', path: [], source: word };
    if (/^\$(\.\w+)+$/.test(word)) return { kind: 'ref', base: 'root', path: fields(word.slice(1)), source: word };

    const variable = /^(\$\w+)((?:\.\w+)*)$/.exec(word);
    if (variable) {
      const [, name = '', rest = ''] = variable;
      return { kind: 'ref', base: 'var', variable: name, path: fields(rest), source: word };
    }
    throw this.error(line, `bad operand "${word}"`);
  }

  render(nodes: TemplateNode[], scope: Scope, out: string[]): void {
    for (const node of nodes) {
      if (node.type === 'text') {
        out.push(node.text);
      } else if (node.type === 'output') {
        out.push(this.toText(this.evaluate(node.expr, scope, node.line), node.line));
      } else {
        this.renderRange(node, scope, out);
      }
    }
  }

  private renderRange(node: RangeNode, scope: Scope, out: string[]): void {
    const list = this.resolve(node.source, scope, node.line);
    if (!Array.isArray(list)) {
      throw this.error(node.line, `range over ${describe(list)}, expected a list`);
    }
    list.forEach((item: unknown, index) => {
      const vars = new Map(scope.vars);
      if (node.indexVar) vars.set(node.indexVar, index);
      if (node.valueVar) vars.set(node.valueVar, item);
      this.render(node.body, { dot: item, root: scope.root, vars }, out);
    });
  }

  private evaluate(expr: Expression, scope: Scope, line: number): unknown {
    const args = expr.args.map((arg) => this.resolve(arg, scope, line));
    if (expr.fn === undefined) return args[0];
    const fn = FUNCTIONS[expr.fn];
    if (!fn) throw this.error(line, `function "${expr.fn}" not defined`);
    const name = expr.fn;
    return fn.call(args, (message) => {
      throw this.error(line, `${name}: ${message}`);
    });
  }

  private resolve(operand: Operand, scope: Scope, line: number): unknown {
    if (operand.kind !== 'ref') return operand.value;

    let current: unknown;
    if (operand.base === 'dot') current = scope.dot;
    else if (operand.base === 'root') current = scope.root;
    else {
      const name = operand.variable ?? '';
      if (!scope.vars.has(name)) throw this.error(line, `undefined variable "${name}"`);
      current = scope.vars.get(name);
    }

    for (const field of operand.path) {
      if (!isRecord(current) || !Object.prototype.hasOwnProperty.call(current, field)) {
        throw this.error(line, `can't evaluate field ${field} in ${operand.source}`);
      }
      current = current[field];
    }
    if (current === null || current === undefined) {
      throw this.error(line, `${operand.source} has no value`);
    }
    return current;
  }

  private toText(value: unknown, line: number): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    throw this.error(line, `cannot render a ${describe(value)} as text`);
  }
}

/**
 * Render body against data. Pure; any unresolved placeholder throws BindingError.
 * @param name identity reported in errors (usually the template's path)
 */
export function bindTemplate(name: string, body: string, data: TemplateData): string {
  const binder = new Binder(name, body);
  const nodes = binder.parse(binder.lex());
  const out: string[] = [];
  binder.render(nodes, { dot: data, root: data, vars: new Map() }, out);
  return out.join('');
}
