export type TemplateValue = string | { readonly [key: string]: string };

export type TemplateVariables = Readonly<Record<string, TemplateValue>>;

export class TemplateRenderError extends Error {
  readonly template: string;

  constructor(template: string, message: string) {
    super(`template ${JSON.stringify(template)}: ${message}`);
    this.name = 'TemplateRenderError';
    this.template = template;
  }
}

type TextNode = { kind: 'text'; value: string };
type FieldNode = { kind: 'field'; path: string[] };
type IndexNode = { kind: 'index'; path: string[]; key: string };
type TemplateNode = TextNode | FieldNode | IndexNode;

export type CompiledTemplate = {
  source: string;
  render(variables: TemplateVariables): string;
};

const ACTION_OPEN = '{{';
const ACTION_CLOSE = '}}';
const FIELD_PATH_PATTERN = /^(\.[A-Za-z_][A-Za-z0-9_]*)+$/;
const INDEX_PATTERN = /^index\s+(\.[A-Za-z_][A-Za-z0-9_.]*)\s+("(?:[^"\\]|\\.)*")$/;

const cache = new Map<string, CompiledTemplate>();

/**
 * Parses a name or label template. Supported actions:
 *
 *   {{ .SignalFxMetricName }}
 *   {{ .SignalFxLabels.host }}
 *   {{ index .SignalFxLabels "k8s.pod.name" }}
 *
 * `{{-` and `-}}` trim whitespace around the action.
 */
export function compileTemplate(source: string): CompiledTemplate {
  const cached = cache.get(source);
  if (cached) {
    return cached;
  }

  const nodes = parseTemplate(source);
  const compiled: CompiledTemplate = {
    source,
    render: variables => renderNodes(source, nodes, variables)
  };
  cache.set(source, compiled);
  return compiled;
}

export function renderTemplate(source: string, variables: TemplateVariables): string {
  return compileTemplate(source).render(variables);
}

function parseTemplate(source: string): TemplateNode[] {
  const nodes: TemplateNode[] = [];
  let cursor = 0;

  while (cursor < source.length) {
    const open = source.indexOf(ACTION_OPEN, cursor);
    if (open < 0) {
      pushText(nodes, source.slice(cursor));
      break;
    }

    const close = source.indexOf(ACTION_CLOSE, open + ACTION_OPEN.length);
    if (close < 0) {
      throw new TemplateRenderError(source, `unclosed action at offset ${open}`);
    }

    let inner = source.slice(open + ACTION_OPEN.length, close);
    let text = source.slice(cursor, open);
    let next = close + ACTION_CLOSE.length;

    if (/^-\s/.test(inner)) {
      inner = inner.slice(1);
      text = text.trimEnd();
    }
    if (/\s-$/.test(inner)) {
      inner = inner.slice(0, -1);
      while (next < source.length && /\s/.test(source.charAt(next))) {
        next += 1;
      }
    }

    pushText(nodes, text);
    nodes.push(parseAction(source, inner.trim()));
    cursor = next;
  }

  return nodes;
}

function pushText(nodes: TemplateNode[], value: string) {
  if (value.length > 0) {
    nodes.push({ kind: 'text', value });
  }
}

function parseAction(source: string, action: string): TemplateNode {
  if (action.length === 0) {
    throw new TemplateRenderError(source, 'missing value for command');
  }

  if (FIELD_PATH_PATTERN.test(action)) {
    return { kind: 'field', path: splitPath(action) };
  }

  const index = INDEX_PATTERN.exec(action);
  if (index) {
    const [, rawPath, rawKey] = index;
    if (!rawPath || !rawKey || !FIELD_PATH_PATTERN.test(rawPath)) {
      throw new TemplateRenderError(source, `bad index target in "${action}"`);
    }
    let key: unknown;
    try {
      key = JSON.parse(rawKey);
    } catch {
      throw new TemplateRenderError(source, `bad quoted key in "${action}"`);
    }
    if (typeof key !== 'string') {
      throw new TemplateRenderError(source, `bad quoted key in "${action}"`);
    }
    return { kind: 'index', path: splitPath(rawPath), key };
  }

  throw new TemplateRenderError(source, `unsupported action "${action}"`);
}

function splitPath(path: string): string[] {
  return path.slice(1).split('.');
}

function renderNodes(source: string, nodes: TemplateNode[], variables: TemplateVariables): string {
  let output = '';
  for (const node of nodes) {
    switch (node.kind) {
      case 'text':
        output += node.value;
        break;
      case 'field':
        output += expectString(source, lookup(source, variables, node.path), node.path.join('.'));
        break;
      case 'index': {
        const target = lookup(source, variables, node.path);
        if (typeof target === 'string') {
          throw new TemplateRenderError(source, `can't index item of type string at .${node.path.join('.')}`);
        }
        output += lookupKey(source, target, node.key);
        break;
      }
    }
  }
  return output;
}

function lookup(source: string, variables: TemplateVariables, path: string[]): TemplateValue {
  const [head, ...rest] = path;
  if (head === undefined || !Object.hasOwn(variables, head)) {
    throw new TemplateRenderError(source, `can't evaluate field ${head ?? ''}`);
  }

  let current: TemplateValue | undefined = variables[head];
  for (const segment of rest) {
    if (current === undefined || typeof current === 'string') {
      throw new TemplateRenderError(source, `can't evaluate field ${segment} in type string`);
    }
    current = lookupKey(source, current, segment);
  }

  if (current === undefined) {
    throw new TemplateRenderError(source, `can't evaluate field ${head}`);
  }
  return current;
}

function lookupKey(source: string, map: { readonly [key: string]: string }, key: string): string {
  const value = Object.hasOwn(map, key) ? map[key] : undefined;
  if (value === undefined) {
    throw new TemplateRenderError(source, `map has no entry for key "${key}"`);
  }
  return value;
}

function expectString(source: string, value: TemplateValue, path: string): string {
  if (typeof value !== 'string') {
    throw new TemplateRenderError(source, `.${path} is a map, not a printable value`);
  }
  return value;
}
