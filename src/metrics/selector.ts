import { RE2JS } from 're2js';

export type MatchOperator = '=' | '!=' | '=~' | '!~';

export type LabelMatcher = {
  name: string;
  operator: MatchOperator;
  value: string;
  matches(candidate: string): boolean;
};

export type Selector = {
  source: string;
  matchers: LabelMatcher[];
};

export const METRIC_NAME_LABEL = '__name__';

export class SelectorParseError extends Error {
  readonly selector: string;
  readonly position: number;

  constructor(selector: string, position: number, message: string) {
    super(`${message} (at position ${position + 1})`);
    this.name = 'SelectorParseError';
    this.selector = selector;
    this.position = position;
  }
}

const METRIC_NAME_START = /[a-zA-Z_:]/;
const METRIC_NAME_CHAR = /[a-zA-Z0-9_:]/;
const LABEL_NAME_START = /[a-zA-Z_]/;
const LABEL_NAME_CHAR = /[a-zA-Z0-9_]/;

const SIMPLE_ESCAPES: Record<string, string> = {
  a: '\x07',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
  v: '\v',
  '\\': '\\',
  '"': '"',
  "'": "'"
};

/**
 * Parses a PromQL instant vector selector such as
 * `http_requests_total{job=~"api|web",code!="200"}` into label matchers.
 * The metric name, when present, becomes an equality matcher on __name__.
 */
export function parseSelector(source: string): Selector {
  const parser = new SelectorParser(source);
  return { source, matchers: parser.parse() };
}

export function matchesLabels(selector: Selector, labels: Readonly<Record<string, string>>): boolean {
  return selector.matchers.every(matcher => matcher.matches(labels[matcher.name] ?? ''));
}

export function createMatcher(name: string, operator: MatchOperator, value: string): LabelMatcher {
  switch (operator) {
    case '=':
      return { name, operator, value, matches: candidate => candidate === value };
    case '!=':
      return { name, operator, value, matches: candidate => candidate !== value };
    case '=~': {
      const pattern = compileAnchored(value);
      return { name, operator, value, matches: candidate => pattern.matches(candidate) };
    }
    case '!~': {
      const pattern = compileAnchored(value);
      return { name, operator, value, matches: candidate => !pattern.matches(candidate) };
    }
  }
}

// RE2 syntax, matched against the whole value with `.` crossing newlines.
// Matching time is linear in the candidate length.
function compileAnchored(value: string): RE2JS {
  return RE2JS.compile(value, RE2JS.DOTALL);
}

class SelectorParser {
  private position = 0;

  constructor(private readonly source: string) {}

  parse(): LabelMatcher[] {
    const matchers: LabelMatcher[] = [];
    this.skipWhitespace();

    let metricName: string | null = null;
    if (METRIC_NAME_START.test(this.peek())) {
      metricName = this.readWhile(METRIC_NAME_CHAR);
      matchers.push(createMatcher(METRIC_NAME_LABEL, '=', metricName));
      this.skipWhitespace();
    }

    if (this.peek() === '{') {
      this.position += 1;
      matchers.push(...this.parseMatcherList());
      this.skipWhitespace();
    }

    if (this.position < this.source.length) {
      this.fail(`unexpected character ${JSON.stringify(this.peek())}`);
    }

    if (matchers.length === 0) {
      this.fail('vector selector must contain at least one matcher');
    }

    if (metricName !== null) {
      const duplicate = matchers.slice(1).some(matcher => matcher.name === METRIC_NAME_LABEL);
      if (duplicate) {
        this.fail(`metric name must not be set twice: ${JSON.stringify(metricName)}`);
      }
    }

    if (matchers.every(matcher => matcher.matches(''))) {
      this.fail('vector selector must contain at least one non-empty matcher');
    }

    return matchers;
  }

  private parseMatcherList(): LabelMatcher[] {
    const matchers: LabelMatcher[] = [];

    for (;;) {
      this.skipWhitespace();
      if (this.peek() === '}') {
        this.position += 1;
        return matchers;
      }

      matchers.push(this.parseMatcher());
      this.skipWhitespace();

      const separator = this.peek();
      if (separator === ',') {
        this.position += 1;
        continue;
      }
      if (separator === '}') {
        this.position += 1;
        return matchers;
      }
      if (separator === '') {
        this.fail('unexpected end of input inside braces');
      }
      this.fail(`unexpected character ${JSON.stringify(separator)} inside braces`);
    }
  }

  private parseMatcher(): LabelMatcher {
    if (!LABEL_NAME_START.test(this.peek())) {
      this.fail(this.peek() === '' ? 'unexpected end of input, expected label name' : 'expected label name');
    }
    const name = this.readWhile(LABEL_NAME_CHAR);
    this.skipWhitespace();

    const operator = this.parseOperator();
    this.skipWhitespace();
    const value = this.parseString();

    try {
      return createMatcher(name, operator, value);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.fail(`invalid regular expression for label ${name}: ${message}`);
    }
  }

  private parseOperator(): MatchOperator {
    const pair = this.source.slice(this.position, this.position + 2);
    if (pair === '=~' || pair === '!=' || pair === '!~') {
      this.position += 2;
      return pair;
    }
    if (this.peek() === '=') {
      this.position += 1;
      return '=';
    }
    this.fail('expected label matching operator');
  }

  private parseString(): string {
    const quote = this.peek();
    if (quote !== '"' && quote !== "'" && quote !== '`') {
      this.fail('expected quoted string');
    }
    const start = this.position;
    this.position += 1;

    let value = '';
    while (this.position < this.source.length) {
      const char = this.source.charAt(this.position);
      if (char === quote) {
        this.position += 1;
        return value;
      }
      if (char === '\\' && quote !== '`') {
        value += this.readEscape();
        continue;
      }
      if (char === '\n' && quote !== '`') {
        this.fail('unterminated quoted string');
      }
      value += char;
      this.position += 1;
    }

    this.position = start;
    this.fail('unterminated quoted string');
  }

  private readEscape(): string {
    const escaped = this.source.charAt(this.position + 1);
    const simple = SIMPLE_ESCAPES[escaped];
    if (simple !== undefined) {
      this.position += 2;
      return simple;
    }

    const width = escaped === 'x' ? 2 : escaped === 'u' ? 4 : escaped === 'U' ? 8 : 0;
    if (width > 0) {
      const digits = this.source.slice(this.position + 2, this.position + 2 + width);
      if (digits.length === width && /^[0-9a-fA-F]+$/.test(digits)) {
        const codePoint = Number.parseInt(digits, 16);
        if (codePoint <= 0x10ffff) {
          this.position += 2 + width;
          return String.fromCodePoint(codePoint);
        }
      }
    }

    this.fail(`unknown escape sequence \\${escaped}`);
  }

  private readWhile(pattern: RegExp): string {
    const start = this.position;
    while (this.position < this.source.length && pattern.test(this.source.charAt(this.position))) {
      this.position += 1;
    }
    return this.source.slice(start, this.position);
  }

  private skipWhitespace() {
    this.readWhile(/\s/);
  }

  private peek(): string {
    return this.source.charAt(this.position);
  }

  private fail(message: string): never {
    throw new SelectorParseError(this.source, this.position, message);
  }
}
