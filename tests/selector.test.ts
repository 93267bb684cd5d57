import { describe, expect, it } from 'vitest';
import { matchesLabels, parseSelector, SelectorParseError } from '../src/metrics/selector.js';

function summarize(source: string) {
  return parseSelector(source).matchers.map(matcher => [matcher.name, matcher.operator, matcher.value]);
}

describe('parseSelector', () => {
  it('turns the metric name into a __name__ matcher', () => {
    expect(summarize('http_requests_total')).toEqual([['__name__', '=', 'http_requests_total']]);
  });

  it('parses every matching operator', () => {
    expect(summarize('api{job="web", code!="500",path=~"/v1/.*", method !~ \'HEAD|OPTIONS\'}')).toEqual([
      ['__name__', '=', 'api'],
      ['job', '=', 'web'],
      ['code', '!=', '500'],
      ['path', '=~', '/v1/.*'],
      ['method', '!~', 'HEAD|OPTIONS']
    ]);
  });

  it('accepts a trailing comma and a bare label set', () => {
    expect(summarize('{l="x",}')).toEqual([['l', '=', 'x']]);
  });

  it('decodes escapes in quoted strings but not in raw strings', () => {
    expect(summarize('{l="a\\"b\\n"}')).toEqual([['l', '=', 'a"b\n']]);
    expect(summarize('{l=`a\\d+`}')).toEqual([['l', '=', 'a\\d+']]);
  });

  it('anchors regular expressions', () => {
    const selector = parseSelector('{host=~"web"}');
    expect(matchesLabels(selector, { host: 'web' })).toBe(true);
    expect(matchesLabels(selector, { host: 'web-1' })).toBe(false);
  });

  it('matches patterns that backtrack badly in linear time', () => {
    const selector = parseSelector('m{l=~"(a|a)*b"}');
    const candidate = `${'a'.repeat(64)}!`;

    const started = performance.now();
    expect(matchesLabels(selector, { __name__: 'm', l: candidate })).toBe(false);
    expect(performance.now() - started).toBeLessThan(1000);
    expect(matchesLabels(selector, { __name__: 'm', l: 'aaab' })).toBe(true);
  });

  it('lets dots match newlines', () => {
    expect(matchesLabels(parseSelector('{l=~"a.b"}'), { l: 'a\nb' })).toBe(true);
  });

  it('treats absent labels as empty strings', () => {
    const selector = parseSelector('{job="api",zone!="eu"}');
    expect(matchesLabels(selector, { job: 'api' })).toBe(true);
    expect(matchesLabels(parseSelector('{zone=~".+"}'), { job: 'api' })).toBe(false);
  });

  it('rejects selectors without a non-empty matcher', () => {
    expect(() => parseSelector('{}')).toThrowError(
      'vector selector must contain at least one matcher (at position 3)'
    );
    expect(() => parseSelector('{job=""}')).toThrowError(
      'vector selector must contain at least one non-empty matcher'
    );
    expect(() => parseSelector('{job=~".*"}')).toThrowError(SelectorParseError);
  });

  it('rejects a metric name given twice', () => {
    expect(() => parseSelector('up{__name__="down"}')).toThrowError('metric name must not be set twice: "up"');
  });

  it('reports where parsing failed', () => {
    let failure: unknown;
    try {
      parseSelector('up{job="api"');
    } catch (error) {
      failure = error;
    }
    expect(failure).toBeInstanceOf(SelectorParseError);
    expect(failure).toMatchObject({ position: 12, selector: 'up{job="api"' });
  });

  it('rejects malformed regular expressions and operators', () => {
    expect(() => parseSelector('{job=~"("}')).toThrowError('invalid regular expression for label job');
    expect(() => parseSelector('{job=~"(?=api)"}')).toThrowError('invalid regular expression for label job');
    expect(() => parseSelector('{job=="x"}')).toThrowError('expected quoted string');
    expect(() => parseSelector('{job:"x"}')).toThrowError('expected label matching operator');
  });
});
