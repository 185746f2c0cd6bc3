import { describe, it, expect } from 'vitest';
import { parseCurl, toCurl, tokenize } from '../template/curl.js';
import { ConfigError } from '../errors.js';

function parseError(cmd: string): string {
  try {
    parseCurl(cmd);
  } catch (e) {
    if (e instanceof ConfigError) return e.message;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

describe('tokenize', () => {
  it('splits words the way a shell would', () => {
    expect(tokenize(`curl -H "A: b c" 'd e'f`)).toEqual(['curl', '-H', 'A: b c', 'd ef']);
  });

  it('joins continued lines', () => {
    expect(tokenize('curl \\\n  https://x.test \\\n  -s')).toEqual(['curl', 'https://x.test', '-s']);
  });

  it('unescapes inside double quotes', () => {
    expect(tokenize('curl -d "say \\"hi\\""')).toEqual(['curl', '-d', 'say "hi"']);
  });
});

describe('parseCurl', () => {
  it('reads method, headers and data', () => {
    const tpl = parseCurl(`curl -X post https://as.test/token -H 'Accept: application/json' -d a=1 --data "b=2"`);
    expect(tpl).toEqual({
      method: 'POST',
      url: 'https://as.test/token',
      headers: [['Accept', 'application/json']],
      body: 'a=1&b=2',
    });
  });

  it('defaults the method from the presence of a body', () => {
    expect(parseCurl('curl https://as.test/userinfo').method).toBe('GET');
    expect(parseCurl('curl https://as.test/token --data-raw x=1').method).toBe('POST');
  });

  it('accepts attached and = forms', () => {
    const tpl = parseCurl('curl -XPUT --header=X-Trace:abc https://as.test/clients/1');
    expect(tpl.method).toBe('PUT');
    expect(tpl.headers).toEqual([['X-Trace', 'abc']]);
  });

  it('splits headers at the first colon only', () => {
    const tpl = parseCurl('curl https://as.test -H "Authorization: Bearer a:b"');
    expect(tpl.headers).toEqual([['Authorization', 'Bearer a:b']]);
  });

  it('reads basic auth from -u', () => {
    expect(parseCurl('curl -u "id:sec:ret" https://as.test').auth).toEqual({ username: 'id', password: 'sec:ret' });
    expect(parseCurl('curl --user id https://as.test').auth).toEqual({ username: 'id', password: '' });
  });

  it('leaves placeholders untouched', () => {
    const tpl = parseCurl('curl -X POST {token_endpoint} -d "client_id=<client-id>"');
    expect(tpl.url).toBe('{token_endpoint}');
    expect(tpl.body).toBe('client_id=<client-id>');
  });

  it('ignores output-only flags', () => {
    expect(parseCurl('curl -s -S --compressed -i https://as.test').url).toBe('https://as.test');
  });

  it('rejects what it cannot represent', () => {
    expect(parseError('wget https://as.test')).toBe("curl template: command must start with 'curl'");
    expect(parseError('curl -k https://as.test')).toBe("curl template: unsupported curl option '-k'");
    expect(parseError('curl https://as.test -X')).toBe('curl template: -X needs a value');
    expect(parseError('curl -s')).toBe('curl template: no URL given');
    expect(parseError('curl https://a.test https://b.test')).toBe(
      "curl template: more than one URL ('https://a.test', 'https://b.test')"
    );
    expect(parseError("curl 'https://as.test")).toBe('curl template: unterminated single quote');
  });
});

describe('toCurl', () => {
  it('quotes only the words a shell would split', () => {
    const cmd = toCurl({
      method: 'POST',
      url: 'https://as.test/token',
      headers: [['Content-Type', 'application/json']],
      auth: { username: 'cid', password: 'test-secret' },
      body: `{"note":"it's"}`,
    });
    expect(cmd).toBe([
      'curl -X POST https://as.test/token',
      "-H 'Content-Type: application/json'",
      '-u cid:test-secret',
      `-d '{"note":"it'\\''s"}'`,
    ].join(' \\\n  '));
  });

  it('reads back as the same request', () => {
    const cmd = toCurl({ method: 'GET', url: 'https://as.test/userinfo', headers: [['Authorization', 'Bearer at-1']] });
    expect(parseCurl(cmd)).toEqual({ method: 'GET', url: 'https://as.test/userinfo', headers: [['Authorization', 'Bearer at-1']] });
  });
});
