import { describe, it, expect } from 'vitest';
import { fileURLToPath } from 'node:url';
import { compileFlow } from '../orchestrator/compiler.js';
import { topoSort } from '../orchestrator/topo.js';
import { loadFlowFile, parseFlowString } from '../config/loader.js';
import { ConfigError } from '../errors.js';

function configError(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (e) {
    if (e instanceof ConfigError) return e;
    throw e;
  }
  throw new Error('expected a ConfigError');
}

const twoSteps = {
  steps: [{ id: 'a' }, { id: 'b' }],
  curl_templates: {
    a: 'curl https://as.test/register',
    b: 'curl -X POST https://as.test/token -d grant_type=x',
  },
};

describe('compiler', () => {
  it('builds a graph with templates and declared order', () => {
    const g = compileFlow({ ...twoSteps, dependencies: { b: ['a', 'a'] } });
    expect(g.order).toEqual(['a', 'b']);
    expect(g.topo).toEqual(['a', 'b']);
    expect(g.dependencies).toEqual({ a: [], b: ['a'] });
    expect(g.steps.a).toEqual({ id: 'a', title: 'a', description: '', manual: false, extract: [], url_fields: [] });
    expect(g.templates.a).toEqual({ method: 'GET', url: 'https://as.test/register', headers: [] });
    expect(g.templates.b).toEqual({ method: 'POST', url: 'https://as.test/token', headers: [], body: 'grant_type=x' });
    expect(g.warnings).toEqual([]);
  });

  it('rejects a two-step cycle and names it', () => {
    const err = configError(() => compileFlow({ ...twoSteps, dependencies: { a: ['b'], b: ['a'] } }));
    expect(err.kind).toBe('CyclicDependency');
    expect(err.cycle).toEqual(['b', 'a', 'b']);
    expect(err.message).toBe('Dependency cycle: b -> a -> b');
  });

  it('rejects a self-dependency', () => {
    const err = configError(() => compileFlow({ ...twoSteps, dependencies: { a: ['a'] } }));
    expect(err.kind).toBe('CyclicDependency');
    expect(err.cycle).toEqual(['a', 'a']);
  });

  it('rejects unknown step references', () => {
    const err = configError(() => compileFlow({ ...twoSteps, dependencies: { b: ['zz'] } }));
    expect(err.kind).toBe('UnknownStepReference');
    expect(err.message).toBe("<flow>: dependencies.b references unknown step 'zz'");

    const viaRule = configError(() => compileFlow({ ...twoSteps, substitution_rules: { b: { '<x>': 'step.zz.f' } } }));
    expect(viaRule.kind).toBe('UnknownStepReference');
  });

  it('rejects duplicate ids and empty step lists', () => {
    const dup = configError(() => compileFlow({ steps: [{ id: 'a' }, { id: 'a' }] }));
    expect(dup.kind).toBe('DuplicateStepId');

    const empty = configError(() => compileFlow({ steps: [] }));
    expect(empty.kind).toBe('InvalidDocument');
    expect(empty.message).toBe("<flow>: 'steps' must be a non-empty list");
  });

  it('requires a template for automatic steps only', () => {
    const missing = configError(() => compileFlow({ steps: [{ id: 'a' }, { id: 'b' }], curl_templates: { a: 'curl https://x.test' } }));
    expect(missing.kind).toBe('MissingTemplate');
    expect(missing.message).toBe("<flow>: step 'b' has no request template");

    const manualWithTemplate = configError(() => compileFlow({
      steps: [{ id: 'a', manual: true }],
      curl_templates: { a: 'curl https://x.test' },
    }));
    expect(manualWithTemplate.kind).toBe('InvalidDocument');

    const g = compileFlow({ steps: [{ id: 'a' }, { id: 'm', manual: true, extract: ['code'] }], curl_templates: { a: 'curl https://x.test' } });
    expect(g.steps.m.manual).toBe(true);
    expect(g.templates.m).toBeUndefined();
  });

  it('does not take inherited object keys for templates', () => {
    const err = configError(() => compileFlow({ steps: [{ id: 'toString' }, { id: 'constructor', manual: true }] }));
    expect(err.kind).toBe('MissingTemplate');
    expect(err.message).toBe("<flow>: step 'toString' has no request template");

    const g = compileFlow({
      steps: [{ id: 'toString' }, { id: 'constructor', manual: true }],
      curl_templates: { toString: 'curl https://x.test' },
    });
    expect(g.order).toEqual(['toString', 'constructor']);
    expect(g.templates.toString).toEqual({ method: 'GET', url: 'https://x.test', headers: [] });
  });

  it('rejects malformed references', () => {
    const err = configError(() => compileFlow({ ...twoSteps, substitution_rules: { b: { '<x>': 'a.client_id' } } }));
    expect(err.kind).toBe('InvalidReference');
  });

  it('reads sectioned and flat substitution rules', () => {
    const g = compileFlow({
      ...twoSteps,
      dependencies: { b: ['a'] },
      substitution_rules: {
        b: {
          data: { '<id>': 'step.a.client_id' },
          '<key>': 'var.api_key',
        },
      },
    });
    expect(g.rules.b).toEqual([
      { token: '<id>', ref: { kind: 'step', stepId: 'a', field: 'client_id' }, source: 'step.a.client_id', scope: 'data' },
      { token: '<key>', ref: { kind: 'var', name: 'api_key' }, source: 'var.api_key' },
    ]);
    expect(g.rules.a).toEqual([]);
  });

  it('warns when a rule reads a step that is not upstream', () => {
    const g = compileFlow({ ...twoSteps, substitution_rules: { b: { '<id>': 'step.a.client_id' } } });
    expect(g.warnings).toEqual(["step 'b' substitutes <id> from 'a', which it does not depend on"]);
  });

  it('merges endpoint defaults, later keys winning', () => {
    const g = compileFlow({
      ...twoSteps,
      endpoint_defaults: { token_endpoint: '/t' },
      endpoints: { token_endpoint: '/token', userinfo_endpoint: '/ui' },
    });
    expect(g.endpointDefaults).toEqual({ token_endpoint: '/token', userinfo_endpoint: '/ui' });
  });

  it('accepts structured requests', () => {
    const g = compileFlow({
      steps: [{ id: 'a' }],
      requests: {
        a: {
          url: '{token_endpoint}',
          headers: { Accept: 'application/json' },
          body: { grant_type: 'x' },
          auth: { username: '<id>' },
        },
      },
    });
    expect(g.templates.a).toEqual({
      method: 'POST',
      url: '{token_endpoint}',
      headers: [['Accept', 'application/json']],
      body: '{\n  "grant_type": "x"\n}',
      auth: { username: '<id>', password: '' },
    });
  });
});

describe('topoSort', () => {
  it('breaks ties by declared order', () => {
    expect(topoSort(['c', 'b', 'a'], { a: ['c'], b: [], c: [] })).toEqual(['c', 'b', 'a']);
  });

  it('reports a cycle in execution direction, skipping the tail', () => {
    try {
      topoSort(['x', 'a', 'b', 'c'], { x: ['a'], a: ['c'], b: ['a'], c: ['b'] });
      throw new Error('expected a cycle');
    } catch (e) {
      if (!(e instanceof ConfigError)) throw e;
      expect(e.cycle).toEqual(['b', 'c', 'a', 'b']);
    }
  });
});

describe('loader', () => {
  it('turns YAML errors into InvalidDocument', () => {
    const err = configError(() => parseFlowString('steps: []\nsteps: []\n'));
    expect(err.kind).toBe('InvalidDocument');
    expect(err.message.startsWith('<string>: ')).toBe(true);
  });

  it('loads the shipped token exchange flow', async () => {
    const file = fileURLToPath(new URL('../../flows/token-exchange.yaml', import.meta.url));
    const g = await loadFlowFile(file);
    expect(g.order).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j']);
    expect(g.topo).toEqual(['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h', 'i', 'j']);
    expect(g.dependencies.g).toEqual(['a', 'd', 'f']);
    expect(g.steps.f.manual).toBe(true);
    expect(g.steps.c.url_fields).toEqual(['verification_uri', 'verification_uri_complete']);
    expect(g.warnings).toEqual([]);
    expect(g.templates.a.headers).toEqual([['Content-Type', 'application/json'], ['X-API-KEY', '{api_key}']]);
    expect(g.templates.d.body).toBe(
      'grant_type=urn:ietf:params:oauth:grant-type:device_code&device_code=<device-code>&client_id=<frontend-client-id>'
    );
    expect(g.templates.g.auth).toEqual({ username: '<backend-client-id>', password: '<backend-client-secret>' });
    expect(g.endpointDefaults.token_endpoint).toBe('/token');
  });
});
