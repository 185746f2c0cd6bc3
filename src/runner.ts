// src/runner.ts
// Interactive walkthrough of a flow:
// - flow file from --flow or FLOW_CONFIG, server from --server or OAUTH_SERVER_URL
// - OIDC discovery fills endpoints; configured defaults cover the rest
// - session variables via --var key=value (API_KEY becomes api_key)
// - --auto: run every automatic step once and print the summary
// - otherwise a small command loop on stdin; manual steps prompt for their fields
import 'dotenv/config';
import fs from 'node:fs';
import readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import type { FlowGraph, StepDefinition, StepFields } from './types/contracts.js';
import { own } from './records.js';
import { loadSettings, type Settings } from './config/env.js';
import { loadFlowFile } from './config/loader.js';
import { describeServer, discoverEndpoints } from './discovery/index.js';
import { Session } from './session/index.js';
import { classifySteps, eligibleSteps } from './orchestrator/resolver.js';
import { runStep } from './orchestrator/executor.js';
import { renderStep } from './template/renderer.js';
import { toCurl } from './template/curl.js';
import { runFlow, type RunOptions, type RunSummary } from './orchestrator/run.js';
import { TokenflowError, DiscoveryError, describeError } from './errors.js';
import { COLOR, log, setLogLevel } from './log.js';

export interface CliArgs {
  flowPath?: string;
  serverUrl?: string;
  runId?: string;
  vars: Record<string, string>;
  auto: boolean;
}

export function parseArgs(argv: string[]): CliArgs {
  const out: CliArgs = { vars: {}, auto: false };
  for (let i = 2; i < argv.length; i++) {
    const a = argv[i];
    const next = () => argv[i+1];
    const pushVar = (kvp: string) => {
      const eq = kvp.indexOf('=');
      if (eq > 0) out.vars[kvp.slice(0, eq)] = kvp.slice(eq+1);
    };
    if (a.startsWith('--flow=')) out.flowPath = a.slice('--flow='.length);
    else if (a === '--flow' && next()) out.flowPath = argv[++i];
    else if (a.startsWith('--server=')) out.serverUrl = a.slice('--server='.length);
    else if (a === '--server' && next()) out.serverUrl = argv[++i];
    else if (a.startsWith('--run-id=')) out.runId = a.slice('--run-id='.length);
    else if (a === '--run-id' && next()) out.runId = argv[++i];
    else if (a.startsWith('--var=')) pushVar(a.slice('--var='.length));
    else if (a === '--var' && next()) pushVar(argv[++i]);
    else if (a === '--auto') out.auto = true;
  }
  return out;
}

/** `key=value` words → fields. Words without `=` are ignored. */
export function parseAssignments(words: string[]): StepFields {
  const fields: StepFields = {};
  for (const w of words) {
    const eq = w.indexOf('=');
    if (eq > 0) fields[w.slice(0, eq)] = w.slice(eq+1);
  }
  return fields;
}

export type Ask = (question: string) => Promise<string>;

/** Prompts for every declared field of a manual step that was not given up front. Blank answers are skipped. */
export async function promptForFields(step: StepDefinition, provided: StepFields, ask: Ask): Promise<StepFields> {
  const answers: StepFields = { ...provided };
  for (const k of step.extract) {
    if (own(answers, k) !== undefined) continue;
    const answer = (await ask(`Enter value for '${k}' (${step.id}): `)).trim();
    if (answer) answers[k] = answer;
  }
  return answers;
}

/** Which endpoint placeholders each step uses, and whether discovery supplied them. */
export function endpointUsage(graph: FlowGraph, discovered: Record<string, string>): string[] {
  const usage = new Map<string, string[]>();
  for (const id of graph.order) {
    const tpl = own(graph.templates, id);
    if (!tpl) continue;
    for (const m of tpl.url.matchAll(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g)) {
      const list = usage.get(m[1]) ?? [];
      if (!list.includes(id)) list.push(id);
      usage.set(m[1], list);
    }
  }
  return [...usage].map(([name, steps]) =>
    `  ${name}: ${own(discovered, name) ? 'discovered' : 'default'} (used by steps: ${steps.join(', ')})`
  );
}

function printStatus(session: Session) {
  for (const c of classifySteps(session.graph, session)) {
    const step = session.graph.steps[c.id];
    const label = `${c.id}) ${step.title}${step.manual ? ' [manual]' : ''}`;
    if (c.view === 'completed') console.log(`${COLOR.green('●')} ${label}`);
    else if (c.view === 'eligible') console.log(`${COLOR.yellow('●')} ${label}`);
    else if (c.view === 'running') console.log(`${COLOR.cyan('●')} ${label} ${COLOR.gray('running')}`);
    else if (c.view === 'failed') {
      const err = session.get(c.id)?.error;
      console.log(`${COLOR.red('✗')} ${label} ${COLOR.gray(err ? describeError(err) : 'failed')}`);
    } else console.log(`${COLOR.red('●')} ${label} ${COLOR.gray('waiting on ' + c.waitingOn.join(', '))}`);
  }
}

function printStep(session: Session, id: string) {
  const step = own(session.graph.steps, id);
  if (!step) { console.log(`No step '${id}'.`); return; }
  console.log(`${COLOR.cyan(step.id)} ${step.title}`);
  if (step.description) console.log(COLOR.gray(step.description));
  const r = session.get(id);
  if (!r) { console.log(COLOR.gray('not run yet')); return; }
  console.log(JSON.stringify({
    status: r.status,
    fields: r.fields,
    error: r.error ? describeError(r.error) : undefined,
    request: r.request ? `${r.request.method} ${r.request.url}` : undefined,
    response: r.response ? { status: r.response.status, body: r.response.json ?? r.response.body.slice(0, 2000) } : undefined,
  }, null, 2));
}

/** The request as it would be sent right now, or why it cannot be rendered yet. */
export function printPreview(session: Session, id: string) {
  const step = own(session.graph.steps, id);
  if (!step) { console.log(`No step '${id}'.`); return; }
  if (step.manual) { console.log(`Step '${id}' is manual; it sends no request.`); return; }
  const outcome = renderStep(session, id);
  if (outcome.ok) console.log(toCurl(outcome.request));
  else console.log(COLOR.red(describeError(outcome.error)));
}

function printSummary(s: RunSummary) {
  console.log(`completed: ${s.completed.join(', ') || '-'}`);
  if (s.failed.length) console.log(`failed:    ${s.failed.join(', ')}`);
  if (s.waiting.length) console.log(`waiting:   ${s.waiting.join(', ')} (manual)`);
  if (s.blocked.length) console.log(`blocked:   ${s.blocked.join(', ')}`);
}

const HELP = [
  'status                 show every step',
  'run <id>               execute an eligible step',
  'retry <id>             restart a step (and its dependents), then run it',
  'complete <id> [k=v]... mark a manual step completed',
  'restart <id>           clear a step and everything downstream of it',
  'show <id>              print a step result',
  'preview <id>           print the request a step would send, as curl',
  'auto                   run all eligible automatic steps',
  'quit',
].join('\n');

/** Reason a step cannot be run right now, or undefined when it can. */
export function whyNotRunnable(session: Session, id: string): string | undefined {
  const step = own(session.graph.steps, id);
  if (!step) return `No step '${id}'.`;
  if (step.manual) return `Step '${id}' is manual; use 'complete ${id}'.`;
  if (session.isCompleted(id)) return `Step '${id}' already completed; use 'retry ${id}'.`;
  return whyBlocked(session, id);
}

export function whyNotCompletable(session: Session, id: string): string | undefined {
  const step = own(session.graph.steps, id);
  if (!step) return `No step '${id}'.`;
  if (!step.manual) return `Step '${id}' is not manual; use 'run ${id}'.`;
  if (session.isCompleted(id)) return `Step '${id}' already completed.`;
  return whyBlocked(session, id);
}

function whyBlocked(session: Session, id: string): string | undefined {
  if (eligibleSteps(session.graph, session).includes(id)) return undefined;
  const waiting = (own(session.graph.dependencies, id) ?? []).filter(d => !session.isCompleted(d));
  return `Step '${id}' is waiting on ${waiting.join(', ')}.`;
}

/** Handles one command line. Returns false when the session should end. */
export async function handleCommand(line: string, session: Session, opts: RunOptions, ask: Ask): Promise<boolean> {
  const [cmd, id, ...rest] = line.trim().split(/\s+/);
  switch (cmd) {
    case '':
      return true;
    case 'quit':
    case 'exit':
      return false;
    case 'status':
      printStatus(session);
      return true;
    case 'show':
      if (id) printStep(session, id); else console.log('usage: show <id>');
      return true;
    case 'preview':
      if (id) printPreview(session, id); else console.log('usage: preview <id>');
      return true;
    case 'run': {
      const why = id ? whyNotRunnable(session, id) : 'usage: run <id>';
      if (why) console.log(COLOR.yellow(why)); else await runStep(session, id, opts);
      return true;
    }
    case 'retry':
    case 'restart': {
      if (!id || !own(session.graph.steps, id)) { console.log(`usage: ${cmd} <id>`); return true; }
      const cleared = session.restart(id);
      if (cleared.length) console.log(COLOR.gray(`cleared: ${cleared.join(', ')}`));
      if (cmd === 'retry') {
        const why = whyNotRunnable(session, id);
        if (why) console.log(COLOR.yellow(why)); else await runStep(session, id, opts);
      }
      return true;
    }
    case 'complete': {
      const why = id ? whyNotCompletable(session, id) : 'usage: complete <id> [key=value]...';
      if (why) { console.log(COLOR.yellow(why)); return true; }
      const step = session.graph.steps[id];
      const fields = await promptForFields(step, parseAssignments(rest), ask);
      session.completeManual(id, fields);
      console.log(`${COLOR.green('✓ done')} ${id} ${COLOR.gray('(manual)')}`);
      return true;
    }
    case 'auto':
      printSummary(await runFlow(session, opts));
      return true;
    default:
      console.log(HELP);
      return true;
  }
}

export async function startSession(settings: Settings, args: CliArgs): Promise<{ session: Session; opts: RunOptions }> {
  const graph = await loadFlowFile(args.flowPath ?? settings.flowPath);
  for (const w of graph.warnings) log.warn(w);

  const serverUrl = args.serverUrl ?? settings.serverUrl;
  const variables: Record<string, string> = { ...(settings.apiKey ? { api_key: settings.apiKey } : {}), ...args.vars };
  const session = new Session(graph, { serverUrl, variables });

  if (serverUrl) {
    try {
      const server = await discoverEndpoints(serverUrl, { timeoutMs: settings.timeoutMs });
      session.discovered = server.endpoints;
      log.info(`${COLOR.green('✓')} discovered ${Object.keys(server.endpoints).length} endpoints at ${serverUrl}`);
      for (const line of describeServer(server)) log.info(COLOR.gray(line));
    } catch (e) {
      if (!(e instanceof DiscoveryError)) throw e;
      log.warn(`${e.message}; falling back to configured endpoint defaults`);
    }
    for (const line of endpointUsage(graph, session.discovered)) log.info(COLOR.gray(line));
  } else {
    log.warn('no OAuth server URL set (OAUTH_SERVER_URL or --server); endpoint defaults must be absolute URLs');
  }

  const runId = args.runId ?? settings.runId;
  const opts: RunOptions = {
    timeoutMs: settings.timeoutMs,
    serverUrl,
    ...(runId ? { artifacts: { runId } } : {}),
  };
  return { session, opts };
}

/** Line-at-a-time prompts; read() resolves undefined once stdin has ended. */
function createPrompter(rl: readline.Interface): { read: (question: string) => Promise<string | undefined>; ask: Ask } {
  const buffered: string[] = [];
  const waiters: Array<(line: string | undefined) => void> = [];
  let closed = false;
  rl.on('line', (line) => {
    const w = waiters.shift();
    if (w) w(line); else buffered.push(line);
  });
  rl.on('close', () => {
    closed = true;
    for (const w of waiters.splice(0)) w(undefined);
  });
  const read = (question: string): Promise<string | undefined> => {
    const ready = buffered.shift();
    if (ready !== undefined) return Promise.resolve(ready);
    if (closed) return Promise.resolve(undefined);
    process.stdout.write(question);
    return new Promise(res => waiters.push(res));
  };
  return { read, ask: async (question) => (await read(question)) ?? '' };
}

async function main() {
  const settings = loadSettings();
  if (settings.logLevel) setLogLevel(settings.logLevel);
  const args = parseArgs(process.argv);
  const { session, opts } = await startSession(settings, args);

  if (args.auto) {
    const summary = await runFlow(session, opts);
    printSummary(summary);
    if (summary.failed.length) process.exitCode = 1;
    return;
  }

  const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
  const prompter = createPrompter(rl);
  const ask = prompter.ask;
  opts.onManual = async (step) => {
    const go = (await ask(`Manual step ${step.id}) ${step.title}: complete now? [y/N] `)).trim().toLowerCase();
    if (go !== 'y' && go !== 'yes') return undefined;
    return promptForFields(step, {}, ask);
  };

  printStatus(session);
  console.log(COLOR.gray("\ntype 'help' for commands"));
  try {
    for (;;) {
      const line = await prompter.read('> ');
      if (line === undefined) break;
      if (!(await handleCommand(line, session, opts, ask))) break;
    }
  } finally {
    rl.close();
  }
}

function isEntry(): boolean {
  if (!process.argv[1]) return false;
  try {
    return fs.realpathSync(process.argv[1]) === fileURLToPath(import.meta.url);
  } catch {
    return false;
  }
}

if (isEntry()) {
  main().catch(e => {
    if (e instanceof TokenflowError) {
      log.error(describeError(e));
    } else {
      console.error('[fatal]', e);
    }
    process.exit(1);
  });
}
