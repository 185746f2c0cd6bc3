export type * from './types/contracts.js';
export type * from './types/http.js';
export * from './errors.js';
export { loadSettings, type Settings } from './config/env.js';
export { loadFlowFile, parseFlowString } from './config/loader.js';
export { compileFlow } from './orchestrator/compiler.js';
export { topoSort } from './orchestrator/topo.js';
export { eligibleSteps, classifySteps, type StepClassification, type StepView } from './orchestrator/resolver.js';
export { renderRequest, renderStep, endpointContext, type EndpointContext, type RenderOutcome } from './template/renderer.js';
export { parseCurl } from './template/curl.js';
export { execute, runStep, extractFields, type ExecuteOptions } from './orchestrator/executor.js';
export { runFlow, type RunOptions, type RunSummary } from './orchestrator/run.js';
export { Session, type SessionInit, type StepResult, type StepStatus } from './session/index.js';
export { discoverEndpoints, type DiscoveredServer } from './discovery/index.js';
