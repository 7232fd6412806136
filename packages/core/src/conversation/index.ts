export { withEphemeralConversation, type EphemeralScopeOptions } from './ephemeral.js';
export { InferenceRunner, runInference, titleOf, type InferenceRunnerOptions } from './inference-runner.js';
export type { InferenceResult, EphemeralScopeResult, IdGenerator } from './types.js';
