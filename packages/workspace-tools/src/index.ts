/**
 * @module @crew-control/workspace-tools
 * Worker-facing tools: documents in a working directory, sandbox results.
 */

export { DocumentWorkspace, validatePath } from './documents.js';
export type { PathValidation } from './documents.js';
export { StagingSandbox, interpretSandboxResult, runInSandbox } from './sandbox.js';
export { toolError } from './tool-error.js';
